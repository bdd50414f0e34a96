// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/settings-commands`
 * Purpose: Slash commands and the model-selection callback that read or change chat settings.
 * Scope: help, reset, set_api_key, cancel, clear_api_key, current_settings, set_model callback. Model listing lives in services/model-catalog.
 * Invariants:
 *   - Changing the secret or model resets the message count and clears history
 *   - Secrets are shown masked only
 *   - Store read failures produce a reply, never a rethrow
 * Side-effects: IO (settings, history and pending stores; transport)
 * Links: services/dispatch-event
 * @public
 */

import { type ChatId, type ChatSession, maskSecret } from "@/core";
import { isStoreUnavailableError } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import {
  modelAlreadySet,
  modelSet,
  REPLIES,
  settingModel,
} from "../replies";
import type { RelayDeps, RelayOutcome } from "../types";

export const SET_MODEL_CALLBACK_PREFIX = "set_model:";

export async function loadSettings(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<ChatSession | undefined> {
  try {
    return await deps.settings.get(chatId);
  } catch (error) {
    if (!isStoreUnavailableError(error)) throw error;
    logEvent(
      ctx.log,
      EVENT_NAMES.RELAY_STORE_UNAVAILABLE,
      { reqId: ctx.reqId, chatId, store: error.store },
      undefined,
      "error"
    );
    return undefined;
  }
}

export async function sendHelp(
  deps: RelayDeps,
  chatId: ChatId
): Promise<RelayOutcome> {
  await deps.transport.send(chatId, REPLIES.welcome);
  return "replied";
}

export async function resetHistory(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<RelayOutcome> {
  const cleared = await deps.history.clear(chatId);
  if (!cleared) {
    await deps.transport.send(chatId, REPLIES.resetFailed);
    return "failed";
  }
  logEvent(ctx.log, EVENT_NAMES.RELAY_HISTORY_RESET, { reqId: ctx.reqId, chatId });
  await deps.transport.send(chatId, REPLIES.resetDone);
  return "settings_updated";
}

export async function beginSecretEntry(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<RelayOutcome> {
  try {
    await deps.pending.begin(chatId, deps.config.pendingInputTtlSeconds);
  } catch (error) {
    if (!isStoreUnavailableError(error)) throw error;
    ctx.log.error({ err: error, chatId }, "pending input not recorded");
    await deps.transport.send(chatId, REPLIES.secretEntryUnavailable);
    return "store_unavailable";
  }
  logEvent(ctx.log, EVENT_NAMES.RELAY_SECRET_ENTRY_STARTED, {
    reqId: ctx.reqId,
    chatId,
    ttlSeconds: deps.config.pendingInputTtlSeconds,
  });
  await deps.transport.send(chatId, REPLIES.secretEntryInstructions, "markdown");
  return "replied";
}

export async function cancelSecretEntry(
  deps: RelayDeps,
  chatId: ChatId
): Promise<RelayOutcome> {
  const cancelled = await deps.pending.cancel(chatId);
  await deps.transport.send(
    chatId,
    cancelled ? REPLIES.cancelDone : REPLIES.cancelNothing
  );
  return cancelled ? "settings_updated" : "settings_unchanged";
}

export async function clearSecret(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<RelayOutcome> {
  const session = await loadSettings(deps, ctx, chatId);
  if (!session) {
    await deps.transport.send(chatId, REPLIES.settingsUnavailable);
    return "store_unavailable";
  }

  if (!session.secret) {
    await deps.transport.send(chatId, REPLIES.clearSecretAlreadyDefault);
    return "settings_unchanged";
  }

  if (!deps.config.sharedSecret) {
    await deps.transport.send(chatId, REPLIES.clearSecretNoDefault, "markdown");
    return "settings_unchanged";
  }

  const saved = await deps.settings.upsert(chatId, undefined, session.model, 0);
  if (!saved) {
    await deps.transport.send(chatId, REPLIES.clearSecretFailed);
    return "failed";
  }
  if (!(await deps.history.clear(chatId))) {
    ctx.log.warn({ chatId }, "history not cleared after secret change");
  }

  logEvent(ctx.log, EVENT_NAMES.RELAY_SECRET_CLEARED, { reqId: ctx.reqId, chatId });
  await deps.transport.send(chatId, REPLIES.clearSecretDone);
  return "settings_updated";
}

/** Lines of the current-settings reply. */
export function describeSettings(
  session: ChatSession,
  config: { sharedSecret?: string | undefined; messageLimit: number }
): string {
  let keyStatus: string;
  if (session.secret) {
    keyStatus = `Using your custom API key: \`${maskSecret(session.secret)}\``;
  } else if (config.sharedSecret) {
    keyStatus = "Using bot's default API key";
  } else {
    keyStatus =
      "No API key available. Bot's default is missing, and you haven't set your own.\nPlease use `/set_api_key` to provide your key.";
  }

  const lines = [
    "*Your Current Settings*:",
    `API Key: ${keyStatus}`,
    `Model: \`${session.model}\``,
  ];

  if (!session.secret && config.messageLimit > 0) {
    lines.push(
      `Messages Used (Default Key): ${session.messageCount} / ${config.messageLimit}`
    );
    if (session.messageCount >= config.messageLimit) {
      lines.push(
        "  (Limit reached. Use `/set_api_key` for unlimited messages.)"
      );
    }
  }

  return lines.join("\n");
}

export async function showSettings(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<RelayOutcome> {
  const session = await loadSettings(deps, ctx, chatId);
  if (!session) {
    await deps.transport.send(chatId, REPLIES.settingsUnavailable);
    return "store_unavailable";
  }
  await deps.transport.send(
    chatId,
    describeSettings(session, deps.config),
    "markdown"
  );
  return "replied";
}

export async function selectModel(
  deps: RelayDeps,
  ctx: RequestContext,
  event: { chatId: ChatId; messageRef: string; callbackToken: string; data: string }
): Promise<RelayOutcome> {
  const { chatId, messageRef, callbackToken } = event;
  const model = event.data.startsWith(SET_MODEL_CALLBACK_PREFIX)
    ? event.data.slice(SET_MODEL_CALLBACK_PREFIX.length).trim()
    : "";

  if (!model) {
    await deps.transport.acknowledge(callbackToken, REPLIES.modelSelectionInvalid);
    return "rejected";
  }

  await deps.transport.acknowledge(callbackToken, settingModel(model));

  const session = await loadSettings(deps, ctx, chatId);
  if (!session) {
    await deps.transport.edit(messageRef, REPLIES.modelSettingsUnavailable);
    return "store_unavailable";
  }

  if (session.model === model) {
    await deps.transport.edit(messageRef, modelAlreadySet(model), "markdown");
    return "settings_unchanged";
  }

  const saved = await deps.settings.upsert(chatId, session.secret, model, 0);
  if (!saved) {
    await deps.transport.edit(messageRef, REPLIES.modelSaveFailed);
    return "failed";
  }
  if (!(await deps.history.clear(chatId))) {
    ctx.log.warn({ chatId, model }, "history not cleared after model change");
  }

  logEvent(ctx.log, EVENT_NAMES.RELAY_MODEL_CHANGED, {
    reqId: ctx.reqId,
    chatId,
    from: session.model,
    to: model,
  });
  await deps.transport.edit(messageRef, modelSet(model), "markdown");
  return "settings_updated";
}
