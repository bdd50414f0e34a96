// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/model-catalog`
 * Purpose: /list_models and /select_model over the provider's model list for the chat's active secret.
 * Scope: Fetches names, renders a list or set_model choice buttons. Does not change settings; the set_model callback does.
 * Invariants:
 *   - Every choice's data fits the transport's callback budget; longer ones are skipped
 *   - Only provider errors become a reply; anything else propagates to the dispatcher
 * Side-effects: IO (settings store, provider, transport)
 * Links: services/settings-commands (selectModel), services/dispatch-event
 * @public
 */

import type { ChatId } from "@/core";
import { isProviderError, type ReplyChoice } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { modelList, REPLIES } from "../replies";
import type { RelayDeps, RelayOutcome } from "../types";
import { loadSettings, SET_MODEL_CALLBACK_PREFIX } from "./settings-commands";

export const MAX_CALLBACK_DATA_BYTES = 64;
const MAX_CHOICE_LABEL_LENGTH = 30;

type ModelNames =
  | { ok: true; names: string[] }
  | { ok: false; outcome: RelayOutcome };

export function displayModelName(name: string): string {
  return name.replace("models/", "");
}

export function modelChoices(names: string[]): ReplyChoice[] {
  const encoder = new TextEncoder();
  return names.flatMap((name) => {
    const data = `${SET_MODEL_CALLBACK_PREFIX}${name}`;
    if (encoder.encode(data).length > MAX_CALLBACK_DATA_BYTES) return [];
    const display = displayModelName(name);
    const label =
      display.length > MAX_CHOICE_LABEL_LENGTH
        ? `${display.slice(0, MAX_CHOICE_LABEL_LENGTH - 3)}...`
        : display;
    return [{ label, data }];
  });
}

async function fetchModelNames(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<ModelNames> {
  const session = await loadSettings(deps, ctx, chatId);
  if (!session) {
    await deps.transport.send(chatId, REPLIES.settingsUnavailable);
    return { ok: false, outcome: "store_unavailable" };
  }

  const secret = session.secret ?? deps.config.sharedSecret;
  if (!secret) {
    await deps.transport.send(chatId, REPLIES.providerNotConfigured, "markdown");
    return { ok: false, outcome: "not_configured" };
  }

  let names: string[];
  try {
    names = await deps.provider.listModels(secret);
  } catch (error) {
    if (!isProviderError(error)) throw error;
    logEvent(
      ctx.log,
      EVENT_NAMES.RELAY_MODEL_LIST_FAILED,
      { reqId: ctx.reqId, chatId, err: error },
      undefined,
      "warn"
    );
    await deps.transport.send(chatId, REPLIES.modelListUnavailable, "markdown");
    return { ok: false, outcome: "provider_error" };
  }

  logEvent(ctx.log, EVENT_NAMES.RELAY_MODELS_LISTED, {
    reqId: ctx.reqId,
    chatId,
    count: names.length,
  });
  if (names.length === 0) {
    await deps.transport.send(chatId, REPLIES.modelListEmpty);
    return { ok: false, outcome: "rejected" };
  }
  return { ok: true, names };
}

export async function listModels(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<RelayOutcome> {
  const fetched = await fetchModelNames(deps, ctx, chatId);
  if (!fetched.ok) return fetched.outcome;

  await deps.transport.send(
    chatId,
    modelList(fetched.names.map(displayModelName)),
    "markdown"
  );
  return "replied";
}

export async function offerModelChoices(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId
): Promise<RelayOutcome> {
  const fetched = await fetchModelNames(deps, ctx, chatId);
  if (!fetched.ok) return fetched.outcome;

  const choices = modelChoices(fetched.names);
  if (choices.length === 0) {
    await deps.transport.send(chatId, REPLIES.modelChoicesEmpty);
    return "rejected";
  }
  await deps.transport.sendChoices(chatId, REPLIES.modelChoicePrompt, choices);
  return "replied";
}
