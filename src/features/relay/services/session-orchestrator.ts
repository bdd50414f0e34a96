// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/session-orchestrator`
 * Purpose: Per-message state machine: secret entry when a prompt is pending, otherwise a gated conversation turn.
 * Scope: Pending-flag consumption, input validation, settings load, quota gate, secret resolution, media fetch. Does not parse commands.
 * Invariants:
 *   - The pending flag is consumed atomically when a text message arrives; the message that consumes it is never sent to the provider
 *   - Empty input is rejected before any store or provider call
 *   - Quota is consumed before the provider call and never returned
 *   - Unexpected errors end in one apology reply and a logged event, never a rethrow
 * Side-effects: IO (via ports)
 * Links: services/secret-entry, services/quota-gate, services/conversation-turn
 * @public
 */

import {
  assembleInputParts,
  type ChatId,
  type ChatSession,
  inferImageMimeType,
  type Part,
} from "@/core";
import { isStoreUnavailableError } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { REPLIES } from "../replies";
import type { RelayDeps, RelayOutcome, UserInput } from "../types";
import { runConversationTurn } from "./conversation-turn";
import {
  checkAndConsumeQuota,
  quotaDenialText,
  quotaNoticeText,
} from "./quota-gate";
import { handleSecretEntry } from "./secret-entry";

export async function handleUserMessage(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId,
  input: UserInput
): Promise<RelayOutcome> {
  try {
    return await routeUserMessage(deps, ctx, chatId, input);
  } catch (error) {
    if (isStoreUnavailableError(error)) {
      logEvent(
        ctx.log,
        EVENT_NAMES.RELAY_STORE_UNAVAILABLE,
        { reqId: ctx.reqId, chatId, store: error.store, err: error },
        undefined,
        "error"
      );
      await deps.transport.send(chatId, REPLIES.storeUnavailable);
      return "store_unavailable";
    }
    logEvent(
      ctx.log,
      EVENT_NAMES.RELAY_UNHANDLED_ERROR,
      { reqId: ctx.reqId, chatId, err: error },
      undefined,
      "error"
    );
    await deps.transport.send(chatId, REPLIES.unexpectedError);
    return "failed";
  }
}

async function routeUserMessage(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId,
  input: UserInput
): Promise<RelayOutcome> {
  // Only text answers a pending secret prompt; photos leave it armed.
  if (!input.fileRef && (await deps.pending.consume(chatId))) {
    return handleSecretEntry(deps, ctx, chatId, input.text);
  }

  if (!input.text?.trim() && !input.fileRef) {
    await deps.transport.send(chatId, REPLIES.emptyMessage);
    return "rejected";
  }

  let session: ChatSession;
  try {
    session = await deps.settings.get(chatId);
  } catch (error) {
    if (!isStoreUnavailableError(error)) throw error;
    logEvent(
      ctx.log,
      EVENT_NAMES.RELAY_STORE_UNAVAILABLE,
      { reqId: ctx.reqId, chatId, store: error.store },
      undefined,
      "error"
    );
    await deps.transport.send(chatId, REPLIES.settingsUnavailable);
    return "store_unavailable";
  }

  const { messageLimit } = deps.config;
  const decision = await checkAndConsumeQuota(
    deps.settings,
    session,
    messageLimit,
    ctx
  );
  if (!decision.allowed) {
    await deps.transport.send(
      chatId,
      quotaDenialText(decision.reason, messageLimit),
      "markdown"
    );
    return "quota_denied";
  }
  if (decision.notice) {
    await deps.transport.send(
      chatId,
      quotaNoticeText(decision.notice, messageLimit),
      "markdown"
    );
  }

  const secret = session.secret ?? deps.config.sharedSecret;
  if (!secret) {
    logEvent(
      ctx.log,
      EVENT_NAMES.RELAY_PROVIDER_NOT_CONFIGURED,
      { reqId: ctx.reqId, chatId },
      undefined,
      "warn"
    );
    await deps.transport.send(chatId, REPLIES.providerNotConfigured, "markdown");
    return "not_configured";
  }

  const parts = await loadInputParts(deps, ctx, input);
  if (!parts) {
    await deps.transport.send(chatId, REPLIES.imageError);
    return "failed";
  }

  return runConversationTurn(deps, ctx, { session, secret, parts });
}

/** Fetch the image (if any) and assemble the part list. Undefined when the media download fails. */
async function loadInputParts(
  deps: RelayDeps,
  ctx: RequestContext,
  input: UserInput
): Promise<Part[] | undefined> {
  if (!input.fileRef) {
    return assembleInputParts({ text: input.text });
  }

  try {
    const file = await deps.transport.getBinary(input.fileRef);
    return assembleInputParts({
      text: input.text,
      image: { mimeType: inferImageMimeType(file.filePath), data: file.data },
    });
  } catch (error) {
    ctx.log.error({ err: error, fileRef: input.fileRef }, "media download failed");
    return undefined;
  }
}
