// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/conversation-turn`
 * Purpose: One provider exchange for an assembled part list: seed history, send, reconcile, reply.
 * Scope: Runs after settings, quota and secret resolution. Does not consume quota or decide which secret applies.
 * Invariants:
 *   - Same routine for text and photo input
 *   - New turns are indexed from the last fetched turn, never from the windowed length
 *   - Persistence follows provider history growth (>=2 user+model, 1 user only, else nothing)
 *   - The reply is sent whatever the persistence result
 * Side-effects: IO (history store, provider, transport), metrics
 * Links: core/chat/rules (planHistorySave, nextTurnIndex), services/provider-error-classifier, services/reply-text
 * @public
 */

import {
  type ChatId,
  type ChatSession,
  type HistorySavePlan,
  type HistoryTurn,
  nextTurnIndex,
  type Part,
  planHistorySave,
} from "@/core";
import {
  isStoreUnavailableError,
  type ProviderResponse,
  type ProviderSession,
  type ProviderTurn,
} from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
  relayHistorySavesTotal,
  relayProviderCallDurationMs,
  relayProviderErrorsTotal,
} from "@/shared/observability";

import { REPLIES } from "../replies";
import type { RelayDeps, RelayOutcome } from "../types";
import {
  classifyBlockedResponse,
  classifyProviderError,
} from "./provider-error-classifier";
import { deriveReplyText, hasReplyText } from "./reply-text";

export interface ConversationTurnInput {
  session: ChatSession;
  /** Resolved secret: the chat's own or the shared one */
  secret: string;
  parts: Part[];
}

export async function runConversationTurn(
  deps: RelayDeps,
  ctx: RequestContext,
  input: ConversationTurnInput
): Promise<RelayOutcome> {
  const log = ctx.log.child({ feature: "relay.conversation_turn" });
  const { session, parts } = input;
  const chatId = session.chatId;

  let history: HistoryTurn[];
  try {
    history = await deps.history.fetch(chatId);
  } catch (error) {
    if (!isStoreUnavailableError(error)) throw error;
    logEvent(
      log,
      EVENT_NAMES.RELAY_STORE_UNAVAILABLE,
      { reqId: ctx.reqId, chatId, store: error.store },
      undefined,
      "error"
    );
    await deps.transport.send(chatId, REPLIES.historyUnavailable);
    return "store_unavailable";
  }

  const seed: ProviderTurn[] = history.map((turn) => ({
    role: turn.role,
    parts: turn.parts,
  }));

  let providerSession: ProviderSession;
  try {
    providerSession = await deps.provider.createSession({
      secret: input.secret,
      model: session.model,
      history: seed,
    });
  } catch (error) {
    return replyWithProviderError(deps, ctx, chatId, session.model, error);
  }

  const startedAt = performance.now();
  let response: ProviderResponse;
  try {
    response = await providerSession.send(parts);
  } catch (error) {
    relayProviderCallDurationMs.observe(
      { outcome: "error" },
      performance.now() - startedAt
    );
    return replyWithProviderError(deps, ctx, chatId, session.model, error);
  }
  const durationMs = performance.now() - startedAt;
  relayProviderCallDurationMs.observe({ outcome: "success" }, durationMs);
  logEvent(log, EVENT_NAMES.RELAY_PROVIDER_CALL_COMPLETED, {
    reqId: ctx.reqId,
    chatId,
    model: session.model,
    durationMs: Math.round(durationMs),
    candidates: response.candidates.length,
  });

  const plan = planHistorySave(
    seed.length,
    providerSession.history(),
    nextTurnIndex(history)
  );
  await persistTurns(deps, ctx, chatId, parts, plan);

  if (response.blockReason && !hasReplyText(response)) {
    const blocked = classifyBlockedResponse(response.blockReason);
    relayProviderErrorsTotal.inc({ kind: blocked.kind });
    await deps.transport.send(chatId, blocked.message, "markdown");
    return "blocked";
  }

  await deps.transport.send(chatId, deriveReplyText(response), "markdown");
  return "replied";
}

async function replyWithProviderError(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId,
  model: string,
  error: unknown
): Promise<RelayOutcome> {
  const classified = classifyProviderError(error, model);
  relayProviderErrorsTotal.inc({ kind: classified.kind });
  logEvent(
    ctx.log,
    EVENT_NAMES.RELAY_PROVIDER_ERROR,
    { reqId: ctx.reqId, chatId, kind: classified.kind, model, err: error },
    undefined,
    classified.kind === "unknown" ? "error" : "warn"
  );
  await deps.transport.send(chatId, classified.message, "markdown");
  return "provider_error";
}

async function persistTurns(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId,
  userParts: Part[],
  plan: HistorySavePlan
): Promise<void> {
  if (plan.kind === "nothing") {
    relayHistorySavesTotal.inc({ plan: plan.kind, result: plan.reason });
    logEvent(
      ctx.log,
      EVENT_NAMES.RELAY_HISTORY_SAVE_SKIPPED,
      { reqId: ctx.reqId, chatId, reason: plan.reason },
      undefined,
      "warn"
    );
    return;
  }

  const userSaved = await deps.history.append(
    chatId,
    plan.userIndex,
    "user",
    userParts
  );
  const modelSaved =
    plan.kind === "user_and_model"
      ? await deps.history.append(chatId, plan.modelIndex, "model", plan.modelParts)
      : true;

  if (plan.kind === "user_only") {
    // Provider added the user turn but no model turn (safety block)
    ctx.log.warn({ chatId, turnIndex: plan.userIndex }, "model turn missing");
  }

  const ok = userSaved && modelSaved;
  relayHistorySavesTotal.inc({ plan: plan.kind, result: ok ? "saved" : "failed" });
  logEvent(
    ctx.log,
    ok ? EVENT_NAMES.RELAY_HISTORY_SAVED : EVENT_NAMES.RELAY_HISTORY_SAVE_FAILED,
    {
      reqId: ctx.reqId,
      chatId,
      plan: plan.kind,
      userIndex: plan.userIndex,
      userSaved,
      modelSaved,
    },
    undefined,
    ok ? "info" : "error"
  );
}
