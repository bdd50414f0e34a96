// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/dispatch-event`
 * Purpose: Route one inbound chat event to its handler under an event-scoped request context.
 * Scope: Context creation, lifecycle logging, routing, metrics, last-resort apology. Does not hold per-chat state.
 * Invariants:
 *   - Exactly one start and one end (or error) log line per event
 *   - Never rejects; failures end as a logged error plus a best-effort apology
 * Side-effects: IO (via handlers), metrics
 * Links: services/session-orchestrator, services/settings-commands, bootstrap/container
 * @public
 */

import type { Logger } from "pino";

import type { Clock } from "@/ports";
import {
  createRequestContext,
  EVENT_NAMES,
  logEvent,
  logInboundEnd,
  logInboundError,
  logInboundStart,
  type RequestContext,
  relayEventsTotal,
} from "@/shared/observability";

import { REPLIES } from "../replies";
import type { InboundEvent, RelayDeps, RelayOutcome } from "../types";
import { listModels, offerModelChoices } from "./model-catalog";
import { handleUserMessage } from "./session-orchestrator";
import {
  beginSecretEntry,
  cancelSecretEntry,
  clearSecret,
  resetHistory,
  selectModel,
  sendHelp,
  showSettings,
} from "./settings-commands";

export interface DispatchContextDeps {
  baseLog: Logger;
  clock: Clock;
}

async function routeCommand(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: number,
  command: string
): Promise<RelayOutcome> {
  switch (command.toLowerCase()) {
    case "start":
    case "help":
      return sendHelp(deps, chatId);
    case "reset":
      return resetHistory(deps, ctx, chatId);
    case "set_api_key":
      return beginSecretEntry(deps, ctx, chatId);
    case "cancel":
      return cancelSecretEntry(deps, chatId);
    case "clear_api_key":
      return clearSecret(deps, ctx, chatId);
    case "current_settings":
      return showSettings(deps, ctx, chatId);
    case "list_models":
      return listModels(deps, ctx, chatId);
    case "select_model":
      return offerModelChoices(deps, ctx, chatId);
    default:
      await deps.transport.send(chatId, REPLIES.unknownCommand, "markdown");
      return "rejected";
  }
}

async function route(
  deps: RelayDeps,
  ctx: RequestContext,
  event: InboundEvent
): Promise<RelayOutcome> {
  switch (event.kind) {
    case "text":
      return handleUserMessage(deps, ctx, event.chatId, { text: event.text });
    case "photo":
      return handleUserMessage(deps, ctx, event.chatId, {
        text: event.caption,
        fileRef: event.fileRef,
      });
    case "command":
      return routeCommand(deps, ctx, event.chatId, event.command);
    case "callback":
      return selectModel(deps, ctx, event);
    case "unsupported":
      await deps.transport.send(event.chatId, REPLIES.unsupportedContent);
      return "rejected";
  }
}

export async function dispatchInboundEvent(
  deps: RelayDeps,
  contextDeps: DispatchContextDeps,
  event: InboundEvent
): Promise<RelayOutcome> {
  const ctx = createRequestContext(contextDeps, {
    chatId: event.chatId,
    eventKind: event.kind,
    reqId: event.reqId,
  });
  const startedAt = contextDeps.clock.epochMs();
  logInboundStart(ctx.log);

  let outcome: RelayOutcome;
  try {
    outcome = await route(deps, ctx, event);
  } catch (error) {
    outcome = "failed";
    logInboundError(ctx.log, error, "unhandled_error");
    logEvent(
      ctx.log,
      EVENT_NAMES.RELAY_UNHANDLED_ERROR,
      { reqId: ctx.reqId, chatId: event.chatId, eventKind: event.kind },
      undefined,
      "error"
    );
    try {
      await deps.transport.send(event.chatId, REPLIES.unexpectedError);
    } catch (sendError) {
      ctx.log.error({ err: sendError }, "apology not delivered");
    }
  }

  relayEventsTotal.inc({ kind: event.kind, outcome });
  logInboundEnd(ctx.log, {
    outcome,
    durationMs: contextDeps.clock.epochMs() - startedAt,
  });
  return outcome;
}
