// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/helpers`
 * Purpose: Standardized start/end/error log lines for each inbound chat event.
 * Scope: Consistent keys for event lifecycle logging. Does not handle domain-specific events.
 * Invariants: Same keys everywhere (reqId, chatId, eventKind, outcome, durationMs).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Links: features/relay/services/dispatch-event
 * @public
 */

import type { Logger } from "pino";

export function logInboundStart(log: Logger): void {
  log.info("inbound event received");
}

/**
 * @param log - Event-scoped child logger (reqId, chatId, eventKind bound)
 */
export function logInboundEnd(
  log: Logger,
  meta: { outcome: string; durationMs: number }
): void {
  log.info(
    { outcome: meta.outcome, durationMs: meta.durationMs },
    "inbound event complete"
  );
}

export function logInboundError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "inbound event failed");
}
