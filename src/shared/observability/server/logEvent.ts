// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Type-safe event logger that enforces the event name registry and base fields.
 * Scope: Single function for logging structured events. Does not create loggers.
 * Invariants: reqId MUST be present (throws under Vitest, logs an invariant line elsewhere); event name MUST be from registry.
 * Side-effects: IO (logging)
 * Links: Uses EVENT_NAMES registry from events/index.ts; called by features/relay services.
 * @public
 */

import type { Logger } from "pino";
import type { EventBase, EventName } from "../events";

export type EventLevel = "info" | "warn" | "error";

/**
 * @param fields - Event-specific fields (MUST include reqId)
 * @param message - Human-readable message (defaults to event name)
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message?: string,
  level: EventLevel = "info"
): void {
  if (!fields.reqId) {
    const isStrict =
      typeof process !== "undefined" && process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without reqId`
      );
    }
    logger.error(
      { event: eventName, missingField: "reqId" },
      "inv_missing_reqId_in_logEvent"
    );
    return;
  }

  logger[level]({ event: eventName, ...fields }, message ?? eventName);
}
