// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - events, logging, metrics, context.
 * Scope: Unified entry point for all observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports (structural typing only).
 * Side-effects: none
 * Links: Delegates to events, server, context submodules.
 * @public
 */

export type { Clock, RequestContext } from "./context";
export { createRequestContext } from "./context";
export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { Logger } from "./server";
export {
  logEvent,
  logInboundEnd,
  logInboundError,
  logInboundStart,
  makeLogger,
  makeNoopLogger,
  metricsRegistry,
  relayEventsTotal,
  relayHistorySavesTotal,
  relayProviderCallDurationMs,
  relayProviderErrorsTotal,
  relayQuotaDecisionsTotal,
} from "./server";
