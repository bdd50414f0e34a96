// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Server-side logging and metrics utilities (pino, prom-client).
 * Scope: Logger factory, helpers, logEvent() wrapper and metrics. Does not define events.
 * Invariants: none
 * Side-effects: IO (logging to stdout)
 * Links: Uses event registry from ../events
 * @public
 */

export { logInboundEnd, logInboundError, logInboundStart } from "./helpers";
export { logEvent } from "./logEvent";
export type { Logger } from "./logger";
export { makeLogger, makeNoopLogger } from "./logger";
export {
  metricsRegistry,
  relayEventsTotal,
  relayHistorySavesTotal,
  relayProviderCallDurationMs,
  relayProviderErrorsTotal,
  relayQuotaDecisionsTotal,
} from "./metrics";
export { REDACT_PATHS } from "./redact";
