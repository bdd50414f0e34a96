// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and relay metric definitions.
 * Scope: Shared observability singleton. Provides metrics registry and recording helpers. Does not expose a scrape endpoint.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (never chatId or model names from users).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors across test reloads.
 * Links: Consumed by features/relay services.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

// Singleton via globalThis to survive test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: "convo-relay",
    env: process.env.DEPLOY_ENVIRONMENT ?? "local",
  });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: labelNames as T[],
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames: labelNames as T[],
    buckets,
    registers: [metricsRegistry],
  });
}

// =============================================================================
// Inbound events
// =============================================================================

export const relayEventsTotal = getOrCreateCounter(
  "relay_events_total",
  "Inbound chat events by kind and outcome",
  ["kind", "outcome"] as const
);

// =============================================================================
// Quota
// =============================================================================

export const relayQuotaDecisionsTotal = getOrCreateCounter(
  "relay_quota_decisions_total",
  "Shared-secret quota decisions",
  ["decision"] as const
);

// =============================================================================
// Provider
// =============================================================================

export const relayProviderCallDurationMs = getOrCreateHistogram(
  "relay_provider_call_duration_ms",
  "Provider send() duration in milliseconds",
  ["outcome"] as const,
  [100, 500, 1000, 2500, 5000, 10000, 30000, 60000]
);

export const relayProviderErrorsTotal = getOrCreateCounter(
  "relay_provider_errors_total",
  "Provider failures by classified kind",
  ["kind"] as const
);

// =============================================================================
// History
// =============================================================================

export const relayHistorySavesTotal = getOrCreateCounter(
  "relay_history_saves_total",
  "History reconciliation outcomes after a provider exchange",
  ["plan", "result"] as const
);
