// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports for runtime dependency injection. Does not handle event-scoped lifecycle or own the chat transport.
 * Invariants: All ports wired; single container instance per process; no database connection in test mode.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire in-memory stores and FakeAiProviderAdapter.
 * Links: Used by src/index.ts; configure adapters here for DI.
 * @public
 */

import type { Logger } from "pino";

import {
  DrizzleHistoryStoreAdapter,
  DrizzlePendingInputAdapter,
  DrizzleSettingsStoreAdapter,
  GenAiProviderAdapter,
  getDb,
  SystemClock,
} from "@/adapters/server";
import {
  FakeAiProviderAdapter,
  InMemoryHistoryStoreAdapter,
  InMemoryPendingInputAdapter,
  InMemorySettingsStoreAdapter,
} from "@/adapters/test";
import type { RelayConfig, RelayDeps } from "@/features/relay/public";
import type { Clock } from "@/ports";
import { describeDatabaseUrl } from "@/shared/db";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

/** Everything the relay needs except the transport, which the caller supplies per event. */
export type RelayPorts = Omit<RelayDeps, "transport">;

export interface Container {
  log: Logger;
  clock: Clock;
  relay: RelayPorts;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ component: "container" });
  const clock = new SystemClock();

  // Startup log - no URLs or secrets
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      sharedSecretConfigured: Boolean(env.PROVIDER_DEFAULT_API_KEY),
      defaultModel: env.DEFAULT_MODEL,
      messageLimit: env.DEFAULT_KEY_MESSAGE_LIMIT,
    },
    "container initialized"
  );

  const config: RelayConfig = {
    defaultModel: env.DEFAULT_MODEL,
    sharedSecret: env.PROVIDER_DEFAULT_API_KEY,
    messageLimit: env.DEFAULT_KEY_MESSAGE_LIMIT,
    pendingInputTtlSeconds: env.PENDING_INPUT_TTL_SECONDS,
  };

  // Environment-based adapter wiring - single source of truth
  if (env.isTestMode) {
    return {
      log,
      clock,
      relay: {
        settings: new InMemorySettingsStoreAdapter(env.DEFAULT_MODEL),
        history: new InMemoryHistoryStoreAdapter(env.MAX_HISTORY_LENGTH_TURNS),
        pending: new InMemoryPendingInputAdapter(clock),
        provider: new FakeAiProviderAdapter(),
        config,
      },
    };
  }

  log.info({ database: describeDatabaseUrl(env.DATABASE_URL) }, "using postgres stores");
  const db = getDb();
  return {
    log,
    clock,
    relay: {
      settings: new DrizzleSettingsStoreAdapter(
        db,
        env.DEFAULT_MODEL,
        log.child({ component: "settings-store" })
      ),
      history: new DrizzleHistoryStoreAdapter(
        db,
        env.MAX_HISTORY_LENGTH_TURNS,
        log.child({ component: "history-store" })
      ),
      pending: new DrizzlePendingInputAdapter(db, clock),
      provider: new GenAiProviderAdapter(
        {
          timeoutMs: env.PROVIDER_TIMEOUT_MS,
          clientCacheSize: env.PROVIDER_CLIENT_CACHE_SIZE,
        },
        log.child({ component: "genai-provider" })
      ),
      config,
    },
  };
}
