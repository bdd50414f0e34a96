// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/db-url`
 * Purpose: Database URL construction and log-safe rendering for PostgreSQL connections.
 * Scope: Builds DATABASE_URL from env pieces; strips credentials for logs. Safe for both app runtime and drizzle.config.ts. Does not open connections.
 * Invariants: Pure functions; no zod; strictly requires POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB, DB_HOST.
 * Side-effects: none
 * Links: shared/env/server, adapters/server/db/drizzle.client, drizzle.config.ts
 * @public
 */

export interface DbEnvInput {
  POSTGRES_USER?: string | undefined;
  POSTGRES_PASSWORD?: string | undefined;
  POSTGRES_DB?: string | undefined;
  DB_HOST?: string | undefined;
  DB_PORT?: string | number | undefined;
}

export function buildDatabaseUrl(env: DbEnvInput): string {
  const { POSTGRES_USER: user, POSTGRES_PASSWORD: password } = env;
  const { POSTGRES_DB: db, DB_HOST: host } = env;
  const port =
    typeof env.DB_PORT === "number"
      ? env.DB_PORT
      : Number(env.DB_PORT ?? "5432");

  if (!user || !password || !db) {
    throw new TypeError(
      "Missing required DB env vars: POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB"
    );
  }
  if (!host) {
    throw new TypeError("Missing required DB env var: DB_HOST");
  }
  if (!Number.isFinite(port)) {
    throw new TypeError(`Invalid DB_PORT value: ${env.DB_PORT}`);
  }

  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${db}`;
}

/** host:port/db only; never the credentials. */
export function describeDatabaseUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.hostname}:${parsed.port || "5432"}${parsed.pathname}`;
  } catch {
    return "<unparseable DATABASE_URL>";
  }
}
