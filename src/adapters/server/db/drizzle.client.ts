// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client configuration and connection management.
 * Scope: Database connection setup and Drizzle ORM instance. Does not handle business logic or migrations.
 * Invariants: Single database connection instance; configured with schema; lazy initialization
 * Side-effects: IO (database connections) - only on first access
 * Notes: postgres.js driver; connection string from serverEnv(); closeDb() releases the pool on shutdown.
 * Links: Used by adapters/server/relay stores
 * @internal
 */

import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "@/shared/db/schema";
import { serverEnv } from "@/shared/env";

export type Database = PostgresJsDatabase<typeof schema>;

let _sql: postgres.Sql | null = null;
let _db: Database | null = null;

function createDb(): Database {
  if (!_db) {
    const env = serverEnv();
    _sql = postgres(env.DATABASE_URL, {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: env.SERVICE_NAME,
      },
    });

    _db = drizzle(_sql, { schema });
  }
  return _db;
}

export const getDb = createDb;

export async function closeDb(): Promise<void> {
  const sql = _sql;
  _sql = null;
  _db = null;
  if (sql) {
    await sql.end({ timeout: 5 });
  }
}
