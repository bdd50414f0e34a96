// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db`
 * Purpose: Barrel export for database schema and URL construction utilities.
 * Scope: Exposes database schema and URL construction utilities. Does not handle connections or migrations.
 * Invariants: Only re-exports public APIs
 * Side-effects: none
 * Links: Used by adapters for database operations
 * @public
 */

export { buildDatabaseUrl, type DbEnvInput, describeDatabaseUrl } from "./db-url";
export { chatHistory, chatSettings, pendingInputs } from "./schema";
