// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys. Masked secrets are logged under `secretMasked`, which is not listed.
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  "candidateSecret",
  "PROVIDER_DEFAULT_API_KEY",
  "POSTGRES_PASSWORD",
  "DATABASE_URL",
  "*.secret",
  "*.apiKey",
  "session.secret",
  "headers.authorization",
  "headers.x-goog-api-key",
];
