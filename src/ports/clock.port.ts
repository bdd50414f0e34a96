// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time abstraction for deterministic testing.
 * Scope: Provides current time as ISO string and epoch milliseconds. Does not handle timezone conversion.
 * Invariants: now() and epochMs() describe the same instant for a single clock reading
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/time and tests/_fakes; used by pending-input stores and relay services
 * @public
 */

export interface Clock {
  /** Current time as ISO 8601 string */
  now(): string;
  /** Current time in milliseconds since the epoch (TTL math, durations) */
  epochMs(): number;
}
