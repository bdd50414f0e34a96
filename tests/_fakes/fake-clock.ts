// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-clock`
 * Purpose: Deterministic Clock for pending-input TTL and request timestamps.
 * Scope: Time moves only through advance(). Does NOT replace the global Date.
 * Invariants: now() and epochMs() always describe the same instant
 * Side-effects: none
 * Links: ports/clock.port
 * @public
 */

import type { Clock } from "@/ports";

export const FAKE_CLOCK_START = "2024-01-01T00:00:00.000Z";

export class FakeClock implements Clock {
  private ms: number;

  constructor(start: string = FAKE_CLOCK_START) {
    this.ms = Date.parse(start);
  }

  now(): string {
    return new Date(this.ms).toISOString();
  }

  epochMs(): number {
    return this.ms;
  }

  /** Move time forward; TTL checks compare against epochMs(). */
  advance(milliseconds: number): void {
    this.ms += milliseconds;
  }
}
