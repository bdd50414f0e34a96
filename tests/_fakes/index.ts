// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Barrel export of test fakes for deterministic unit testing.
 * Scope: Re-exports fake implementations for testing. Does NOT export real implementations.
 * Invariants: No circular dependencies.
 * Side-effects: none
 * Notes: Import fakes from here to replace I/O and time in unit tests.
 * Links: tests/setup.ts
 * @public
 */

export { FakeClock } from "./fake-clock";
export { RecordingTransport, type SentMessage } from "./recording-transport";
export {
  makeTestRelay,
  TEST_MODEL,
  TEST_SHARED_SECRET,
  type TestRelay,
} from "./relay-deps";
export { makeTestCtx, type TestCtxOptions } from "./test-context";
