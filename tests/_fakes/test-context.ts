// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/test-context`
 * Purpose: Reusable test RequestContext factory to eliminate boilerplate.
 * Scope: Provides makeTestCtx() for all tests requiring RequestContext parameter. Does not replace real logger in production code.
 * Invariants: Uses makeNoopLogger() and FakeClock; reqId auto-generated if not provided.
 * Side-effects: none
 * Links: Used by relay service tests.
 * @public
 */

import { makeNoopLogger, type RequestContext } from "@/shared/observability";
import { FakeClock } from "./fake-clock";

export interface TestCtxOptions {
  reqId?: string;
  clockTime?: string;
}

export function makeTestCtx(options: TestCtxOptions = {}): RequestContext {
  const clock = new FakeClock(options.clockTime ?? "2025-01-01T00:00:00.000Z");

  return {
    log: makeNoopLogger(),
    reqId: options.reqId ?? `test-req-${Date.now()}`,
    clock,
  };
}
