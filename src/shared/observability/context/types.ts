// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Event-scoped context type for passing logger and clock through layers.
 * Scope: Define RequestContext interface. Does not implement context creation or lifecycle.
 * Invariants: log is a child logger with reqId, chatId, eventKind bound.
 * Side-effects: none
 * Links: Used by factory module; passed through all relay services.
 * @public
 */

import type { Logger } from "pino";

/**
 * Minimal clock interface for timestamp generation.
 * Structural typing - any object with now() satisfies this (including ports/Clock).
 */
export interface Clock {
  now(): string;
}

export interface RequestContext {
  log: Logger; // Child logger with reqId, chatId, eventKind
  reqId: string; // Correlation ID for one inbound event
  clock: Clock;
}
