// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/settings-store.port`
 * Purpose: Port interface for durable per-chat settings (secret, model, shared-secret message counter).
 * Scope: Defines SettingsStorePort, IncrementResult, and StoreUnavailableError. Does not contain implementations.
 * Invariants:
 *   - get() never reports "not found"; absent rows read as defaults
 *   - upsert() returns false on store failure instead of throwing
 *   - incrementMessageCount() is one conditional write; concurrent callers cannot push the count past limit
 * Side-effects: none
 * Links: adapters/server/relay/drizzle-settings-store.adapter, features/relay/services/quota-gate
 * @public
 */

import type { ChatId, ChatSession } from "@/core";

/**
 * Port-level error thrown when a durable store cannot be reached.
 * Read paths throw this; write paths report failure through their return value.
 */
export class StoreUnavailableError extends Error {
  constructor(
    public readonly store: string,
    options?: { cause?: unknown }
  ) {
    super(`Store unavailable: ${store}`, options);
    this.name = "StoreUnavailableError";
  }
}

export function isStoreUnavailableError(
  error: unknown
): error is StoreUnavailableError {
  return error instanceof Error && error.name === "StoreUnavailableError";
}

export type IncrementResult =
  | { status: "incremented"; count: number }
  | { status: "limit_reached" }
  | { status: "write_failed" };

export interface SettingsStorePort {
  /** Throws StoreUnavailableError when the store cannot be reached. */
  get(chatId: ChatId): Promise<ChatSession>;

  /**
   * Writes secret and model unconditionally; messageCount only when supplied.
   * Returns false on store failure. No rollback of earlier writes is implied.
   */
  upsert(
    chatId: ChatId,
    secret: string | undefined,
    model: string,
    messageCount?: number
  ): Promise<boolean>;

  /**
   * Increment the shared-secret counter if it is below limit.
   * Creates the row with count 1 when absent.
   */
  incrementMessageCount(chatId: ChatId, limit: number): Promise<IncrementResult>;
}
