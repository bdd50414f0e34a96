// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/pending-input.port`
 * Purpose: Port interface for the per-chat "awaiting secret value" flag.
 * Scope: Defines PendingInputPort. Does not contain implementations.
 * Invariants:
 *   - consume() is atomic: of two concurrent callers at most one sees true
 *   - Expired entries behave as absent
 * Side-effects: none
 * Links: adapters/server/relay/drizzle-pending-input.adapter, features/relay/services/session-orchestrator
 * @public
 */

import type { ChatId } from "@/core";

export interface PendingInputPort {
  /** Mark the chat as awaiting a secret for ttlSeconds. Replaces any existing entry. */
  begin(chatId: ChatId, ttlSeconds: number): Promise<void>;

  /** Remove a live entry. True when one was present. */
  consume(chatId: ChatId): Promise<boolean>;

  /** Same removal as consume(); kept separate so callers read by intent. */
  cancel(chatId: ChatId): Promise<boolean>;
}
