// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/history-store.port`
 * Purpose: Port interface for the durable, turn-indexed conversation log.
 * Scope: Defines HistoryStorePort. Does not contain implementations or part encoding.
 * Invariants:
 *   - fetch() returns turns ascending by turnIndex, windowed to the most recent turns
 *   - append() on an existing (chatId, turnIndex) overwrites in place
 *   - append() rejects a user turn with no encodable parts
 * Side-effects: none
 * Links: adapters/server/relay/drizzle-history-store.adapter
 * @public
 */

import type { ChatId, HistoryTurn, Part, TurnRole } from "@/core";

export interface HistoryStorePort {
  /** Throws StoreUnavailableError when the store cannot be reached. */
  fetch(chatId: ChatId): Promise<HistoryTurn[]>;

  /** Upsert one turn. Returns false when nothing was written. */
  append(
    chatId: ChatId,
    turnIndex: number,
    role: TurnRole,
    parts: Part[]
  ): Promise<boolean>;

  /** Delete every turn of the chat. */
  clear(chatId: ChatId): Promise<boolean>;
}
