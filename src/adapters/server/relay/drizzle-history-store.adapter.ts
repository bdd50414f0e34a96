// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/relay/drizzle-history-store.adapter`
 * Purpose: Drizzle implementation of HistoryStorePort over chat_history.
 * Scope: Fetch, upsert-by-index and clear of turn rows. Does not assign turn indexes.
 * Invariants:
 *   - fetch() orders by turn_index ascending and applies the window after decoding
 *   - Malformed rows (bad JSON, non-array parts, unknown role) are skipped with a warning
 *   - append() writes parts as explicit ::jsonb so the column holds an array, not a string
 * Side-effects: IO (database reads and writes)
 * Links: HistoryStorePort, history-codec
 * @public
 */

import { asc, eq, sql } from "drizzle-orm";
import type { Logger } from "pino";

import type { Database } from "@/adapters/server/db/client";
import {
  type ChatId,
  type HistoryTurn,
  type Part,
  type TurnRole,
  windowHistory,
} from "@/core";
import { type HistoryStorePort, StoreUnavailableError } from "@/ports";
import { chatHistory } from "@/shared/db/schema";

import { decodeStoredTurn, encodeParts } from "./history-codec";

export class DrizzleHistoryStoreAdapter implements HistoryStorePort {
  constructor(
    private readonly db: Database,
    private readonly maxTurns: number,
    private readonly log: Logger
  ) {}

  async fetch(chatId: ChatId): Promise<HistoryTurn[]> {
    let rows: { turnIndex: number; role: string; parts: unknown }[];
    try {
      rows = await this.db
        .select({
          turnIndex: chatHistory.turnIndex,
          role: chatHistory.role,
          parts: chatHistory.parts,
        })
        .from(chatHistory)
        .where(eq(chatHistory.chatId, chatId))
        .orderBy(asc(chatHistory.turnIndex));
    } catch (error) {
      throw new StoreUnavailableError("chat_history", { cause: error });
    }

    const turns: HistoryTurn[] = [];
    for (const row of rows) {
      const decoded = decodeStoredTurn(row);
      if (!decoded.ok) {
        this.log.warn(
          { chatId, turnIndex: row.turnIndex, reason: decoded.reason },
          "skipping malformed history row"
        );
        continue;
      }
      if (decoded.skipped > 0) {
        this.log.warn(
          { chatId, turnIndex: row.turnIndex, skipped: decoded.skipped },
          "skipped unrecognized parts in history row"
        );
      }
      turns.push(decoded.turn);
    }

    return windowHistory(turns, this.maxTurns);
  }

  async append(
    chatId: ChatId,
    turnIndex: number,
    role: TurnRole,
    parts: Part[]
  ): Promise<boolean> {
    const encoded = encodeParts(parts);
    if (role === "user" && encoded.length === 0) {
      this.log.warn({ chatId, turnIndex }, "refusing to store empty user turn");
      return false;
    }

    const json = sql`${JSON.stringify(encoded)}::jsonb`;
    try {
      await this.db
        .insert(chatHistory)
        .values({ chatId, turnIndex, role, parts: json })
        .onConflictDoUpdate({
          target: [chatHistory.chatId, chatHistory.turnIndex],
          set: { role, parts: json },
        });
      return true;
    } catch (error) {
      this.log.warn({ err: error, chatId, turnIndex }, "history append failed");
      return false;
    }
  }

  async clear(chatId: ChatId): Promise<boolean> {
    try {
      await this.db.delete(chatHistory).where(eq(chatHistory.chatId, chatId));
      return true;
    } catch (error) {
      this.log.warn({ err: error, chatId }, "history clear failed");
      return false;
    }
  }
}
