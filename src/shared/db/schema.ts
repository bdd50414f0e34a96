// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema`
 * Purpose: Drizzle schema for relay session settings, turn history, and pending secret entry.
 * Scope: Defines chat_settings, chat_history and pending_inputs. Does not contain query logic.
 * Invariants:
 *   - chat_history PK (chat_id, turn_index) is the upsert target for append
 *   - chat_settings.message_count >= 0 (CHECK)
 *   - pending_inputs holds at most one row per chat; expires_at bounds its life
 * Side-effects: none (schema definitions only)
 * Notes: parts is JSONB holding an encoded part array, or a JSON string of one on legacy rows.
 * Links: adapters/server/relay/*, drizzle.config.ts
 * @public
 */

import { sql } from "drizzle-orm";
import {
  bigint,
  check,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const chatSettings = pgTable(
  "chat_settings",
  {
    chatId: bigint("chat_id", { mode: "number" }).primaryKey(),
    /** Custom provider secret; null means the shared secret applies */
    apiKey: text("api_key"),
    model: text("model").notNull(),
    /** Messages sent on the shared secret since the last secret/model change */
    messageCount: integer("message_count").notNull().default(0),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    check("chat_settings_message_count_nonneg", sql`${table.messageCount} >= 0`),
  ]
);

export const chatHistory = pgTable(
  "chat_history",
  {
    chatId: bigint("chat_id", { mode: "number" }).notNull(),
    turnIndex: integer("turn_index").notNull(),
    role: text("role").notNull(),
    parts: jsonb("parts_json").$type<unknown>(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.chatId, table.turnIndex] }),
    index("chat_history_chat_turn_desc_idx").on(
      table.chatId,
      table.turnIndex.desc()
    ),
  ]
);

export const pendingInputs = pgTable("pending_inputs", {
  chatId: bigint("chat_id", { mode: "number" }).primaryKey(),
  kind: text("kind").notNull().default("awaiting_secret"),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
});
