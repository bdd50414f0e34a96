// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/relay/drizzle-settings-store.adapter`
 * Purpose: Drizzle implementation of SettingsStorePort over chat_settings.
 * Scope: Reads, upserts and conditionally increments per-chat settings. Does not decide quota policy.
 * Invariants:
 *   - get() maps a missing row to defaults; connection failures throw StoreUnavailableError
 *   - upsert() never throws for store failures; returns false
 *   - incrementMessageCount() is a single INSERT ... ON CONFLICT DO UPDATE ... WHERE message_count < limit RETURNING
 * Side-effects: IO (database reads and writes)
 * Links: SettingsStorePort, shared/db/schema
 * @public
 */

import { eq, sql } from "drizzle-orm";
import type { Logger } from "pino";

import type { Database } from "@/adapters/server/db/client";
import { type ChatId, type ChatSession, defaultChatSession } from "@/core";
import {
  type IncrementResult,
  type SettingsStorePort,
  StoreUnavailableError,
} from "@/ports";
import { chatSettings } from "@/shared/db/schema";

export class DrizzleSettingsStoreAdapter implements SettingsStorePort {
  constructor(
    private readonly db: Database,
    private readonly defaultModel: string,
    private readonly log: Logger
  ) {}

  async get(chatId: ChatId): Promise<ChatSession> {
    let rows: { apiKey: string | null; model: string; messageCount: number }[];
    try {
      rows = await this.db
        .select({
          apiKey: chatSettings.apiKey,
          model: chatSettings.model,
          messageCount: chatSettings.messageCount,
        })
        .from(chatSettings)
        .where(eq(chatSettings.chatId, chatId))
        .limit(1);
    } catch (error) {
      throw new StoreUnavailableError("chat_settings", { cause: error });
    }

    const row = rows[0];
    if (!row) return defaultChatSession(chatId, this.defaultModel);

    return {
      chatId,
      secret: row.apiKey ?? undefined,
      model: row.model || this.defaultModel,
      messageCount: row.messageCount,
    };
  }

  async upsert(
    chatId: ChatId,
    secret: string | undefined,
    model: string,
    messageCount?: number
  ): Promise<boolean> {
    try {
      await this.db
        .insert(chatSettings)
        .values({
          chatId,
          apiKey: secret ?? null,
          model,
          messageCount: messageCount ?? 0,
        })
        .onConflictDoUpdate({
          target: chatSettings.chatId,
          set: {
            apiKey: secret ?? null,
            model,
            updatedAt: sql`now()`,
            ...(messageCount !== undefined ? { messageCount } : {}),
          },
        });
      return true;
    } catch (error) {
      this.log.warn({ err: error, chatId }, "chat_settings upsert failed");
      return false;
    }
  }

  async incrementMessageCount(
    chatId: ChatId,
    limit: number
  ): Promise<IncrementResult> {
    try {
      const rows = await this.db
        .insert(chatSettings)
        .values({
          chatId,
          apiKey: null,
          model: this.defaultModel,
          messageCount: 1,
        })
        .onConflictDoUpdate({
          target: chatSettings.chatId,
          set: {
            messageCount: sql`${chatSettings.messageCount} + 1`,
            updatedAt: sql`now()`,
          },
          setWhere: sql`${chatSettings.messageCount} < ${limit}`,
        })
        .returning({ messageCount: chatSettings.messageCount });

      const row = rows[0];
      if (!row) return { status: "limit_reached" };
      return { status: "incremented", count: row.messageCount };
    } catch (error) {
      this.log.warn(
        { err: error, chatId },
        "chat_settings message count increment failed"
      );
      return { status: "write_failed" };
    }
  }
}
