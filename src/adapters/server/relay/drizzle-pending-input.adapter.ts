// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/relay/drizzle-pending-input.adapter`
 * Purpose: Drizzle implementation of PendingInputPort over pending_inputs.
 * Scope: Begin, consume and cancel the awaiting-secret flag. Does not interpret the consumed message.
 * Invariants:
 *   - consume()/cancel() are one DELETE ... RETURNING; only the caller that deleted a live row sees true
 *   - An expired row is deleted on consume and reported as absent
 * Side-effects: IO (database reads and writes)
 * Links: PendingInputPort
 * @public
 */

import { eq } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { ChatId } from "@/core";
import { type Clock, type PendingInputPort, StoreUnavailableError } from "@/ports";
import { pendingInputs } from "@/shared/db/schema";

export class DrizzlePendingInputAdapter implements PendingInputPort {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock
  ) {}

  async begin(chatId: ChatId, ttlSeconds: number): Promise<void> {
    const expiresAt = new Date(this.clock.epochMs() + ttlSeconds * 1000);
    try {
      await this.db
        .insert(pendingInputs)
        .values({ chatId, kind: "awaiting_secret", expiresAt })
        .onConflictDoUpdate({
          target: pendingInputs.chatId,
          set: { kind: "awaiting_secret", expiresAt },
        });
    } catch (error) {
      throw new StoreUnavailableError("pending_inputs", { cause: error });
    }
  }

  async consume(chatId: ChatId): Promise<boolean> {
    let rows: { expiresAt: Date }[];
    try {
      rows = await this.db
        .delete(pendingInputs)
        .where(eq(pendingInputs.chatId, chatId))
        .returning({ expiresAt: pendingInputs.expiresAt });
    } catch (error) {
      throw new StoreUnavailableError("pending_inputs", { cause: error });
    }
    const row = rows[0];
    return row !== undefined && row.expiresAt.getTime() > this.clock.epochMs();
  }

  cancel(chatId: ChatId): Promise<boolean> {
    return this.consume(chatId);
  }
}
