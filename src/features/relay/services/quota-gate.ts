// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/quota-gate`
 * Purpose: Enforce the per-chat allowance for messages sent on the shared secret.
 * Scope: Decide, consume one unit through the settings store, and name the notice to send. Does not send replies.
 * Invariants:
 *   - Exhausted allowance never writes and never reaches the provider
 *   - The increment is one conditional store write; a lost race reads as limit_reached
 *   - Consumed units are never returned, whatever happens later in the turn
 * Side-effects: IO (settings store write), metrics
 * Links: core/quota/rules, ports/settings-store.port
 * @public
 */

import {
  type ChatSession,
  isQuotaExhausted,
  isQuotaMetered,
  noticeForCount,
  type QuotaDecision,
  type QuotaDenialReason,
  type QuotaNotice,
} from "@/core";
import type { SettingsStorePort } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
  relayQuotaDecisionsTotal,
} from "@/shared/observability";

import {
  quotaFinalMessage,
  quotaLimitReached,
  quotaOneRemaining,
  REPLIES,
} from "../replies";

export async function checkAndConsumeQuota(
  settings: SettingsStorePort,
  session: ChatSession,
  limit: number,
  ctx: RequestContext
): Promise<QuotaDecision> {
  if (!isQuotaMetered(session, limit)) {
    relayQuotaDecisionsTotal.inc({ decision: "unmetered" });
    return { allowed: true };
  }

  if (isQuotaExhausted(session.messageCount, limit)) {
    return deny(ctx, session, limit, "limit_reached");
  }

  const result = await settings.incrementMessageCount(session.chatId, limit);
  switch (result.status) {
    case "limit_reached":
      return deny(ctx, session, limit, "limit_reached");
    case "write_failed":
      return deny(ctx, session, limit, "count_update_failed");
    case "incremented": {
      const notice = noticeForCount(result.count, limit);
      relayQuotaDecisionsTotal.inc({ decision: "allowed" });
      if (notice) {
        logEvent(ctx.log, EVENT_NAMES.RELAY_QUOTA_NOTICE, {
          reqId: ctx.reqId,
          chatId: session.chatId,
          notice,
          count: result.count,
          limit,
        });
      }
      return { allowed: true, count: result.count, notice };
    }
  }
}

function deny(
  ctx: RequestContext,
  session: ChatSession,
  limit: number,
  reason: QuotaDenialReason
): QuotaDecision {
  relayQuotaDecisionsTotal.inc({ decision: reason });
  logEvent(
    ctx.log,
    EVENT_NAMES.RELAY_QUOTA_DENIED,
    { reqId: ctx.reqId, chatId: session.chatId, reason, limit },
    undefined,
    reason === "count_update_failed" ? "error" : "info"
  );
  return { allowed: false, reason };
}

export function quotaDenialText(reason: QuotaDenialReason, limit: number): string {
  return reason === "limit_reached"
    ? quotaLimitReached(limit)
    : REPLIES.quotaCountSaveFailed;
}

export function quotaNoticeText(notice: QuotaNotice, limit: number): string {
  return notice === "one_remaining"
    ? quotaOneRemaining()
    : quotaFinalMessage(limit);
}
