// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/quota/rules`
 * Purpose: Pure rules for the shared-secret message allowance.
 * Scope: Decides whether a session is metered and which notice a new count triggers. Does not read or write counters.
 * Invariants:
 *   - Sessions with a custom secret are never metered
 *   - limit <= 0 disables metering
 *   - A notice is tied to one exact post-increment count, so it fires at most once per crossing
 * Side-effects: none
 * Links: features/relay/services/quota-gate
 * @public
 */

import type { ChatSession } from "@/core/chat/model";

export type QuotaNotice = "one_remaining" | "final_message";

export type QuotaDenialReason = "limit_reached" | "count_update_failed";

export type QuotaDecision =
  | { allowed: true; count?: number | undefined; notice?: QuotaNotice | undefined }
  | { allowed: false; reason: QuotaDenialReason };

export function isQuotaMetered(session: ChatSession, limit: number): boolean {
  return !session.secret && limit > 0;
}

export function isQuotaExhausted(count: number, limit: number): boolean {
  return count >= limit;
}

/**
 * Notice for a freshly written count.
 * @param count - Count after the successful increment
 */
export function noticeForCount(
  count: number,
  limit: number
): QuotaNotice | undefined {
  const remaining = limit - count;
  if (remaining === 1) return "one_remaining";
  if (remaining === 0) return "final_message";
  return undefined;
}
