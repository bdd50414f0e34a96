// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/quota/public`
 * Purpose: Public API for quota rules.
 * Scope: Re-exports quota types and pure rules. Does not contain logic.
 * Invariants: Named exports only
 * Side-effects: none
 * Links: Used by features via @/core
 * @public
 */

export {
  isQuotaExhausted,
  isQuotaMetered,
  noticeForCount,
  type QuotaDecision,
  type QuotaDenialReason,
  type QuotaNotice,
} from "./rules";
