// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by ports, adapters and features via \@/core alias
 * @public
 */

export type {
  ChatId,
  ChatSession,
  FunctionCallPart,
  FunctionResponsePart,
  HistoryTurn,
  ImagePart,
  Part,
  TextPart,
  TurnRole,
} from "./chat/model";
export {
  assembleInputParts,
  DEFAULT_IMAGE_MIME_TYPE,
  defaultChatSession,
  describeImageReference,
  type HistorySavePlan,
  inferImageMimeType,
  maskSecret,
  nextTurnIndex,
  planHistorySave,
  windowHistory,
} from "./chat/public";
export {
  isQuotaExhausted,
  isQuotaMetered,
  noticeForCount,
  type QuotaDecision,
  type QuotaDenialReason,
  type QuotaNotice,
} from "./quota/public";
