// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/public`
 * Purpose: Public API for chat domain - allowed entry point for features.
 * Scope: Exposes core domain entities and business rules. Does not expose internal implementation details.
 * Invariants: Only exports public domain API, no internal implementation details
 * Side-effects: none
 * Links: Used by features via @/core
 * @public
 */

export * from "./model";
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
} from "./rules";
