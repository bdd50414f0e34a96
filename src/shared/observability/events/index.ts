// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by features/relay services.
 * @public
 */

export const EVENT_NAMES = {
  // Inbound lifecycle
  RELAY_UNHANDLED_ERROR: "relay.unhandled_error",
  RELAY_STORE_UNAVAILABLE: "relay.store_unavailable",

  // Quota
  RELAY_QUOTA_DENIED: "relay.quota_denied",
  RELAY_QUOTA_NOTICE: "relay.quota_notice",

  // Provider
  RELAY_PROVIDER_CALL_COMPLETED: "relay.provider_call_completed",
  RELAY_PROVIDER_ERROR: "relay.provider_error",
  RELAY_PROVIDER_NOT_CONFIGURED: "relay.provider_not_configured",

  // History reconciliation
  RELAY_HISTORY_SAVED: "relay.history_saved",
  RELAY_HISTORY_SAVE_SKIPPED: "relay.history_save_skipped",
  RELAY_HISTORY_SAVE_FAILED: "relay.history_save_failed",

  // Settings
  RELAY_SECRET_ENTRY_STARTED: "relay.secret_entry_started",
  RELAY_SECRET_SET: "relay.secret_set",
  RELAY_SECRET_REJECTED: "relay.secret_rejected",
  RELAY_SECRET_CLEARED: "relay.secret_cleared",
  RELAY_MODEL_CHANGED: "relay.model_changed",
  RELAY_MODELS_LISTED: "relay.models_listed",
  RELAY_MODEL_LIST_FAILED: "relay.model_list_failed",
  RELAY_HISTORY_RESET: "relay.history_reset",

  // Test Events
  TEST_EVENT: "TEST_EVENT",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * reqId is ALWAYS required; chatId whenever the event belongs to a chat.
 */
export interface EventBase {
  reqId: string;
  chatId?: number;
}
