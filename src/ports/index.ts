// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export {
  type AiProviderPort,
  classifyProviderStatus,
  type CreateSessionParams,
  isProviderClientError,
  isProviderError,
  isProviderNotFoundError,
  isProviderPermissionDeniedError,
  isProviderServerError,
  type ProviderCandidate,
  ProviderClientError,
  type ProviderError,
  providerErrorFromStatus,
  ProviderNotFoundError,
  ProviderPermissionDeniedError,
  type ProviderResponse,
  ProviderServerError,
  type ProviderSession,
  type ProviderStatusClass,
  type ProviderTurn,
} from "./ai-provider.port";
export type {
  BinaryFile,
  ChatTransportPort,
  ReplyChoice,
  ReplyFormat,
} from "./chat-transport.port";
export type { Clock } from "./clock.port";
export type { HistoryStorePort } from "./history-store.port";
export type { PendingInputPort } from "./pending-input.port";
export {
  type IncrementResult,
  isStoreUnavailableError,
  type SettingsStorePort,
  StoreUnavailableError,
} from "./settings-store.port";
