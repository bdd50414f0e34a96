// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/public`
 * Purpose: Public API surface for the relay feature - barrel export for stable feature boundaries.
 * Scope: Re-exports public types and entry functions; does not implement logic.
 * Invariants: Feature consumers import from this file only, never from internal modules.
 * Side-effects: none
 * Links: bootstrap/container, src/index.ts
 * @public
 */

export { REPLIES } from "./replies";
export {
  type DispatchContextDeps,
  dispatchInboundEvent,
} from "./services/dispatch-event";
export {
  type ClassifiedProviderError,
  classifyBlockedResponse,
  classifyProviderError,
  type ProviderErrorKind,
} from "./services/provider-error-classifier";
export type {
  InboundEvent,
  RelayConfig,
  RelayDeps,
  RelayOutcome,
  UserInput,
} from "./types";
