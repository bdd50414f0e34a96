// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/types`
 * Purpose: Feature-internal types for the relay: inbound events, dependencies, and outcomes.
 * Scope: Types only. Feature-internal, NOT in shared/.
 * Invariants: InboundEvent is transport-neutral; transports translate their updates into it
 * Side-effects: none
 * Links: services/dispatch-event, bootstrap/container
 * @internal
 */

import type { ChatId } from "@/core";
import type {
  AiProviderPort,
  ChatTransportPort,
  HistoryStorePort,
  PendingInputPort,
  SettingsStorePort,
} from "@/ports";

export type InboundEvent =
  | { kind: "text"; chatId: ChatId; text: string; reqId?: string | undefined }
  | {
      kind: "photo";
      chatId: ChatId;
      fileRef: string;
      caption?: string | undefined;
      reqId?: string | undefined;
    }
  | {
      kind: "command";
      chatId: ChatId;
      /** Command name without the leading slash */
      command: string;
      reqId?: string | undefined;
    }
  | {
      kind: "callback";
      chatId: ChatId;
      messageRef: string;
      callbackToken: string;
      data: string;
      reqId?: string | undefined;
    }
  | {
      kind: "unsupported";
      chatId: ChatId;
      contentType: string;
      reqId?: string | undefined;
    };

export interface RelayConfig {
  defaultModel: string;
  /** Operator-provided secret used when a chat has none */
  sharedSecret?: string | undefined;
  messageLimit: number;
  pendingInputTtlSeconds: number;
}

export interface RelayDeps {
  settings: SettingsStorePort;
  history: HistoryStorePort;
  pending: PendingInputPort;
  provider: AiProviderPort;
  transport: ChatTransportPort;
  config: RelayConfig;
}

/** User content on its way into a conversation turn, before media is fetched. */
export interface UserInput {
  text?: string | undefined;
  fileRef?: string | undefined;
}

/** Low-cardinality outcome label, used for logs and metrics. */
export type RelayOutcome =
  | "replied"
  | "blocked"
  | "rejected"
  | "quota_denied"
  | "store_unavailable"
  | "not_configured"
  | "provider_error"
  | "secret_set"
  | "secret_rejected"
  | "settings_updated"
  | "settings_unchanged"
  | "failed";
