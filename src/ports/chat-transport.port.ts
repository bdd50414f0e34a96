// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/chat-transport.port`
 * Purpose: Outbound side of the chat network (replies, choice buttons, edits, callback acks, media download).
 * Scope: Defines ChatTransportPort. Does not receive events; delivery belongs to whatever drives handleInboundEvent.
 * Invariants: Implementations own rendering of the requested format
 * Side-effects: none
 * Links: bootstrap/container, features/relay/services/dispatch-event
 * @public
 */

import type { ChatId } from "@/core";

export type ReplyFormat = "plain" | "markdown";

export interface BinaryFile {
  data: Uint8Array;
  /** Remote path, used for mime type inference */
  filePath?: string | undefined;
}

/** One button under a message; `data` comes back as a callback event. */
export interface ReplyChoice {
  label: string;
  data: string;
}

export interface ChatTransportPort {
  send(chatId: ChatId, text: string, format?: ReplyFormat): Promise<void>;
  sendChoices(chatId: ChatId, text: string, choices: ReplyChoice[]): Promise<void>;
  edit(messageRef: string, text: string, format?: ReplyFormat): Promise<void>;
  acknowledge(callbackToken: string, text?: string): Promise<void>;
  getBinary(fileRef: string): Promise<BinaryFile>;
}
