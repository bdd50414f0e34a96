// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/model`
 * Purpose: Domain entities and value objects for relayed chat sessions and turn history.
 * Scope: Pure domain types. Does not handle I/O, persistence encoding, or provider wire formats.
 * Invariants: No Date objects, no I/O dependencies, purely functional types
 * Side-effects: none
 * Notes: Image bytes live on ImagePart.data only while a turn is in flight; stores keep a reference.
 * Links: Used by ports, features, and adapters
 * @public
 */

export type ChatId = number;

export type TurnRole = "user" | "model";

export interface TextPart {
  readonly type: "text";
  readonly text: string;
}

/**
 * Image attached to a turn. `data` is transient (inbound bytes for the provider call);
 * persisted turns only carry mimeType and an optional caption.
 */
export interface ImagePart {
  readonly type: "image";
  readonly mimeType: string;
  readonly caption?: string | undefined;
  readonly data?: Uint8Array | undefined;
}

export interface FunctionCallPart {
  readonly type: "function_call";
  readonly name: string;
  readonly args: Record<string, unknown>;
}

export interface FunctionResponsePart {
  readonly type: "function_response";
  readonly name: string;
  readonly response: Record<string, unknown>;
}

export type Part = TextPart | ImagePart | FunctionCallPart | FunctionResponsePart;

export interface HistoryTurn {
  /** Dense, zero-based position assigned by the orchestrator */
  turnIndex: number;
  role: TurnRole;
  parts: Part[];
}

/**
 * Per-chat session settings.
 * messageCount only applies while secret is absent (shared-credential mode).
 */
export interface ChatSession {
  chatId: ChatId;
  secret?: string | undefined;
  model: string;
  messageCount: number;
}
