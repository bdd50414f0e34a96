// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Pure business rules for chat sessions, history windows, and turn reconciliation.
 * Scope: Deterministic helpers used by the orchestrator and stores. Does not handle I/O or time dependencies.
 * Invariants:
 *   - windowHistory keeps the most recent turns in original relative order
 *   - planHistorySave never assigns an index below nextTurnIndex
 *   - describeImageReference output is stable (history replay relies on it)
 * Side-effects: none
 * Links: Used by features/relay services and history adapters
 * @public
 */

import type {
  ChatId,
  ChatSession,
  HistoryTurn,
  Part,
  TurnRole,
} from "./model";

export const DEFAULT_IMAGE_MIME_TYPE = "image/jpeg";

const SUPPORTED_IMAGE_EXTENSIONS = ["png", "gif", "webp", "jpeg", "jpg"];

/** Lazily-created session defaults for a chat with no stored settings. */
export function defaultChatSession(
  chatId: ChatId,
  defaultModel: string
): ChatSession {
  return { chatId, secret: undefined, model: defaultModel, messageCount: 0 };
}

/**
 * Sliding history window.
 * @param maxTurns - Window size; 0 or less disables truncation
 */
export function windowHistory<T>(turns: T[], maxTurns: number): T[] {
  if (maxTurns <= 0 || turns.length <= maxTurns) return turns;
  return turns.slice(-maxTurns);
}

/** Index the next saved turn should take, derived from the last fetched turn. */
export function nextTurnIndex(history: HistoryTurn[]): number {
  const last = history.at(-1);
  return last ? last.turnIndex + 1 : 0;
}

/** Synthetic text for a stored image reference (raw bytes are never replayed). */
export function describeImageReference(
  mimeType: string | undefined,
  caption: string | undefined
): string {
  let text = `[Image: ${mimeType ?? "image"}]`;
  if (caption) {
    text += ` (Caption: ${caption})`;
  }
  return text;
}

export function inferImageMimeType(filePath: string | undefined): string {
  if (!filePath?.includes(".")) return DEFAULT_IMAGE_MIME_TYPE;
  const ext = filePath.slice(filePath.lastIndexOf(".") + 1).toLowerCase();
  if (!SUPPORTED_IMAGE_EXTENSIONS.includes(ext)) return DEFAULT_IMAGE_MIME_TYPE;
  return `image/${ext === "jpg" ? "jpeg" : ext}`;
}

/**
 * Single input-assembly routine for text and photo messages.
 * Caption (or text) comes first, then at most one image.
 */
export function assembleInputParts(input: {
  text?: string | undefined;
  image?: { mimeType: string; data: Uint8Array } | undefined;
}): Part[] {
  const parts: Part[] = [];
  if (input.text) {
    parts.push({ type: "text", text: input.text });
  }
  if (input.image) {
    parts.push({
      type: "image",
      mimeType: input.image.mimeType,
      data: input.image.data,
    });
  }
  return parts;
}

export type HistorySavePlan =
  | {
      kind: "user_and_model";
      userIndex: number;
      modelIndex: number;
      modelParts: Part[];
    }
  | { kind: "user_only"; userIndex: number }
  | { kind: "nothing"; reason: "no_growth" | "unexpected_growth" };

/**
 * Decide which turns to persist after a provider round trip.
 *
 * @param previousLength - History length sent to the provider
 * @param updated - Full provider history after the exchange
 * @param startIndex - Index for the new user turn
 */
export function planHistorySave(
  previousLength: number,
  updated: ReadonlyArray<{ role: TurnRole; parts: Part[] }>,
  startIndex: number
): HistorySavePlan {
  const growth = updated.length - previousLength;
  const last = updated.at(-1);

  if (growth >= 2 && last) {
    return {
      kind: "user_and_model",
      userIndex: startIndex,
      modelIndex: startIndex + 1,
      modelParts: last.parts,
    };
  }

  if (growth === 1 && last?.role === "user") {
    return { kind: "user_only", userIndex: startIndex };
  }

  return {
    kind: "nothing",
    reason: growth <= 0 ? "no_growth" : "unexpected_growth",
  };
}

/** Mask a secret for display/logging: first and last four characters. */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return `${secret.slice(0, 2)}...`;
  return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}
