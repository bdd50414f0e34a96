// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/relay/history-codec`
 * Purpose: Encodes domain parts into the persisted parts_json layout and decodes stored rows back.
 * Scope: Pure conversion between Part[] and the stored JSON array. Does not query the database.
 * Invariants:
 *   - Image bytes are never encoded; an image is stored as { type: "image", mime_type, caption? }
 *   - Decoding replaces an image reference with one synthetic text part
 *   - Non-object or unrecognized items are skipped and counted, never fatal
 *   - null / undefined decode to an empty part list
 *   - A row whose role is not "user" or "model" is rejected
 * Side-effects: none
 * Links: drizzle-history-store.adapter, adapters/test/relay/in-memory-history-store.adapter
 * @internal
 */

import { z } from "zod";

import { describeImageReference, type HistoryTurn, type Part } from "@/core";

const JsonObjectSchema = z.record(z.string(), z.unknown());

const StoredPartSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("image"),
    mime_type: z.string().optional(),
    caption: z.string().optional(),
  }),
  z.object({
    type: z.literal("function_call"),
    function_call: z.object({
      name: z.string(),
      args: JsonObjectSchema.optional(),
    }),
  }),
  z.object({
    type: z.literal("function_response"),
    function_response: z.object({
      name: z.string(),
      response: JsonObjectSchema.optional(),
    }),
  }),
]);

export type StoredPart = z.infer<typeof StoredPartSchema>;

export type DecodeResult =
  | { ok: true; parts: Part[]; skipped: number }
  | { ok: false; reason: "unparseable_json" | "not_an_array" };

export function encodeParts(parts: readonly Part[]): StoredPart[] {
  const stored: StoredPart[] = [];
  for (const part of parts) {
    switch (part.type) {
      case "text":
        if (part.text) stored.push({ type: "text", text: part.text });
        break;
      case "image":
        stored.push({
          type: "image",
          mime_type: part.mimeType,
          ...(part.caption ? { caption: part.caption } : {}),
        });
        break;
      case "function_call":
        stored.push({
          type: "function_call",
          function_call: { name: part.name, args: part.args },
        });
        break;
      case "function_response":
        stored.push({
          type: "function_response",
          function_response: { name: part.name, response: part.response },
        });
        break;
    }
  }
  return stored;
}

function toPart(stored: StoredPart): Part {
  switch (stored.type) {
    case "text":
      return { type: "text", text: stored.text };
    case "image":
      return {
        type: "text",
        text: describeImageReference(stored.mime_type, stored.caption),
      };
    case "function_call":
      return {
        type: "function_call",
        name: stored.function_call.name,
        args: stored.function_call.args ?? {},
      };
    case "function_response":
      return {
        type: "function_response",
        name: stored.function_response.name,
        response: stored.function_response.response ?? {},
      };
  }
}

/**
 * @param raw - parts_json column value: an array, a JSON string of one, or null
 */
export function decodeParts(raw: unknown): DecodeResult {
  if (raw === null || raw === undefined) {
    return { ok: true, parts: [], skipped: 0 };
  }

  let value: unknown = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      return { ok: false, reason: "unparseable_json" };
    }
  }

  if (!Array.isArray(value)) {
    return { ok: false, reason: "not_an_array" };
  }

  const parts: Part[] = [];
  let skipped = 0;
  for (const item of value) {
    const parsed = StoredPartSchema.safeParse(item);
    if (parsed.success) {
      parts.push(toPart(parsed.data));
    } else {
      skipped += 1;
    }
  }
  return { ok: true, parts, skipped };
}

export interface StoredTurnRow {
  turnIndex: number;
  role: string;
  parts: unknown;
}

export type TurnDecodeResult =
  | { ok: true; turn: HistoryTurn; skipped: number }
  | { ok: false; reason: "unknown_role" | "unparseable_json" | "not_an_array" };

export function decodeStoredTurn(row: StoredTurnRow): TurnDecodeResult {
  if (row.role !== "user" && row.role !== "model") {
    return { ok: false, reason: "unknown_role" };
  }
  const decoded = decodeParts(row.parts);
  if (!decoded.ok) return decoded;
  return {
    ok: true,
    turn: { turnIndex: row.turnIndex, role: row.role, parts: decoded.parts },
    skipped: decoded.skipped,
  };
}
