// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/relay/history-codec`
 * Purpose: Verifies the persisted part encoding and tolerant reconstruction of stored turns.
 * Scope: encodeParts, decodeParts, decodeStoredTurn. Does NOT touch a database.
 * Invariants: Image bytes never persist; malformed items are skipped; malformed rows report a reason.
 * Side-effects: none
 * Links: src/adapters/server/relay/history-codec.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  decodeParts,
  decodeStoredTurn,
  encodeParts,
} from "@/adapters/server/relay/history-codec";

describe("encodeParts", () => {
  it("drops image bytes and empty text", () => {
    expect(
      encodeParts([
        { type: "text", text: "" },
        { type: "text", text: "look" },
        { type: "image", mimeType: "image/png", data: new Uint8Array([9, 9]) },
      ])
    ).toEqual([
      { type: "text", text: "look" },
      { type: "image", mime_type: "image/png" },
    ]);
  });

  it("keeps a stored caption and function parts", () => {
    expect(
      encodeParts([
        { type: "image", mimeType: "image/jpeg", caption: "cat" },
        { type: "function_call", name: "lookup", args: { q: "x" } },
        { type: "function_response", name: "lookup", response: { ok: true } },
      ])
    ).toEqual([
      { type: "image", mime_type: "image/jpeg", caption: "cat" },
      { type: "function_call", function_call: { name: "lookup", args: { q: "x" } } },
      {
        type: "function_response",
        function_response: { name: "lookup", response: { ok: true } },
      },
    ]);
  });
});

describe("decodeParts", () => {
  it("turns an image reference into a synthetic text part", () => {
    expect(
      decodeParts([{ type: "image", mime_type: "image/jpeg", caption: "cat" }])
    ).toEqual({
      ok: true,
      parts: [{ type: "text", text: "[Image: image/jpeg] (Caption: cat)" }],
      skipped: 0,
    });
  });

  it("reads a JSON string column", () => {
    expect(decodeParts('[{"type":"text","text":"hi"}]')).toEqual({
      ok: true,
      parts: [{ type: "text", text: "hi" }],
      skipped: 0,
    });
  });

  it("treats null as empty parts", () => {
    expect(decodeParts(null)).toEqual({ ok: true, parts: [], skipped: 0 });
  });

  it("skips non-object and unknown items", () => {
    expect(
      decodeParts(["junk", 7, { type: "video" }, { type: "text", text: "kept" }])
    ).toEqual({ ok: true, parts: [{ type: "text", text: "kept" }], skipped: 3 });
  });

  it("defaults missing function args to an empty object", () => {
    expect(
      decodeParts([{ type: "function_call", function_call: { name: "ping" } }])
    ).toEqual({
      ok: true,
      parts: [{ type: "function_call", name: "ping", args: {} }],
      skipped: 0,
    });
  });

  it("rejects unparseable JSON", () => {
    expect(decodeParts("{not json")).toEqual({
      ok: false,
      reason: "unparseable_json",
    });
  });

  it("rejects a non-array value", () => {
    expect(decodeParts({ type: "text", text: "x" })).toEqual({
      ok: false,
      reason: "not_an_array",
    });
  });
});

describe("decodeStoredTurn", () => {
  it("rejects an unknown role", () => {
    expect(decodeStoredTurn({ turnIndex: 0, role: "system", parts: [] })).toEqual({
      ok: false,
      reason: "unknown_role",
    });
  });

  it("rebuilds a turn", () => {
    expect(
      decodeStoredTurn({
        turnIndex: 3,
        role: "model",
        parts: [{ type: "text", text: "ok" }],
      })
    ).toEqual({
      ok: true,
      turn: { turnIndex: 3, role: "model", parts: [{ type: "text", text: "ok" }] },
      skipped: 0,
    });
  });
});
