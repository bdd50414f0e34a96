// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/session-orchestrator`
 * Purpose: Verifies the per-message flow end to end over in-memory stores and the fake provider.
 * Scope: Normal turns, history reconciliation, quota, secret resolution, photos, pending secret entry, error replies. Does NOT parse commands.
 * Invariants: Turn indices follow the last stored turn; replies are sent whatever persistence does; unexpected errors end in one apology.
 * Side-effects: none
 * Links: src/features/relay/services/session-orchestrator.ts, src/features/relay/services/conversation-turn.ts
 * @public
 */

import {
  makeTestCtx,
  makeTestRelay,
  TEST_MODEL,
  type TestRelay,
} from "@tests/_fakes";
import { describe, expect, it, vi } from "vitest";

import { FAKE_REPLY_TEXT } from "@/adapters/test";
import { handleUserMessage } from "@/features/relay/services/session-orchestrator";
import {
  ProviderNotFoundError,
  ProviderServerError,
  StoreUnavailableError,
} from "@/ports";

const CHAT = 1;
const HINT = "\n\nUse a different model by using the `/select_model` command.";

async function seedTurns(relay: TestRelay, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await relay.history.append(CHAT, i, i % 2 === 0 ? "user" : "model", [
      { type: "text", text: `turn ${i}` },
    ]);
  }
}

function send(relay: TestRelay, input: { text?: string; fileRef?: string }) {
  return handleUserMessage(relay.deps, makeTestCtx(), CHAT, input);
}

describe("handleUserMessage", () => {
  describe("conversation turns", () => {
    it("replies and stores the user and model turns", async () => {
      const relay = makeTestRelay();

      const outcome = await send(relay, { text: "hello" });

      expect(outcome).toBe("replied");
      expect(relay.transport.sent).toEqual([
        { chatId: CHAT, text: FAKE_REPLY_TEXT, format: "markdown" },
      ]);
      expect(relay.history.rows(CHAT)).toEqual([
        { turnIndex: 0, role: "user", parts: [{ type: "text", text: "hello" }] },
        {
          turnIndex: 1,
          role: "model",
          parts: [{ type: "text", text: FAKE_REPLY_TEXT }],
        },
      ]);
      expect(relay.provider.sessions[0]?.params).toEqual({
        secret: "test-secret",
        model: TEST_MODEL,
        history: [],
      });
    });

    it("saves turns 10 and 11 when history grows from 10 to 12", async () => {
      const relay = makeTestRelay();
      await seedTurns(relay, 10);

      await send(relay, { text: "next" });

      const rows = relay.history.rows(CHAT);
      expect(rows).toHaveLength(12);
      expect(rows.slice(10)).toEqual([
        { turnIndex: 10, role: "user", parts: [{ type: "text", text: "next" }] },
        {
          turnIndex: 11,
          role: "model",
          parts: [{ type: "text", text: FAKE_REPLY_TEXT }],
        },
      ]);
    });

    it("saves only the user turn when the reply is blocked", async () => {
      const relay = makeTestRelay();
      await seedTurns(relay, 10);
      relay.provider.enqueue({ kind: "blocked", reason: "SAFETY" });

      const outcome = await send(relay, { text: "risky" });

      expect(outcome).toBe("blocked");
      const rows = relay.history.rows(CHAT);
      expect(rows).toHaveLength(11);
      expect(rows[10]).toEqual({
        turnIndex: 10,
        role: "user",
        parts: [{ type: "text", text: "risky" }],
      });
      expect(relay.transport.texts()).toEqual([
        `Your input or the model's response was blocked by safety filters. Reason(s): SAFETY${HINT}`,
      ]);
    });

    it("saves nothing but still replies when history did not grow", async () => {
      const relay = makeTestRelay();
      await seedTurns(relay, 10);
      relay.provider.enqueue({ kind: "no_growth", text: "odd reply" });

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("replied");
      expect(relay.history.rows(CHAT)).toHaveLength(10);
      expect(relay.transport.texts()).toEqual(["odd reply"]);
    });

    it("indexes after the last stored turn when the window is in effect", async () => {
      const relay = makeTestRelay({ maxHistoryTurns: 4 });
      await seedTurns(relay, 10);

      await send(relay, { text: "windowed" });

      expect(relay.provider.sessions[0]?.params.history).toHaveLength(4);
      const rows = relay.history.rows(CHAT);
      expect(rows.map((row) => row.turnIndex)).toEqual([
        0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11,
      ]);
      expect(rows[4]?.parts).toEqual([{ type: "text", text: "turn 4" }]);
    });

    it("describes a function call and stores it as the model turn", async () => {
      const relay = makeTestRelay();
      relay.provider.enqueue({
        kind: "function_call",
        name: "lookup",
        args: { q: "x" },
      });

      await send(relay, { text: "call it" });

      expect(relay.transport.texts()).toEqual([
        'Model wants to call a function:\n- `lookup({"q":"x"})`',
      ]);
      expect(relay.history.rows(CHAT)[1]?.parts).toEqual([
        { type: "function_call", function_call: { name: "lookup", args: { q: "x" } } },
      ]);
    });
  });

  describe("photos", () => {
    it("sends caption then image and stores an image reference", async () => {
      const relay = makeTestRelay();
      const data = new Uint8Array([1, 2]);
      relay.transport.files.set("file-1", { data, filePath: "photos/a.png" });

      await send(relay, { text: "cat", fileRef: "file-1" });

      expect(relay.provider.sessions[0]?.sent[0]).toEqual([
        { type: "text", text: "cat" },
        { type: "image", mimeType: "image/png", data },
      ]);
      expect(relay.history.rows(CHAT)[0]?.parts).toEqual([
        { type: "text", text: "cat" },
        { type: "image", mime_type: "image/png" },
      ]);
    });

    it("apologizes when the image cannot be downloaded", async () => {
      const relay = makeTestRelay();

      const outcome = await send(relay, { fileRef: "missing" });

      expect(outcome).toBe("failed");
      expect(relay.transport.texts()).toEqual([
        "Sorry, I encountered an error processing the image.",
      ]);
      expect(relay.provider.sessions).toHaveLength(0);
    });
  });

  describe("quota and secrets", () => {
    it("sends notices on the 4th and 5th message and denies the 6th", async () => {
      const relay = makeTestRelay({ messageLimit: 5 });

      for (let i = 0; i < 6; i++) {
        await send(relay, { text: `m${i}` });
      }

      expect(relay.provider.sessions).toHaveLength(5);
      expect(relay.transport.texts()).toEqual([
        FAKE_REPLY_TEXT,
        FAKE_REPLY_TEXT,
        FAKE_REPLY_TEXT,
        "You have 1 message remaining with the default API key.\n\nPlease use `/set_api_key` to provide your own Gemini API key to send more messages after this one.",
        FAKE_REPLY_TEXT,
        "This is your 5th and final message using the default API key.\n\nTo send more messages, please use `/set_api_key` to provide your own Gemini API key.",
        FAKE_REPLY_TEXT,
        "You have reached the 5-message limit for users without a custom API key.\n\nPlease set your own API key using `/set_api_key` to continue chatting without limits.",
      ]);
    });

    it("uses the chat's own secret without metering", async () => {
      const relay = makeTestRelay();
      await relay.settings.upsert(CHAT, "test-own-secret", TEST_MODEL, 0);

      await send(relay, { text: "hi" });

      expect(relay.provider.sessions[0]?.params.secret).toBe("test-own-secret");
      expect((await relay.settings.get(CHAT)).messageCount).toBe(0);
    });

    it("reports a missing secret when no shared secret is configured", async () => {
      const relay = makeTestRelay({ sharedSecret: undefined });

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("not_configured");
      expect(relay.transport.texts()).toEqual([
        "AI service not available. The bot's default API key is missing, and you haven't set your own.\n\nPlease use `/set_api_key` to provide your key.",
      ]);
      expect(relay.provider.sessions).toHaveLength(0);
    });
  });

  describe("validation and pending input", () => {
    it("rejects empty text before touching the stores", async () => {
      const relay = makeTestRelay();
      const get = vi.spyOn(relay.settings, "get");

      const outcome = await send(relay, { text: "   " });

      expect(outcome).toBe("rejected");
      expect(relay.transport.texts()).toEqual(["Please send some text to chat!"]);
      expect(get).not.toHaveBeenCalled();
    });

    it("treats the message after /set_api_key as the secret", async () => {
      const relay = makeTestRelay();
      await relay.pending.begin(CHAT, 600);

      const outcome = await send(relay, { text: "  test-new-secret  " });

      expect(outcome).toBe("secret_set");
      expect(relay.provider.validatedSecrets).toEqual(["test-new-secret"]);
      expect(relay.provider.sessions).toHaveLength(0);
      expect((await relay.settings.get(CHAT)).secret).toBe("test-new-secret");
    });

    it("leaves the pending entry armed when a photo arrives", async () => {
      const relay = makeTestRelay();
      relay.transport.files.set("file-1", {
        data: new Uint8Array([1]),
        filePath: "photos/a.jpg",
      });
      await relay.pending.begin(CHAT, 600);

      const outcome = await send(relay, { text: "test-caption", fileRef: "file-1" });

      expect(outcome).toBe("replied");
      expect(relay.provider.validatedSecrets).toEqual([]);
      expect((await relay.settings.get(CHAT)).secret).toBeUndefined();
      expect(await relay.pending.consume(CHAT)).toBe(true);
    });

    it("chats normally once the pending entry expired", async () => {
      const relay = makeTestRelay();
      await relay.pending.begin(CHAT, 600);
      relay.clock.advance(601_000);

      const outcome = await send(relay, { text: "hello" });

      expect(outcome).toBe("replied");
      expect(relay.provider.validatedSecrets).toEqual([]);
    });
  });

  describe("failures", () => {
    it("reports unavailable settings", async () => {
      const relay = makeTestRelay();
      vi.spyOn(relay.settings, "get").mockRejectedValue(
        new StoreUnavailableError("chat_settings")
      );

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("store_unavailable");
      expect(relay.transport.texts()).toEqual([
        "Error fetching your settings from the database.",
      ]);
    });

    it("reports unavailable history", async () => {
      const relay = makeTestRelay();
      vi.spyOn(relay.history, "fetch").mockRejectedValue(
        new StoreUnavailableError("chat_history")
      );

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("store_unavailable");
      expect(relay.transport.texts()).toEqual([
        "Error fetching chat history from the database.",
      ]);
      expect(relay.provider.sessions).toHaveLength(0);
    });

    it("reports an unavailable pending-input store", async () => {
      const relay = makeTestRelay();
      vi.spyOn(relay.pending, "consume").mockRejectedValue(
        new StoreUnavailableError("pending_inputs")
      );

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("store_unavailable");
      expect(relay.transport.texts()).toEqual([
        "Database service is not available. Bot may not function correctly.",
      ]);
    });

    it("asks for another model when the model is not found", async () => {
      const relay = makeTestRelay();
      relay.provider.createSessionError = new ProviderNotFoundError("gone");

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("provider_error");
      expect(relay.transport.texts()).toEqual([
        "The selected model `models/test-model` is not available or supported for conversations with your API key.\n\nPlease use `/select_model` to choose a different model.",
      ]);
      expect(relay.history.rows(CHAT)).toEqual([]);
    });

    it("reports a timed-out provider call as a server error", async () => {
      const relay = makeTestRelay();
      relay.provider.enqueue({
        kind: "error",
        error: new ProviderServerError(504, "timed out"),
      });

      await send(relay, { text: "hi" });

      expect(relay.transport.texts()).toEqual([
        "The AI service encountered a server error (Code: 504). Please try again later.",
      ]);
      expect(relay.history.rows(CHAT)).toEqual([]);
      // quota is not returned
      expect((await relay.settings.get(CHAT)).messageCount).toBe(1);
    });

    it("apologizes for unexpected errors", async () => {
      const relay = makeTestRelay();
      vi.spyOn(relay.pending, "consume").mockRejectedValue(new Error("boom"));

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("failed");
      expect(relay.transport.texts()).toEqual([
        "An unexpected error occurred during processing.",
      ]);
    });

    it("still replies when the turns cannot be saved", async () => {
      const relay = makeTestRelay();
      vi.spyOn(relay.history, "append").mockResolvedValue(false);

      const outcome = await send(relay, { text: "hi" });

      expect(outcome).toBe("replied");
      expect(relay.transport.texts()).toEqual([FAKE_REPLY_TEXT]);
    });
  });
});
