// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/dispatch-event`
 * Purpose: Verifies routing of inbound events and the last-resort error boundary.
 * Scope: Text, photo, command, callback and unsupported events. Does NOT re-test handler internals.
 * Invariants: Every event resolves with an outcome; failures never reject.
 * Side-effects: none
 * Links: src/features/relay/services/dispatch-event.ts
 * @public
 */

import { FakeClock, makeTestRelay } from "@tests/_fakes";
import { describe, expect, it, vi } from "vitest";

import { FAKE_REPLY_TEXT } from "@/adapters/test";
import { dispatchInboundEvent } from "@/features/relay/public";
import { ProviderNotFoundError } from "@/ports";
import { makeNoopLogger, relayEventsTotal } from "@/shared/observability";

const contextDeps = { baseLog: makeNoopLogger(), clock: new FakeClock() };

describe("dispatchInboundEvent", () => {
  it("relays a text message", async () => {
    const relay = makeTestRelay();

    const outcome = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "text",
      chatId: 1,
      text: "hello",
      reqId: "upstream-req-1",
    });

    expect(outcome).toBe("replied");
    expect(relay.transport.texts()).toEqual([FAKE_REPLY_TEXT]);

    const counted = (await relayEventsTotal.get()).values.find(
      (v) => v.labels.kind === "text" && v.labels.outcome === "replied"
    );
    expect(counted?.value).toBeGreaterThanOrEqual(1);
  });

  it("relays a photo with its caption", async () => {
    const relay = makeTestRelay();
    relay.transport.files.set("f1", { data: new Uint8Array([7]) });

    await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "photo",
      chatId: 1,
      fileRef: "f1",
      caption: "a dog",
    });

    expect(relay.provider.sessions[0]?.sent[0]).toEqual([
      { type: "text", text: "a dog" },
      { type: "image", mimeType: "image/jpeg", data: new Uint8Array([7]) },
    ]);
  });

  it.each(["start", "help", "HELP"])("answers /%s with the command list", async (command) => {
    const relay = makeTestRelay();

    await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "command",
      chatId: 1,
      command,
    });

    expect(relay.transport.texts()[0]).toMatch(/^Hello! /);
    expect(relay.transport.texts()[0]).toContain("/current_settings");
  });

  it("routes /set_api_key so the next message becomes the secret", async () => {
    const relay = makeTestRelay();

    await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "command",
      chatId: 1,
      command: "set_api_key",
    });
    const outcome = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "text",
      chatId: 1,
      text: "test-new-secret",
    });

    expect(outcome).toBe("secret_set");
    expect((await relay.settings.get(1)).secret).toBe("test-new-secret");
  });

  it("routes /current_settings", async () => {
    const relay = makeTestRelay();

    await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "command",
      chatId: 1,
      command: "current_settings",
    });

    expect(relay.transport.texts()[0]).toMatch(/^\*Your Current Settings\*:/);
  });

  it("hints at /help for unknown commands", async () => {
    const relay = makeTestRelay();

    const outcome = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "command",
      chatId: 1,
      command: "frobnicate",
    });

    expect(outcome).toBe("rejected");
    expect(relay.transport.texts()).toEqual([
      "Unknown command. Use `/help` to see available commands.",
    ]);
  });

  it("lets a chat recover from an unavailable model through /select_model", async () => {
    const relay = makeTestRelay();
    relay.provider.createSessionError = new ProviderNotFoundError("model gone");

    await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "text",
      chatId: 1,
      text: "hello",
    });
    expect(relay.transport.texts()[0]).toContain(
      "Please use `/select_model` to choose a different model."
    );

    const offered = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "command",
      chatId: 1,
      command: "select_model",
    });
    expect(offered).toBe("replied");
    expect(relay.transport.choices).toEqual([
      {
        chatId: 1,
        text: "Please select a model:",
        choices: [
          { label: "fake-model", data: "set_model:models/fake-model" },
          { label: "fake-model-pro", data: "set_model:models/fake-model-pro" },
        ],
      },
    ]);

    relay.provider.createSessionError = undefined;
    const picked = relay.transport.choices[0]?.choices[1];
    await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "callback",
      chatId: 1,
      messageRef: "m1",
      callbackToken: "cb1",
      data: picked?.data ?? "",
    });
    const outcome = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "text",
      chatId: 1,
      text: "hello again",
    });

    expect(outcome).toBe("replied");
    expect(relay.provider.sessions[0]?.params.model).toBe("models/fake-model-pro");
  });

  it("lists models for /list_models", async () => {
    const relay = makeTestRelay();

    const outcome = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "command",
      chatId: 1,
      command: "LIST_MODELS",
    });

    expect(outcome).toBe("replied");
    expect(relay.transport.texts()).toEqual([
      "Available Models (may vary based on API key/region):\n\n- `fake-model`\n- `fake-model-pro`\n\nUse `/select_model` to choose one.",
    ]);
  });

  it("routes model-selection callbacks", async () => {
    const relay = makeTestRelay();

    const outcome = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "callback",
      chatId: 1,
      messageRef: "m1",
      callbackToken: "cb1",
      data: "set_model:models/other",
    });

    expect(outcome).toBe("settings_updated");
    expect((await relay.settings.get(1)).model).toBe("models/other");
  });

  it("declines unsupported content", async () => {
    const relay = makeTestRelay();

    await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "unsupported",
      chatId: 1,
      contentType: "sticker",
    });

    expect(relay.transport.texts()).toEqual([
      "Sorry, I can currently only process text and photos.",
    ]);
  });

  it("apologizes when a command handler throws", async () => {
    const relay = makeTestRelay();
    vi.spyOn(relay.pending, "cancel").mockRejectedValue(new Error("boom"));

    const outcome = await dispatchInboundEvent(relay.deps, contextDeps, {
      kind: "command",
      chatId: 1,
      command: "cancel",
    });

    expect(outcome).toBe("failed");
    expect(relay.transport.texts()).toEqual([
      "An unexpected error occurred during processing.",
    ]);
  });

  it("resolves even when the apology cannot be delivered", async () => {
    const relay = makeTestRelay();
    relay.transport.sendError = new Error("transport down");

    await expect(
      dispatchInboundEvent(relay.deps, contextDeps, {
        kind: "command",
        chatId: 1,
        command: "help",
      })
    ).resolves.toBe("failed");
  });
});
