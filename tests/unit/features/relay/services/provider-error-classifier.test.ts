// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/provider-error-classifier`
 * Purpose: Verifies the closed provider error taxonomy and the reply text of each kind.
 * Scope: Port-level provider errors and response block reasons. Does NOT call the provider.
 * Invariants: Exactly one documentation link for rate limits; 200-character cap on raw messages; never throws.
 * Side-effects: none
 * Links: src/features/relay/services/provider-error-classifier.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  classifyBlockedResponse,
  classifyProviderError,
} from "@/features/relay/services/provider-error-classifier";
import {
  ProviderClientError,
  ProviderNotFoundError,
  ProviderPermissionDeniedError,
  ProviderServerError,
} from "@/ports";

const MODEL = "models/m";
const HINT = "\n\nUse a different model by using the `/select_model` command.";
const RATE_LIMIT_HEAD =
  "Your request failed due to a quota limit being reached for the selected model (`models/m`).";
const SAFETY_HEAD =
  "Your input or the model's response was blocked by safety filters.";
const TOO_LONG =
  "\n\nYour conversation history or input might be too long for the model. Try using `/reset`.";

const helpDetail = {
  "@type": "type.googleapis.com/google.rpc.Help",
  links: [
    { description: "Docs", url: "http://x" },
    { description: "Other", url: "http://y" },
  ],
};

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("classifyProviderError", () => {
  describe("rate_limited", () => {
    it("renders the first help link from an error envelope", () => {
      const error = new ProviderClientError(
        429,
        "Quota exceeded",
        JSON.stringify({
          error: {
            code: 429,
            message: "Quota exceeded",
            status: "RESOURCE_EXHAUSTED",
            details: [helpDetail],
          },
        })
      );

      const result = classifyProviderError(error, MODEL);

      expect(result.kind).toBe("rate_limited");
      expect(result.message).toBe(
        `${RATE_LIMIT_HEAD}\n\n[Docs](http://x)${HINT}`
      );
      expect(countOccurrences(result.message, "[Docs](http://x)")).toBe(1);
    });

    it("accepts a bare detail list", () => {
      const error = new ProviderClientError(429, "Quota exceeded", [helpDetail]);
      expect(classifyProviderError(error, MODEL).message).toBe(
        `${RATE_LIMIT_HEAD}\n\n[Docs](http://x)${HINT}`
      );
    });

    it("falls back to the quota documentation for unknown shapes", () => {
      const error = new ProviderClientError(429, "Quota exceeded", "<html>");
      expect(classifyProviderError(error, MODEL).message).toBe(
        `${RATE_LIMIT_HEAD}\n\nLearn more about Gemini API quotas: https://ai.google.dev/gemini-api/docs/rate-limits${HINT}`
      );
    });

    it("recognizes resource exhaustion without a 429", () => {
      const error = new ProviderClientError(400, "RESOURCE_EXHAUSTED: slow down");
      expect(classifyProviderError(error, MODEL).kind).toBe("rate_limited");
    });
  });

  describe("safety_blocked", () => {
    it("lists field violation reasons", () => {
      const error = new ProviderClientError(400, "status 400", {
        error: {
          message: "Request blocked",
          status: "BLOCKED",
          details: [
            {
              "@type": "type.googleapis.com/google.rpc.BadRequest",
              fieldViolations: [{ field: "contents", description: "SAFETY" }],
            },
          ],
        },
      });

      expect(classifyProviderError(error, MODEL)).toEqual({
        kind: "safety_blocked",
        message: `${SAFETY_HEAD} Reason(s): SAFETY${HINT}`,
      });
    });

    it("suggests a reset when a reason mentions the context", () => {
      const error = new ProviderClientError(400, "status 400", {
        error: {
          message: "Input was blocked",
          status: "INVALID_ARGUMENT",
          details: [
            {
              "@type": "type.googleapis.com/google.rpc.BadRequest",
              fieldViolations: [{ description: "CONTEXT_WINDOW_EXCEEDED" }],
            },
          ],
        },
      });

      expect(classifyProviderError(error, MODEL).message).toBe(
        `${SAFETY_HEAD} Reason(s): CONTEXT_WINDOW_EXCEEDED${TOO_LONG}${HINT}`
      );
    });
  });

  it("truncates the raw message of other client errors to 200 characters", () => {
    const error = new ProviderClientError(400, "x".repeat(250));
    expect(classifyProviderError(error, MODEL)).toEqual({
      kind: "bad_request",
      message: `Bad request to the AI model. Message: ${"x".repeat(200)}${HINT}`,
    });
  });

  it("asks for model reselection when the model is not found", () => {
    expect(
      classifyProviderError(new ProviderNotFoundError("no such model"), MODEL)
    ).toEqual({
      kind: "model_not_found",
      message:
        "The selected model `models/m` is not available or supported for conversations with your API key.\n\nPlease use `/select_model` to choose a different model.",
    });
  });

  it("reports the server code", () => {
    expect(
      classifyProviderError(new ProviderServerError(503, "unavailable"), MODEL)
    ).toEqual({
      kind: "server_error",
      message:
        "The AI service encountered a server error (Code: 503). Please try again later.",
    });
  });

  it("treats a permission denial during chat as a bad request", () => {
    const result = classifyProviderError(
      new ProviderPermissionDeniedError("denied"),
      MODEL
    );
    expect(result.kind).toBe("bad_request");
    expect(result.message).toBe(
      `Bad request to the AI model. Message: denied${HINT}`
    );
  });

  it("classifies anything else as unknown", () => {
    expect(classifyProviderError(new TypeError("boom"), MODEL)).toEqual({
      kind: "unknown",
      message: "An unexpected internal error occurred during AI interaction.",
    });
    expect(classifyProviderError("not an error", MODEL).kind).toBe("unknown");
  });
});

describe("classifyBlockedResponse", () => {
  it("surfaces the block reason", () => {
    expect(classifyBlockedResponse("PROHIBITED_CONTENT")).toEqual({
      kind: "safety_blocked",
      message: `${SAFETY_HEAD} Reason(s): PROHIBITED_CONTENT${HINT}`,
    });
  });
});
