// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/provider-error-classifier`
 * Purpose: Map provider failures onto a closed taxonomy and the reply text each kind gets.
 * Scope: Pure classification of port-level provider errors and response block reasons. Does not log or send replies.
 * Invariants:
 *   - Never throws; any error shape classifies (worst case "unknown")
 *   - At most one documentation link in a rate-limit reply
 *   - Client-side kinds (rate_limited, safety_blocked, bad_request) end with the select-model hint
 *   - Raw provider messages are cut to 200 characters before reaching a reply
 * Side-effects: none
 * Links: ports/ai-provider.port, shared/schemas/provider-error-details.schema
 * @public
 */

import {
  isProviderClientError,
  isProviderNotFoundError,
  isProviderPermissionDeniedError,
  isProviderServerError,
} from "@/ports";
import {
  type DecodedErrorDetails,
  decodeProviderErrorDetails,
  fieldViolationReasons,
  firstHelpLink,
} from "@/shared/schemas/provider-error-details.schema";

import {
  badRequest,
  modelNotFound,
  RATE_LIMIT_DOCS_URL,
  rateLimited,
  REPLIES,
  SELECT_MODEL_HINT,
  serverError,
  TOO_LONG_HINT,
} from "../replies";

export type ProviderErrorKind =
  | "rate_limited"
  | "model_not_found"
  | "safety_blocked"
  | "bad_request"
  | "server_error"
  | "unknown";

export interface ClassifiedProviderError {
  kind: ProviderErrorKind;
  /** Reply text for the user */
  message: string;
}

export const MAX_PROVIDER_MESSAGE_LENGTH = 200;

const TOO_LONG_MARKERS = ["LENGTH", "CONTEXT", "TOO_LARGE"];

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

function rateLimitLink(decoded: DecodedErrorDetails): string {
  const link = firstHelpLink(decoded);
  if (link) return `\n\n[${link.description}](${link.url})`;
  return `\n\nLearn more about Gemini API quotas: ${RATE_LIMIT_DOCS_URL}`;
}

function safetyMessage(reasons: string[], context: string): string {
  let text: string = REPLIES.safetyBlocked;
  if (reasons.length > 0) {
    text += ` Reason(s): ${reasons.join(", ")}`;
  }
  const haystack = `${context} ${reasons.join(" ")}`.toUpperCase();
  if (TOO_LONG_MARKERS.some((marker) => haystack.includes(marker))) {
    text += TOO_LONG_HINT;
  }
  return text;
}

function isRateLimited(
  code: number,
  message: string,
  decoded: DecodedErrorDetails
): boolean {
  if (code === 429) return true;
  if (decoded.shape === "envelope" && decoded.status === "RESOURCE_EXHAUSTED") {
    return true;
  }
  return message.toUpperCase().includes("RESOURCE_EXHAUSTED");
}

function isSafetyBlock(message: string, decoded: DecodedErrorDetails): boolean {
  if (decoded.shape === "envelope" && decoded.status === "BLOCKED") return true;
  return /blocked|safety/i.test(message);
}

/** Reply for a successful response that carried a block reason and no text. */
export function classifyBlockedResponse(
  blockReason: string
): ClassifiedProviderError {
  return {
    kind: "safety_blocked",
    message: safetyMessage([blockReason], blockReason) + SELECT_MODEL_HINT,
  };
}

/**
 * Classify an error thrown by AiProviderPort.
 * @param model - Model the user had selected, named in rate-limit and not-found replies
 */
export function classifyProviderError(
  error: unknown,
  model: string
): ClassifiedProviderError {
  if (isProviderNotFoundError(error)) {
    return { kind: "model_not_found", message: modelNotFound(model) };
  }

  if (isProviderServerError(error)) {
    return { kind: "server_error", message: serverError(error.code) };
  }

  if (isProviderClientError(error)) {
    const decoded = decodeProviderErrorDetails(error.details);
    const providerMessage =
      decoded.shape === "envelope" && decoded.message
        ? decoded.message
        : error.message;

    if (isRateLimited(error.code, providerMessage, decoded)) {
      return {
        kind: "rate_limited",
        message: rateLimited(model) + rateLimitLink(decoded) + SELECT_MODEL_HINT,
      };
    }

    if (isSafetyBlock(providerMessage, decoded)) {
      return {
        kind: "safety_blocked",
        message:
          safetyMessage(fieldViolationReasons(decoded), providerMessage) +
          SELECT_MODEL_HINT,
      };
    }

    return {
      kind: "bad_request",
      message:
        badRequest(truncate(providerMessage, MAX_PROVIDER_MESSAGE_LENGTH)) +
        SELECT_MODEL_HINT,
    };
  }

  // A key that lists models but is refused for this model reads as a bad request
  if (isProviderPermissionDeniedError(error)) {
    return {
      kind: "bad_request",
      message:
        badRequest(truncate(error.message, MAX_PROVIDER_MESSAGE_LENGTH)) +
        SELECT_MODEL_HINT,
    };
  }

  return { kind: "unknown", message: REPLIES.unexpectedProviderError };
}
