// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/reply-text`
 * Purpose: Derive the reply text from a successful provider response.
 * Scope: Pure selection over text, candidate fragments and function parts. Does not handle block reasons.
 * Invariants: Always returns a non-empty string
 * Side-effects: none
 * Links: services/conversation-turn
 * @public
 */

import type { FunctionCallPart, Part } from "@/core";
import type { ProviderResponse } from "@/ports";

import { REPLIES } from "../replies";

function describeFunctionCall(part: FunctionCallPart): string {
  const args = Object.keys(part.args).length > 0 ? JSON.stringify(part.args) : "";
  return `- \`${part.name}(${args})\``;
}

/** Concatenated text fragments of every candidate, or "" when there are none. */
export function candidateText(response: ProviderResponse): string {
  const fragments: string[] = [];
  for (const candidate of response.candidates) {
    for (const part of candidate.parts) {
      if (part.type === "text" && part.text) fragments.push(part.text);
    }
  }
  return fragments.join("");
}

export function hasReplyText(response: ProviderResponse): boolean {
  return Boolean(response.text) || candidateText(response).length > 0;
}

export function deriveReplyText(response: ProviderResponse): string {
  if (response.text) return response.text;

  const text = candidateText(response);
  if (text) return text;

  const parts: Part[] = response.candidates.flatMap((c) => c.parts);

  const calls = parts.filter(
    (part): part is FunctionCallPart => part.type === "function_call"
  );
  if (calls.length > 0) {
    return [
      "Model wants to call a function:",
      ...calls.map(describeFunctionCall),
    ].join("\n");
  }

  if (parts.some((part) => part.type === "function_response")) {
    return REPLIES.functionResponseReceived;
  }

  if (response.candidates.length > 0) return REPLIES.unrecognizedCandidates;
  return REPLIES.noValidResponse;
}
