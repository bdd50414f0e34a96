// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/genai-provider.adapter`
 * Purpose: AiProviderPort implementation over the @google/genai SDK.
 * Scope: Model listing, chat session creation, part conversion and error mapping. Does not choose user-facing text or persist anything.
 * Invariants:
 *   - Never logs secrets or message content
 *   - Every network call is bounded by timeoutMs; expiry throws ProviderServerError(504)
 *   - ApiError statuses map through providerErrorFromStatus; the JSON tail of the message is passed on as details
 *   - history() drops a trailing model turn with no parts, so a blocked reply shows as a lone user turn
 * Side-effects: IO (HTTPS calls to the provider)
 * Notes: Clients are cached per secret in a bounded LRU.
 * Links: AiProviderPort, provider-client-cache
 * @internal
 */

import {
  ApiError,
  type Chat,
  type Content,
  type GenerateContentResponse,
  GoogleGenAI,
  type Part as GenaiPart,
} from "@google/genai";
import type { Logger } from "pino";

import { describeImageReference, type Part } from "@/core";
import {
  type AiProviderPort,
  type CreateSessionParams,
  type ProviderResponse,
  ProviderServerError,
  type ProviderSession,
  type ProviderTurn,
  providerErrorFromStatus,
} from "@/ports";

import { ProviderClientCache } from "./provider-client-cache";

export interface GenAiProviderConfig {
  timeoutMs: number;
  clientCacheSize: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toGenaiPart(part: Part): GenaiPart {
  switch (part.type) {
    case "text":
      return { text: part.text };
    case "image":
      if (part.data) {
        return {
          inlineData: {
            mimeType: part.mimeType,
            data: Buffer.from(part.data).toString("base64"),
          },
        };
      }
      return { text: describeImageReference(part.mimeType, part.caption) };
    case "function_call":
      return { functionCall: { name: part.name, args: part.args } };
    case "function_response":
      return { functionResponse: { name: part.name, response: part.response } };
  }
}

export function fromGenaiPart(part: GenaiPart): Part | undefined {
  if (typeof part.text === "string") {
    return { type: "text", text: part.text };
  }
  if (part.inlineData) {
    return {
      type: "image",
      mimeType: part.inlineData.mimeType ?? "application/octet-stream",
    };
  }
  if (part.functionCall) {
    return {
      type: "function_call",
      name: part.functionCall.name ?? "",
      args: isRecord(part.functionCall.args) ? part.functionCall.args : {},
    };
  }
  if (part.functionResponse) {
    return {
      type: "function_response",
      name: part.functionResponse.name ?? "",
      response: isRecord(part.functionResponse.response)
        ? part.functionResponse.response
        : {},
    };
  }
  return undefined;
}

function fromGenaiParts(parts: GenaiPart[] | undefined): Part[] {
  const out: Part[] = [];
  for (const part of parts ?? []) {
    const converted = fromGenaiPart(part);
    if (converted) out.push(converted);
  }
  return out;
}

function toContent(turn: ProviderTurn): Content {
  return { role: turn.role, parts: turn.parts.map(toGenaiPart) };
}

export function toProviderResponse(
  response: GenerateContentResponse
): ProviderResponse {
  return {
    text: response.text,
    candidates: (response.candidates ?? []).map((candidate) => ({
      parts: fromGenaiParts(candidate.content?.parts),
    })),
    blockReason: response.promptFeedback?.blockReason,
  };
}

/** The SDK embeds the provider's JSON error body after the status line. */
function extractErrorBody(message: string): string | undefined {
  const start = message.indexOf("{");
  return start >= 0 ? message.slice(start) : undefined;
}

export class GenAiProviderAdapter implements AiProviderPort {
  private readonly clients: ProviderClientCache<GoogleGenAI>;

  constructor(
    private readonly config: GenAiProviderConfig,
    private readonly log: Logger
  ) {
    this.clients = new ProviderClientCache(config.clientCacheSize);
  }

  private client(secret: string): GoogleGenAI {
    return this.clients.getOrCreate(
      secret,
      (apiKey) => new GoogleGenAI({ apiKey })
    );
  }

  async listModels(secret: string): Promise<string[]> {
    return this.call("listModels", async (signal) => {
      const pager = await this.client(secret).models.list({
        config: { pageSize: 100, abortSignal: signal },
      });
      const names: string[] = [];
      for await (const model of pager) {
        if (model.name) names.push(model.name);
      }
      return names;
    });
  }

  async createSession(params: CreateSessionParams): Promise<ProviderSession> {
    const chat = this.client(params.secret).chats.create({
      model: params.model,
      history: params.history.map(toContent),
    });
    return new GenAiProviderSession(chat, (op, fn) => this.call(op, fn));
  }

  /** Run one provider call under the timeout and translate SDK errors to port errors. */
  private async call<T>(
    op: string,
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const signal = AbortSignal.timeout(this.config.timeoutMs);
    try {
      return await fn(signal);
    } catch (error) {
      if (error instanceof ApiError) {
        const mapped = providerErrorFromStatus(
          error.status,
          error.message,
          extractErrorBody(error.message)
        );
        this.log.warn({ op, status: error.status }, "provider call failed");
        throw mapped ?? error;
      }
      if (
        error instanceof Error &&
        (error.name === "AbortError" || error.name === "TimeoutError")
      ) {
        this.log.warn({ op, timeoutMs: this.config.timeoutMs }, "provider call timed out");
        throw new ProviderServerError(
          504,
          `Provider call timed out after ${this.config.timeoutMs}ms`
        );
      }
      throw error;
    }
  }
}

type CallRunner = <T>(
  op: string,
  fn: (signal: AbortSignal) => Promise<T>
) => Promise<T>;

class GenAiProviderSession implements ProviderSession {
  constructor(
    private readonly chat: Chat,
    private readonly run: CallRunner
  ) {}

  send(parts: Part[]): Promise<ProviderResponse> {
    return this.run("send", async (signal) => {
      const response = await this.chat.sendMessage({
        message: parts.map(toGenaiPart),
        config: { abortSignal: signal },
      });
      return toProviderResponse(response);
    });
  }

  history(): ProviderTurn[] {
    const turns: ProviderTurn[] = [];
    for (const content of this.chat.getHistory()) {
      const role = content.role === "model" ? "model" : "user";
      turns.push({ role, parts: fromGenaiParts(content.parts) });
    }
    const last = turns.at(-1);
    if (last?.role === "model" && last.parts.length === 0) turns.pop();
    return turns;
  }
}
