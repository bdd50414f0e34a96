// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/ai-provider.port`
 * Purpose: Port interface for the remote generative-AI provider plus typed provider errors.
 * Scope: Defines AiProviderPort, ProviderSession, response shapes, and the provider error classes. Does not contain implementations.
 * Invariants:
 *   - Provider errors are classified from HTTP status codes, not message text
 *   - Timeouts surface as ProviderServerError with code 504
 *   - ProviderSession.history() includes the seeded history plus every exchanged turn
 * Side-effects: none
 * Links: adapters/server/ai/genai-provider.adapter, features/relay/services/provider-error-classifier
 * @public
 */

import type { Part, TurnRole } from "@/core";

export interface ProviderTurn {
  role: TurnRole;
  parts: Part[];
}

export interface ProviderCandidate {
  parts: Part[];
}

export interface ProviderResponse {
  /** Aggregated text when the provider returns any */
  text?: string | undefined;
  candidates: ProviderCandidate[];
  /** Set when the provider blocked the prompt without an error status */
  blockReason?: string | undefined;
}

export interface ProviderSession {
  send(parts: Part[]): Promise<ProviderResponse>;
  history(): ProviderTurn[];
}

export interface CreateSessionParams {
  secret: string;
  model: string;
  history: ProviderTurn[];
}

export interface AiProviderPort {
  /** Lists models visible to the secret. Used to validate a newly entered secret. */
  listModels(secret: string): Promise<string[]>;
  createSession(params: CreateSessionParams): Promise<ProviderSession>;
}

export class ProviderNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderNotFoundError";
  }
}

export class ProviderPermissionDeniedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderPermissionDeniedError";
  }
}

/** 4xx other than 403/404. `details` is the raw payload, decoded later. */
export class ProviderClientError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "ProviderClientError";
  }
}

export class ProviderServerError extends Error {
  constructor(
    public readonly code: number,
    message: string
  ) {
    super(message);
    this.name = "ProviderServerError";
  }
}

export type ProviderError =
  | ProviderNotFoundError
  | ProviderPermissionDeniedError
  | ProviderClientError
  | ProviderServerError;

export type ProviderStatusClass =
  | "not_found"
  | "permission_denied"
  | "client"
  | "server"
  | "unknown";

export function classifyProviderStatus(status: number): ProviderStatusClass {
  if (status === 404) return "not_found";
  if (status === 403) return "permission_denied";
  if (status >= 400 && status < 500) return "client";
  if (status >= 500 && status < 600) return "server";
  return "unknown";
}

/** Build the typed error for a provider HTTP status, or undefined for non-error statuses. */
export function providerErrorFromStatus(
  status: number,
  message: string,
  details?: unknown
): ProviderError | undefined {
  switch (classifyProviderStatus(status)) {
    case "not_found":
      return new ProviderNotFoundError(message);
    case "permission_denied":
      return new ProviderPermissionDeniedError(message);
    case "client":
      return new ProviderClientError(status, message, details);
    case "server":
      return new ProviderServerError(status, message);
    case "unknown":
      return undefined;
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return (
    error instanceof ProviderNotFoundError ||
    error instanceof ProviderPermissionDeniedError ||
    error instanceof ProviderClientError ||
    error instanceof ProviderServerError
  );
}

export function isProviderNotFoundError(
  error: unknown
): error is ProviderNotFoundError {
  return error instanceof ProviderNotFoundError;
}

export function isProviderPermissionDeniedError(
  error: unknown
): error is ProviderPermissionDeniedError {
  return error instanceof ProviderPermissionDeniedError;
}

export function isProviderClientError(
  error: unknown
): error is ProviderClientError {
  return error instanceof ProviderClientError;
}

export function isProviderServerError(
  error: unknown
): error is ProviderServerError {
  return error instanceof ProviderServerError;
}
