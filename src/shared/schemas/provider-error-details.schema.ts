// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/schemas/provider-error-details.schema`
 * Purpose: Zod schema and decoder for provider error payloads (external API contract).
 * Scope: Zod schemas plus a single decode function. Does not choose user-facing text.
 * Invariants:
 *   - decodeProviderErrorDetails never throws; unknown shapes become { shape: "unparsed" }
 *   - Accepts the `{ error: { details: [...] } }` envelope, a bare detail list, or a JSON string of either
 *   - Non-object detail items are dropped, not fatal
 * Side-effects: none
 * Links: features/relay/services/provider-error-classifier
 * @public
 */

import { z } from "zod";

export const HelpLinkSchema = z.object({
  description: z.string().min(1),
  url: z.string().min(1),
});

export type HelpLink = z.infer<typeof HelpLinkSchema>;

const RawDetailSchema = z
  .object({
    "@type": z.string().optional(),
    links: z.unknown().optional(),
    fieldViolations: z.unknown().optional(),
  })
  .passthrough();

const FieldViolationSchema = z.object({
  field: z.string().optional(),
  description: z.string().optional(),
});

const EnvelopeSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    details: z.unknown().optional(),
  }),
});

export type ProviderErrorDetail =
  | { kind: "help"; links: HelpLink[] }
  | { kind: "bad_request"; violations: string[] }
  | { kind: "other"; typeUrl?: string | undefined };

export type DecodedErrorDetails =
  | {
      shape: "envelope";
      message?: string | undefined;
      status?: string | undefined;
      details: ProviderErrorDetail[];
    }
  | { shape: "detail_list"; details: ProviderErrorDetail[] }
  | { shape: "unparsed"; raw: unknown };

function decodeDetail(item: unknown): ProviderErrorDetail | null {
  const parsed = RawDetailSchema.safeParse(item);
  if (!parsed.success) return null;

  const typeUrl = parsed.data["@type"];

  if (typeUrl?.endsWith(".Help") && Array.isArray(parsed.data.links)) {
    const links: HelpLink[] = [];
    for (const link of parsed.data.links) {
      const linkResult = HelpLinkSchema.safeParse(link);
      if (linkResult.success) links.push(linkResult.data);
    }
    return { kind: "help", links };
  }

  if (
    typeUrl?.endsWith(".BadRequest") &&
    Array.isArray(parsed.data.fieldViolations)
  ) {
    const violations: string[] = [];
    for (const violation of parsed.data.fieldViolations) {
      const v = FieldViolationSchema.safeParse(violation);
      if (!v.success) continue;
      const text = v.data.description ?? v.data.field ?? "";
      if (text) violations.push(text);
    }
    return { kind: "bad_request", violations };
  }

  return { kind: "other", typeUrl };
}

function decodeDetailList(items: unknown): ProviderErrorDetail[] {
  if (!Array.isArray(items)) return [];
  const details: ProviderErrorDetail[] = [];
  for (const item of items) {
    const detail = decodeDetail(item);
    if (detail) details.push(detail);
  }
  return details;
}

function parseJsonString(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function decodeProviderErrorDetails(raw: unknown): DecodedErrorDetails {
  const value = typeof raw === "string" ? parseJsonString(raw) : raw;

  if (Array.isArray(value)) {
    return { shape: "detail_list", details: decodeDetailList(value) };
  }

  const envelope = EnvelopeSchema.safeParse(value);
  if (envelope.success) {
    return {
      shape: "envelope",
      message: envelope.data.error.message,
      status: envelope.data.error.status,
      details: decodeDetailList(envelope.data.error.details),
    };
  }

  return { shape: "unparsed", raw: value };
}

/** First usable help link across all help details. */
export function firstHelpLink(decoded: DecodedErrorDetails): HelpLink | undefined {
  if (decoded.shape === "unparsed") return undefined;
  for (const detail of decoded.details) {
    if (detail.kind === "help" && detail.links[0]) return detail.links[0];
  }
  return undefined;
}

export function fieldViolationReasons(decoded: DecodedErrorDetails): string[] {
  if (decoded.shape === "unparsed") return [];
  const reasons: string[] = [];
  for (const detail of decoded.details) {
    if (detail.kind === "bad_request") reasons.push(...detail.violations);
  }
  return reasons;
}
