// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Factory for creating event-scoped context with a sanitized reqId.
 * Scope: Create RequestContext with child logger. Does not manage context lifecycle.
 * Invariants: reqId is validated (max 64 chars, alphanumeric + _-) or freshly generated.
 * Side-effects: none
 * Links: Returns RequestContext; called by the inbound event dispatcher.
 * @public
 */

import type { Logger } from "pino";

import type { Clock, RequestContext } from "./types";

const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

function sanitizeReqId(incoming: string | undefined): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return crypto.randomUUID();
}

/**
 * @param meta - Inbound event metadata; reqId is taken from the transport when it supplies one
 */
export function createRequestContext(
  deps: { baseLog: Logger; clock: Clock },
  meta: { chatId: number; eventKind: string; reqId?: string | undefined }
): RequestContext {
  const reqId = sanitizeReqId(meta.reqId);

  return {
    log: deps.baseLog.child({
      reqId,
      chatId: meta.chatId,
      eventKind: meta.eventKind,
    }),
    reqId,
    clock: deps.clock,
  };
}
