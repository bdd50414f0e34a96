// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/secret-entry`
 * Purpose: Handle the message that answers a pending secret-entry prompt.
 * Scope: Validate the candidate secret with the provider, persist it, reset history and reply. Does not manage the pending flag (the orchestrator consumed it).
 * Invariants:
 *   - An empty candidate is rejected before any provider or store call
 *   - Validation or save failure leaves the previous secret in effect
 *   - Saving a secret resets the message count to 0 and clears history
 *   - The secret is only logged masked
 * Side-effects: IO (provider listModels, settings write, history delete, transport reply)
 * Links: services/session-orchestrator, ports/ai-provider.port
 * @public
 */

import { type ChatId, maskSecret } from "@/core";
import {
  isProviderPermissionDeniedError,
  isStoreUnavailableError,
} from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { REPLIES, secretValidationFailed } from "../replies";
import type { RelayDeps, RelayOutcome } from "../types";

const MAX_ERROR_DETAIL_LENGTH = 200;

export async function handleSecretEntry(
  deps: RelayDeps,
  ctx: RequestContext,
  chatId: ChatId,
  input: string | undefined
): Promise<RelayOutcome> {
  const log = ctx.log.child({ feature: "relay.secret_entry" });
  const candidate = input?.trim() ?? "";

  if (!candidate) {
    await deps.transport.send(chatId, REPLIES.secretEmpty);
    return "rejected";
  }

  const masked = maskSecret(candidate);

  try {
    await deps.provider.listModels(candidate);
  } catch (error) {
    const reason = isProviderPermissionDeniedError(error)
      ? "permission_denied"
      : "validation_failed";
    logEvent(
      log,
      EVENT_NAMES.RELAY_SECRET_REJECTED,
      { reqId: ctx.reqId, chatId, secretMasked: masked, reason, err: error },
      undefined,
      "warn"
    );
    const text =
      reason === "permission_denied"
        ? REPLIES.secretPermissionDenied
        : secretValidationFailed(
            (error instanceof Error ? error.message : String(error)).slice(
              0,
              MAX_ERROR_DETAIL_LENGTH
            )
          );
    await deps.transport.send(chatId, text);
    return "secret_rejected";
  }

  let model: string;
  try {
    model = (await deps.settings.get(chatId)).model;
  } catch (error) {
    if (!isStoreUnavailableError(error)) throw error;
    logEvent(
      log,
      EVENT_NAMES.RELAY_STORE_UNAVAILABLE,
      { reqId: ctx.reqId, chatId, store: error.store },
      undefined,
      "error"
    );
    await deps.transport.send(chatId, REPLIES.secretSettingsUnavailable);
    return "store_unavailable";
  }

  const saved = await deps.settings.upsert(chatId, candidate, model, 0);
  if (!saved) {
    await deps.transport.send(chatId, REPLIES.secretSaveFailed);
    return "failed";
  }

  const cleared = await deps.history.clear(chatId);
  if (!cleared) {
    log.warn({ chatId }, "history not cleared after secret change");
  }

  logEvent(log, EVENT_NAMES.RELAY_SECRET_SET, {
    reqId: ctx.reqId,
    chatId,
    secretMasked: masked,
    model,
  });
  await deps.transport.send(chatId, REPLIES.secretSet);
  return "secret_set";
}
