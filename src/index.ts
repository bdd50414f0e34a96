// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@/index`
 * Purpose: Process entry for whatever transport delivers chat events.
 * Scope: Resolve the container and hand one event to the relay dispatcher. Does not poll or receive updates itself.
 * Invariants: Resolves once the event is fully handled; never rejects for handler failures
 * Side-effects: IO (container initialization on first call)
 * Links: bootstrap/container, features/relay/services/dispatch-event
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import {
  dispatchInboundEvent,
  type InboundEvent,
  type RelayOutcome,
} from "@/features/relay/public";
import type { ChatTransportPort } from "@/ports";

export type {
  InboundEvent,
  RelayOutcome,
} from "@/features/relay/public";
export type {
  BinaryFile,
  ChatTransportPort,
  ReplyChoice,
  ReplyFormat,
} from "@/ports";

export async function handleInboundEvent(
  event: InboundEvent,
  transport: ChatTransportPort
): Promise<RelayOutcome> {
  const container = getContainer();
  return dispatchInboundEvent(
    { ...container.relay, transport },
    { baseLog: container.log, clock: container.clock },
    event
  );
}

export { closeDb as shutdown } from "@/adapters/server";
export { metricsRegistry } from "@/shared/observability";
