// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Typed event logger; the payload shape is fixed by the event name.
 * Scope: Single function for request-level structured events. Does not create loggers.
 * Invariants: reqId MUST be present (throws under Vitest, logs an invariant line elsewhere); payload type comes from EventPayloads.
 * Side-effects: IO (logging)
 * Links: events/index.ts (names), events/settlement.ts (payloads)
 * @public
 */

import type { Logger } from "pino";

import type { EventPayloads } from "../events/settlement";

export function logEvent<N extends keyof EventPayloads>(
  logger: Logger,
  eventName: N,
  fields: EventPayloads[N],
  message?: string
): void {
  if (!fields.reqId) {
    if (process.env.VITEST === "true") {
      throw new Error(`logEvent("${eventName}") called without reqId`);
    }
    logger.error(
      { event: eventName, missingField: "reqId" },
      "inv_missing_reqId_in_logEvent"
    );
    return;
  }

  logger.info({ event: eventName, ...fields }, message ?? eventName);
}
