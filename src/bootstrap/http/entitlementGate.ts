// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/entitlementGate`
 * Purpose: Hono middleware that protects a paid resource with the entitlement ledger.
 * Scope: Answers 402 without access; after a 2xx response served on call credits, consumes exactly one credit.
 * Invariants:
 * - Access served by an active period window never consumes a credit.
 * - Non-2xx responses never consume a credit.
 * - A credit lost to a concurrent request after serving is logged, not surfaced (the response is already committed).
 * Side-effects: IO (ledger read/write via feature services, logging)
 * Links: features/settlement/services/access, features/settlement/services/metering
 * @public
 */

import type { Context, MiddlewareHandler } from "hono";

import {
  consumeCall,
  getAccessSnapshot,
  isSettlementDomainError,
} from "@/features/settlement/public";
import type { Caller } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  REQUEST_ID_HEADER,
  sanitizeReqId,
} from "@/shared/observability";

import type { Container } from "../container";

export interface EntitlementGateOptions {
  resolveAgentId(c: Context): bigint | null;
  resolvePayer(c: Context): `0x${string}` | null;
  /** Identity the gate meters under; needs the "meter" capability */
  meterCaller?: Caller;
}

const DEFAULT_METER_CALLER: Caller = {
  kind: "facilitator",
  id: "entitlement-gate",
};

export function entitlementGate(
  container: Container,
  options: EntitlementGateOptions
): MiddlewareHandler {
  const meterCaller = options.meterCaller ?? DEFAULT_METER_CALLER;

  return async (c, next) => {
    const reqId = sanitizeReqId(c.req.header(REQUEST_ID_HEADER));
    const agentId = options.resolveAgentId(c);
    const payer = options.resolvePayer(c);

    if (agentId === null || payer === null) {
      return c.json(
        {
          error: {
            code: "PAYMENT_REQUIRED",
            message: "Agent and payer must be identified",
          },
        },
        402
      );
    }

    const snapshot = await getAccessSnapshot(container, agentId, payer);
    if (!snapshot.hasAccess) {
      logEvent(container.log, EVENT_NAMES.ACCESS_GATE_DENIED, {
        reqId,
        agentId: agentId.toString(),
        payer,
      });
      return c.json(
        {
          error: {
            code: "PAYMENT_REQUIRED",
            message: `No entitlement for agent ${agentId}`,
          },
        },
        402
      );
    }

    await next();

    const served = c.res.status >= 200 && c.res.status < 300;
    if (!served || snapshot.periodActive) return;

    try {
      await consumeCall(container, meterCaller, agentId, payer);
    } catch (error) {
      if (!isSettlementDomainError(error) || error.code !== "NO_CREDITS") {
        throw error;
      }
      logEvent(container.log, EVENT_NAMES.ACCESS_GATE_METER_FAILED, {
        reqId,
        agentId: agentId.toString(),
        payer,
        errorCode: error.code,
      });
    }
  };
}
