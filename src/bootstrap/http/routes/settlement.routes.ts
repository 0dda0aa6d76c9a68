// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/routes/settlement.routes`
 * Purpose: HTTP endpoints for settlement intake, access queries and metering.
 * Scope: POST /v1/settlements, GET /v1/access/:agentId/:payer, POST /v1/metering/consume.
 * Invariants: Settlement outcomes are counted in settlements_total{outcome} and logged as settlement.completed/rejected.
 * Side-effects: IO (via feature services), metrics
 * Links: features/settlement/public, contracts/settlement.settle.v1.contract
 * @public
 */

import type { Hono } from "hono";

import { accessReadOperation } from "@/contracts/access.read.v1.contract";
import { meteringConsumeOperation } from "@/contracts/metering.consume.v1.contract";
import { settleOperation } from "@/contracts/settlement.settle.v1.contract";
import {
  consumeCall,
  getAccessSnapshot,
  isSettlementDomainError,
  settle,
} from "@/features/settlement/public";
import {
  EVENT_NAMES,
  logEvent,
  type SettlementCompletedEvent,
  type SettlementRejectedEvent,
  settlementsTotal,
} from "@/shared/observability";

import type { Container } from "../../container";
import { resolveCaller } from "../auth";
import { presentAccess, presentSettlement } from "../presenters";
import { readJsonBody, wrapRoute } from "../wrapRoute";

export function registerSettlementRoutes(app: Hono, container: Container): void {
  app.post(
    "/v1/settlements",
    wrapRoute(container, { routeId: "settlement.settle" }, async (ctx, c) => {
      const caller = resolveCaller(
        c.req.header("authorization"),
        container.config.apiTokens
      );
      const input = settleOperation.input.parse(await readJsonBody(c));
      const start = performance.now();

      try {
        const result = await settle(
          container,
          caller,
          {
            paymentId: input.paymentId,
            skuId: input.skuId,
            agentId: input.agentId,
            payer: input.payer,
            amount: input.amount,
          },
          input.usdcAuth
        );

        settlementsTotal.inc({ outcome: "settled" });
        logEvent(ctx.log, EVENT_NAMES.SETTLEMENT_COMPLETED, {
          reqId: ctx.reqId,
          routeId: ctx.routeId,
          paymentId: result.paymentId,
          agentId: input.agentId.toString(),
          skuId: input.skuId.toString(),
          amount: input.amount.toString(),
          fee: result.fee.toString(),
          durationMs: performance.now() - start,
        } satisfies SettlementCompletedEvent);

        return c.json(settleOperation.output.parse(presentSettlement(result)));
      } catch (error) {
        const errorCode = isSettlementDomainError(error)
          ? error.code
          : "INTERNAL";
        settlementsTotal.inc({ outcome: errorCode });
        logEvent(ctx.log, EVENT_NAMES.SETTLEMENT_REJECTED, {
          reqId: ctx.reqId,
          routeId: ctx.routeId,
          paymentId: input.paymentId,
          errorCode,
          durationMs: performance.now() - start,
        } satisfies SettlementRejectedEvent);
        throw error;
      }
    })
  );

  app.get(
    "/v1/access/:agentId/:payer",
    wrapRoute(container, { routeId: "access.read" }, async (_ctx, c) => {
      const input = accessReadOperation.input.parse(c.req.param());
      const snapshot = await getAccessSnapshot(
        container,
        input.agentId,
        input.payer
      );
      return c.json(accessReadOperation.output.parse(presentAccess(snapshot)));
    })
  );

  app.post(
    "/v1/metering/consume",
    wrapRoute(container, { routeId: "metering.consume" }, async (_ctx, c) => {
      const caller = resolveCaller(
        c.req.header("authorization"),
        container.config.apiTokens
      );
      const input = meteringConsumeOperation.input.parse(await readJsonBody(c));
      const record = await consumeCall(
        container,
        caller,
        input.agentId,
        input.payer
      );
      return c.json(
        meteringConsumeOperation.output.parse({
          agentId: record.agentId.toString(),
          payer: record.payer,
          remainingCredits: record.callCredits.toString(),
        })
      );
    })
  );
}
