// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/routes/revenue.routes`
 * Purpose: HTTP endpoints for revenue balances and signed withdrawals.
 * Scope: GET /v1/revenue/:beneficiary, POST /v1/revenue/withdraw.
 * Invariants: The EIP-712 signature is the only credential for a withdrawal; outcomes are counted in withdrawals_total{outcome}.
 * Side-effects: IO (via feature services), metrics
 * @public
 */

import type { Hono } from "hono";

import {
  revenueBalanceOperation,
  revenueWithdrawOperation,
} from "@/contracts/revenue.v1.contract";
import {
  getRevenueBalance,
  isSettlementDomainError,
  withdrawWithSignature,
} from "@/features/settlement/public";
import {
  EVENT_NAMES,
  logEvent,
  type WithdrawalRestoredEvent,
  withdrawalsTotal,
} from "@/shared/observability";

import type { Container } from "../../container";
import { presentWithdrawal } from "../presenters";
import { readJsonBody, wrapRoute } from "../wrapRoute";

export function registerRevenueRoutes(app: Hono, container: Container): void {
  app.get(
    "/v1/revenue/:beneficiary",
    wrapRoute(container, { routeId: "revenue.balance" }, async (_ctx, c) => {
      const input = revenueBalanceOperation.input.parse(c.req.param());
      const { beneficiary, balance } = await getRevenueBalance(
        container,
        input.beneficiary
      );
      return c.json(
        revenueBalanceOperation.output.parse({
          beneficiary,
          balance: balance.toString(),
        })
      );
    })
  );

  app.post(
    "/v1/revenue/withdraw",
    wrapRoute(container, { routeId: "revenue.withdraw" }, async (ctx, c) => {
      const { signature, ...request } = revenueWithdrawOperation.input.parse(
        await readJsonBody(c)
      );

      try {
        const result = await withdrawWithSignature(
          container,
          request,
          signature
        );
        withdrawalsTotal.inc({ outcome: "withdrawn" });
        return c.json(
          revenueWithdrawOperation.output.parse(presentWithdrawal(result))
        );
      } catch (error) {
        if (!isSettlementDomainError(error)) {
          withdrawalsTotal.inc({ outcome: "INTERNAL" });
          throw error;
        }
        withdrawalsTotal.inc({ outcome: error.code });
        if (error.code === "TRANSFER_FAILED" && error.balanceRestored) {
          logEvent(ctx.log, EVENT_NAMES.WITHDRAWAL_RESTORED, {
            reqId: ctx.reqId,
            routeId: ctx.routeId,
            beneficiary: request.beneficiary,
            amount: request.amount.toString(),
          } satisfies WithdrawalRestoredEvent);
        } else {
          logEvent(ctx.log, EVENT_NAMES.WITHDRAWAL_REJECTED, {
            reqId: ctx.reqId,
            routeId: ctx.routeId,
            beneficiary: request.beneficiary,
            errorCode: error.code,
          });
        }
        throw error;
      }
    })
  );
}
