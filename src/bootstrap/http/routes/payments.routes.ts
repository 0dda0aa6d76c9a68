// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/routes/payments.routes`
 * Purpose: Payment id and authorization nonce status endpoints for facilitators.
 * Scope: GET /v1/payments/:paymentId, GET /v1/authorizations/:payer/:nonce. Read-only.
 * Side-effects: IO (ledger and token reads)
 * @public
 */

import type { Hono } from "hono";

import {
  authorizationStateOperation,
  paymentStatusOperation,
} from "@/contracts/payments.status.v1.contract";
import {
  getAuthorizationState,
  getPaymentStatus,
} from "@/features/settlement/public";

import type { Container } from "../../container";
import { presentPaymentStatus } from "../presenters";
import { wrapRoute } from "../wrapRoute";

export function registerPaymentRoutes(app: Hono, container: Container): void {
  app.get(
    "/v1/payments/:paymentId",
    wrapRoute(container, { routeId: "payments.status" }, async (_ctx, c) => {
      const input = paymentStatusOperation.input.parse(c.req.param());
      const status = await getPaymentStatus(container.ledger, input.paymentId);
      return c.json(
        paymentStatusOperation.output.parse(presentPaymentStatus(status))
      );
    })
  );

  app.get(
    "/v1/authorizations/:payer/:nonce",
    wrapRoute(
      container,
      { routeId: "authorizations.state" },
      async (_ctx, c) => {
        const input = authorizationStateOperation.input.parse(c.req.param());
        const state = await getAuthorizationState(
          container.token,
          input.payer,
          input.nonce
        );
        return c.json(authorizationStateOperation.output.parse(state));
      }
    )
  );
}
