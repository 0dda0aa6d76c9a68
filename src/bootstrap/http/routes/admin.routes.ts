// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/routes/admin.routes`
 * Purpose: Admin endpoints for the platform fee and treasury address.
 * Scope: GET /v1/admin/fee-config, PUT /v1/admin/fee-basis-points, PUT /v1/admin/treasury. Admin bearer token required.
 * Side-effects: IO (via feature services)
 * @public
 */

import type { Hono } from "hono";

import {
  adminFeeBasisPointsUpdateOperation,
  adminFeeConfigReadOperation,
  adminTreasuryUpdateOperation,
} from "@/contracts/admin.fee-config.v1.contract";
import {
  getFeeConfig,
  setFeeBasisPoints,
  setTreasury,
} from "@/features/settlement/public";

import type { Container } from "../../container";
import { resolveCaller } from "../auth";
import { presentFeeConfig } from "../presenters";
import { readJsonBody, wrapRoute } from "../wrapRoute";

export function registerAdminRoutes(app: Hono, container: Container): void {
  const callerOf = (authorization: string | undefined) =>
    resolveCaller(authorization, container.config.apiTokens);

  app.get(
    "/v1/admin/fee-config",
    wrapRoute(container, { routeId: "admin.fee_config" }, async (_ctx, c) => {
      const config = await getFeeConfig(
        container,
        callerOf(c.req.header("authorization"))
      );
      return c.json(
        adminFeeConfigReadOperation.output.parse(presentFeeConfig(config))
      );
    })
  );

  app.put(
    "/v1/admin/fee-basis-points",
    wrapRoute(
      container,
      { routeId: "admin.fee_basis_points" },
      async (_ctx, c) => {
        const caller = callerOf(c.req.header("authorization"));
        const input = adminFeeBasisPointsUpdateOperation.input.parse(
          await readJsonBody(c)
        );
        const config = await setFeeBasisPoints(
          container,
          caller,
          input.feeBasisPoints
        );
        return c.json(
          adminFeeBasisPointsUpdateOperation.output.parse(
            presentFeeConfig(config)
          )
        );
      }
    )
  );

  app.put(
    "/v1/admin/treasury",
    wrapRoute(container, { routeId: "admin.treasury" }, async (_ctx, c) => {
      const caller = callerOf(c.req.header("authorization"));
      const input = adminTreasuryUpdateOperation.input.parse(
        await readJsonBody(c)
      );
      const config = await setTreasury(
        container,
        caller,
        input.treasuryAddress
      );
      return c.json(
        adminTreasuryUpdateOperation.output.parse(presentFeeConfig(config))
      );
    })
  );
}
