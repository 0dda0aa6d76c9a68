// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/app`
 * Purpose: Build the Hono application for a container.
 * Scope: Registers every v1 route plus health and metrics. Does not listen (see bootstrap/server).
 * Invariants: Unknown paths answer 404 in the error envelope; unhandled errors follow config.unhandledErrorPolicy.
 * Side-effects: none
 * Links: bootstrap/http/routes/*, bootstrap/server
 * @public
 */

import { Hono } from "hono";

import { type Container, getContainer } from "./container";
import {
  registerAdminRoutes,
  registerMetaRoutes,
  registerPaymentRoutes,
  registerRevenueRoutes,
  registerSettlementRoutes,
} from "./http";

export function createApp(container: Container = getContainer()): Hono {
  const app = new Hono();

  registerMetaRoutes(app, container);
  registerSettlementRoutes(app, container);
  registerRevenueRoutes(app, container);
  registerPaymentRoutes(app, container);
  registerAdminRoutes(app, container);

  app.notFound((c) =>
    c.json(
      { error: { code: "NOT_FOUND", message: `No route for ${c.req.path}` } },
      404
    )
  );

  app.onError((error, c) => {
    if (container.config.unhandledErrorPolicy === "rethrow") {
      throw error;
    }
    container.log.error({ err: error }, "unhandled error outside route wrapper");
    return c.json(
      {
        error: {
          code: "INTERNAL_SERVER_ERROR",
          message: "Internal server error",
        },
      },
      500
    );
  });

  return app;
}
