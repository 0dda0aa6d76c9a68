// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/routes/meta.routes`
 * Purpose: Liveness, readiness and Prometheus scrape endpoints.
 * Scope: GET /livez, GET /readyz, GET /metrics (METRICS_TOKEN bearer auth).
 * Invariants: /livez never touches dependencies; /metrics refuses to serve when METRICS_TOKEN is unset.
 * Side-effects: IO (readiness probe, metrics registry read)
 * @internal
 */

import type { Hono } from "hono";

import { metaLivezOperation } from "@/contracts/meta.livez.read.v1.contract";
import {
  type MetaReadyzOutput,
  metaReadyzOperation,
} from "@/contracts/meta.readyz.read.v1.contract";
import { metricsRegistry } from "@/shared/observability";

import type { Container } from "../../container";
import { extractBearerToken, matchesToken } from "../auth";
import { wrapRoute } from "../wrapRoute";

export function registerMetaRoutes(app: Hono, container: Container): void {
  app.get(
    "/livez",
    wrapRoute(container, { routeId: "meta.livez" }, async (_ctx, c) =>
      c.json(
        metaLivezOperation.output.parse({
          status: "alive",
          timestamp: container.clock.now(),
        })
      )
    )
  );

  app.get(
    "/readyz",
    wrapRoute(container, { routeId: "meta.readyz" }, async (_ctx, c) => {
      const ledger = await container.checkReadiness();
      const body: MetaReadyzOutput = {
        status: ledger ? "ready" : "not_ready",
        timestamp: container.clock.now(),
        checks: { ledger },
      };
      return c.json(
        metaReadyzOperation.output.parse(body),
        ledger ? 200 : 503
      );
    })
  );

  app.get(
    "/metrics",
    wrapRoute(container, { routeId: "meta.metrics" }, async (_ctx, c) => {
      const configuredToken = container.config.apiTokens.metrics;
      if (!configuredToken) {
        return c.json(
          {
            error: {
              code: "METRICS_NOT_CONFIGURED",
              message: "METRICS_TOKEN not configured",
            },
          },
          500
        );
      }

      const provided = extractBearerToken(c.req.header("authorization"));
      if (!matchesToken(provided, configuredToken)) {
        return c.json(
          { error: { code: "UNAUTHORIZED", message: "Unauthorized" } },
          401
        );
      }

      const metrics = await metricsRegistry.metrics();
      return new Response(metrics, {
        headers: {
          "Content-Type": metricsRegistry.contentType,
          "Cache-Control": "no-store",
        },
      });
    })
  );
}
