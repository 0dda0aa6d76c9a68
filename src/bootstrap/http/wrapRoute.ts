// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/wrapRoute`
 * Purpose: Route wrapper that removes boilerplate for the request logging envelope, error mapping and metrics.
 * Scope: Handles ctx creation, timing, envelope logging, domain/validation error responses and Prometheus metrics. Does not implement route-specific business logic.
 * Invariants: Always logs request start/end exactly once; always measures duration; always records metrics (even on 5xx).
 * Side-effects: IO (creates request context, emits structured log entries, records Prometheus metrics)
 * Notes: Mapped errors (zod, domain) are answered here and logged at warn.
 *        Unmapped errors are logged, then rethrown when unhandledErrorPolicy is "rethrow" (test) or answered with 500 (production).
 *        Every response carries the x-request-id it was logged under.
 * Links: bootstrap/http/errorMapping, shared/observability/server/metrics
 * @public
 */

import type { Context } from "hono";

import {
  createRequestContext,
  httpRequestDurationMs,
  httpRequestsTotal,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  logRequestWarn,
  REQUEST_ID_HEADER,
  type RequestContext,
  statusBucket,
} from "@/shared/observability";

import type { Container } from "../container";
import { MalformedBodyError, mapError } from "./errorMapping";

export type RouteHandler = (
  ctx: RequestContext,
  c: Context
) => Promise<Response>;

export interface WrapOptions {
  /** Route identifier for logs and metrics (e.g., "settlement.settle") */
  routeId: string;
}

/**
 * Reads the JSON body, raising MalformedBodyError (400) when it does not parse
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new MalformedBodyError();
  }
}

/**
 * @example
 * app.post("/v1/settlements", wrapRoute(container, { routeId: "settlement.settle" }, async (ctx, c) => {
 *   const input = settleOperation.input.parse(await readJsonBody(c));
 *   ...
 *   return c.json(settleOperation.output.parse(result));
 * }));
 */
export function wrapRoute(
  container: Container,
  options: WrapOptions,
  handler: RouteHandler
): (c: Context) => Promise<Response> {
  return async (c: Context): Promise<Response> => {
    const ctx = createRequestContext(
      { baseLog: container.log, clock: container.clock },
      { method: c.req.method, header: (name) => c.req.header(name) },
      { routeId: options.routeId }
    );
    const { unhandledErrorPolicy } = container.config;

    logRequestStart(ctx.log);
    const start = performance.now();

    let responseStatus = 500;
    let response: Response;

    try {
      response = await handler(ctx, c);
      responseStatus = response.status;
    } catch (error) {
      const mapped = mapError(error);
      if (mapped) {
        logRequestWarn(ctx.log, error, mapped.code);
        responseStatus = mapped.status;
        response = c.json(mapped.body, mapped.status);
      } else {
        responseStatus = 500;
        logRequestError(ctx.log, error, "INTERNAL_SERVER_ERROR");

        if (unhandledErrorPolicy === "rethrow") {
          throw error;
        }

        response = c.json(
          {
            error: {
              code: "INTERNAL_SERVER_ERROR",
              message: "Internal server error",
            },
          },
          500
        );
      }
    } finally {
      const durationMs = performance.now() - start;

      logRequestEnd(ctx.log, { status: responseStatus, durationMs });

      httpRequestsTotal.inc({
        route: options.routeId,
        method: c.req.method,
        status: statusBucket(responseStatus),
      });
      httpRequestDurationMs.observe(
        { route: options.routeId, method: c.req.method },
        durationMs
      );
    }

    response.headers.set(REQUEST_ID_HEADER, ctx.reqId);
    return response;
  };
}
