// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Factory for request-scoped context with sanitized reqId.
 * Scope: Create RequestContext with child logger; sanitize incoming x-request-id. Does not manage context lifecycle.
 * Invariants: reqId is validated (max 64 chars, alphanumeric + _-); routeId is stable identifier.
 * Side-effects: none
 * Links: Called by bootstrap/http/wrapRoute
 * @public
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import type { Clock, RequestContext } from "./types";

export const REQUEST_ID_HEADER = "x-request-id";
const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Max 64 chars, alphanumeric + _- only; anything else gets a fresh UUID.
 */
export function sanitizeReqId(incoming: string | null | undefined): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return randomUUID();
}

export function createRequestContext(
  deps: { baseLog: Logger; clock: Clock },
  request: { method: string; header(name: string): string | undefined },
  meta: { routeId: string }
): RequestContext {
  const reqId = sanitizeReqId(request.header(REQUEST_ID_HEADER));

  return {
    log: deps.baseLog.child({
      reqId,
      route: meta.routeId,
      method: request.method,
    }),
    reqId,
    routeId: meta.routeId,
    clock: deps.clock,
  };
}
