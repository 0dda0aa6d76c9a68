// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/helpers`
 * Purpose: Standardized request logging helpers.
 * Scope: Consistent request start/end/error lines. Does not handle domain events (see logEvent).
 * Invariants: Same keys everywhere (route, reqId, method, status, durationMs).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Links: Used by bootstrap/http/wrapRoute
 * @public
 */

import type { Logger } from "pino";

export function logRequestStart(log: Logger): void {
  log.info("request received");
}

/**
 * @param log - Request-scoped child logger (route, reqId, method already bound)
 */
export function logRequestEnd(
  log: Logger,
  meta: {
    status: number;
    durationMs: number;
  }
): void {
  const level =
    meta.status >= 500 ? "error" : meta.status >= 400 ? "warn" : "info";
  log[level](
    { status: meta.status, durationMs: meta.durationMs },
    "request complete"
  );
}

/**
 * @param errorCode - Stable app error code for classification
 */
export function logRequestError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "request failed");
}

/**
 * Expected client-side failures (domain rejections) at warn, without stack
 */
export function logRequestWarn(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  const message = error instanceof Error ? error.message : String(error);
  log.warn({ errorCode, reason: message }, "request rejected");
}
