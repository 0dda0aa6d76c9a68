// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Server-side logging and metrics utilities (pino, prom-client).
 * Scope: Logger factory, helpers, logEvent() and metric handles. Does not define events.
 * Side-effects: IO (logging to stdout)
 * Links: Uses event registry from ../events
 * @public
 */

export type { Logger } from "../logging";
export {
  logRequestEnd,
  logRequestError,
  logRequestStart,
  logRequestWarn,
  makeLogger,
  makeNoopLogger,
} from "../logging";
export { logEvent } from "./logEvent";
export {
  httpRequestDurationMs,
  httpRequestsTotal,
  metricsRegistry,
  settlementRevenueUnitsTotal,
  settlementsTotal,
  statusBucket,
  withdrawalsTotal,
} from "./metrics";
