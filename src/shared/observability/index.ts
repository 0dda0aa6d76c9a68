// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - events, logging, metrics, context.
 * Scope: Unified entry point for all observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports (structural typing only).
 * Side-effects: none
 * @public
 */

export type { Clock, RequestContext } from "./context";
export {
  createRequestContext,
  REQUEST_ID_HEADER,
  sanitizeReqId,
} from "./context";
export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type {
  AccessGateDeniedEvent,
  AccessGateMeterFailedEvent,
  EventPayloads,
  SettlementCompletedEvent,
  SettlementRejectedEvent,
  WithdrawalRejectedEvent,
  WithdrawalRestoredEvent,
} from "./events/settlement";
export type { Logger } from "./server";
export {
  httpRequestDurationMs,
  httpRequestsTotal,
  logEvent,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  logRequestWarn,
  makeLogger,
  makeNoopLogger,
  metricsRegistry,
  settlementRevenueUnitsTotal,
  settlementsTotal,
  statusBucket,
  withdrawalsTotal,
} from "./server";
