// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Request-level event names only. Domain events (settlement.revenue_accrued etc.) travel through SettlementEventSink and are typed in ports.
 * Invariants: Every name has a payload type in EventPayloads (events/settlement.ts); logEvent() enforces reqId.
 * Side-effects: none
 * Links: Used by logEvent(); consumed by route handlers and the entitlement gate.
 * @public
 */

export const EVENT_NAMES = {
  SETTLEMENT_COMPLETED: "settlement.completed",
  SETTLEMENT_REJECTED: "settlement.rejected",

  ACCESS_GATE_DENIED: "access.gate_denied",
  ACCESS_GATE_METER_FAILED: "access.gate_meter_failed",

  WITHDRAWAL_REJECTED: "revenue.withdrawal_rejected",
  WITHDRAWAL_RESTORED: "revenue.withdrawal_restored",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * reqId is ALWAYS required; routeId required for HTTP request events.
 */
export interface EventBase {
  reqId: string;
  routeId?: string;
}
