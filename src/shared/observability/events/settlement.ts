// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events/settlement`
 * Purpose: Strict payload types for request-level settlement, access gate and withdrawal log events.
 * Scope: Type definitions only, keyed by event name in EventPayloads. Does not implement event creation.
 * Invariants: All events carry reqId; amounts are decimal strings.
 * Side-effects: none
 * Links: Used by logEvent(), bootstrap/http/routes and bootstrap/http/entitlementGate
 * @public
 */

export interface SettlementCompletedEvent {
  reqId: string;
  routeId: string;
  paymentId: string;
  agentId: string;
  skuId: string;
  amount: string;
  fee: string;
  durationMs: number;
}

export interface SettlementRejectedEvent {
  reqId: string;
  routeId: string;
  paymentId: string;
  errorCode: string;
  durationMs: number;
}

export interface WithdrawalRestoredEvent {
  reqId: string;
  routeId: string;
  beneficiary: string;
  amount: string;
}

export interface WithdrawalRejectedEvent {
  reqId: string;
  routeId: string;
  beneficiary: string;
  errorCode: string;
}

export interface AccessGateDeniedEvent {
  reqId: string;
  agentId: string;
  payer: string;
}

export interface AccessGateMeterFailedEvent extends AccessGateDeniedEvent {
  errorCode: string;
}

/** Keyed by EVENT_NAMES values */
export interface EventPayloads {
  "settlement.completed": SettlementCompletedEvent;
  "settlement.rejected": SettlementRejectedEvent;
  "access.gate_denied": AccessGateDeniedEvent;
  "access.gate_meter_failed": AccessGateMeterFailedEvent;
  "revenue.withdrawal_rejected": WithdrawalRejectedEvent;
  "revenue.withdrawal_restored": WithdrawalRestoredEvent;
}
