// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/deps`
 * Purpose: Port bundle consumed by settlement services, plus the shared capability check.
 * Scope: Type definitions and requireCapability. Does not construct adapters (see bootstrap/container).
 * Invariants: Every mutating service calls requireCapability before touching a port.
 * Side-effects: none
 * Links: bootstrap/container
 * @public
 */

import type { FeeConfig } from "@/core";
import { UnauthorizedCallerError } from "@/core";
import type {
  AccessPolicy,
  Caller,
  Capability,
  Clock,
  IdentityRegistry,
  SettlementEventSink,
  SettlementLedgerRepository,
  SettlementToken,
  SkuRegistry,
  WithdrawalAuthorizer,
} from "@/ports";
import { describeCaller } from "@/ports";

export interface SettlementDeps {
  ledger: SettlementLedgerRepository;
  skus: SkuRegistry;
  identity: IdentityRegistry;
  token: SettlementToken;
  events: SettlementEventSink;
  accessPolicy: AccessPolicy;
  withdrawalAuthorizer: WithdrawalAuthorizer;
  clock: Clock;
  /** Seed for the fee config row on first read */
  feeDefaults: FeeConfig;
}

/**
 * @throws UnauthorizedCallerError
 */
export function requireCapability(
  policy: AccessPolicy,
  caller: Caller,
  capability: Capability
): void {
  if (!policy.can(caller, capability)) {
    throw new UnauthorizedCallerError(describeCaller(caller), capability);
  }
}
