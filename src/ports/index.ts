// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export {
  type AccessPolicy,
  type Caller,
  type Capability,
  describeCaller,
} from "./access-policy.port";
export type { Clock } from "./clock.port";
export {
  AgentNotFoundPortError,
  type IdentityRegistry,
  isAgentNotFoundPortError,
} from "./identity-registry.port";
export type {
  SettlementEvent,
  SettlementEventSink,
  SettlementEventType,
} from "./settlement-events.port";
export type {
  ApplySettlementParams,
  SettlementLedgerRepository,
} from "./settlement-ledger.port";
export {
  AuthorizationRejectedPortError,
  type FundsPullFailureReason,
  isAuthorizationRejectedPortError,
  isTransactionUnconfirmedPortError,
  isTransferRejectedPortError,
  type PullWithAuthorizationParams,
  type SettlementToken,
  type TokenTransferResult,
  TransactionUnconfirmedPortError,
  TransferRejectedPortError,
} from "./settlement-token.port";
export type { SkuRegistry } from "./sku-registry.port";
export type { WithdrawalAuthorizer } from "./withdrawal-authorizer.port";
