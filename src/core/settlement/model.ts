// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/settlement/model`
 * Purpose: Domain types for settlement intake: receipts, authorization proofs, SKUs and fee configuration.
 * Scope: Type definitions only. Does not validate or perform I/O.
 * Invariants:
 * - Amounts, ids and timestamps are bigint (uint256 on the token side, unix seconds for time).
 * - paymentId and nonce are 0x-prefixed 32-byte hex strings.
 * Side-effects: none
 * Links: core/settlement/rules, features/settlement/services/settle
 * @public
 */

/** 0x-prefixed hex string (addresses, bytes32 ids, signatures) */
export type HexString = `0x${string}`;

/** EVM address (checksummed at the edges, compared case-insensitively in core) */
export type AccountAddress = HexString;

export type LicenseType = "PER_CALL" | "PER_PERIOD";

/**
 * One settlement attempt as submitted by the facilitator.
 * Consumed exactly once; paymentId is unique for the lifetime of the engine.
 */
export interface PaymentReceipt {
  paymentId: HexString;
  skuId: bigint;
  agentId: bigint;
  payer: AccountAddress;
  /** USDC base units (6 decimals) */
  amount: bigint;
}

/**
 * EIP-3009 authorization fields, owned by the token primitive.
 * The engine forwards these unmodified.
 */
export interface AuthorizationProof {
  validAfter: bigint;
  validBefore: bigint;
  nonce: HexString;
  signature: HexString;
}

/**
 * Priced access offer read from the SKU registry.
 * periodSeconds is meaningful only for PER_PERIOD.
 */
export interface Sku {
  skuId: bigint;
  agentId: bigint;
  licenseType: LicenseType;
  pricingToken: AccountAddress;
  price: bigint;
  periodSeconds: bigint;
  active: boolean;
}

export interface FeeConfig {
  /** 0..MAX_FEE_BASIS_POINTS */
  feeBasisPoints: number;
  treasuryAddress: AccountAddress;
}

export interface RevenueSplit {
  fee: bigint;
  net: bigint;
}

/**
 * Receipt anchor persisted alongside the ledger writes of a completed settlement.
 */
export interface SettlementRecord {
  paymentId: HexString;
  skuId: bigint;
  agentId: bigint;
  payer: AccountAddress;
  amount: bigint;
  licenseType: LicenseType;
  owner: AccountAddress;
  treasury: AccountAddress;
  fee: bigint;
  net: bigint;
  settledAt: Date;
}
