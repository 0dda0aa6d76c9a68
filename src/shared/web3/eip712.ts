// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/eip712`
 * Purpose: EIP-712 domains and type sets for USDC transfer authorizations and beneficiary withdrawals.
 * Scope: Typed-data definitions and domain builders. Does not sign or verify.
 * Invariants: USDC domain is name "USD Coin", version "2"; withdrawal domain is bound to the custody address.
 * Side-effects: none
 * Links: features/payer/services/authorization, adapters/server/chain/viem-withdrawal-authorizer.adapter
 * @public
 */

import type { Address, TypedDataDomain } from "viem";

export const USDC_DOMAIN_NAME = "USD Coin";
export const USDC_DOMAIN_VERSION = "2";

export const WITHDRAWAL_DOMAIN_NAME = "AgentSettlement";
export const WITHDRAWAL_DOMAIN_VERSION = "1";

export const TRANSFER_WITH_AUTHORIZATION_TYPES = {
  TransferWithAuthorization: [
    { name: "from", type: "address" },
    { name: "to", type: "address" },
    { name: "value", type: "uint256" },
    { name: "validAfter", type: "uint256" },
    { name: "validBefore", type: "uint256" },
    { name: "nonce", type: "bytes32" },
  ],
} as const;

export const WITHDRAWAL_TYPES = {
  Withdrawal: [
    { name: "beneficiary", type: "address" },
    { name: "to", type: "address" },
    { name: "amount", type: "uint256" },
    { name: "nonce", type: "bytes32" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

export function usdcDomain(params: {
  chainId: number;
  tokenAddress: Address;
}): TypedDataDomain {
  return {
    name: USDC_DOMAIN_NAME,
    version: USDC_DOMAIN_VERSION,
    chainId: params.chainId,
    verifyingContract: params.tokenAddress,
  };
}

export function withdrawalDomain(params: {
  chainId: number;
  custodyAddress: Address;
}): TypedDataDomain {
  return {
    name: WITHDRAWAL_DOMAIN_NAME,
    version: WITHDRAWAL_DOMAIN_VERSION,
    chainId: params.chainId,
    verifyingContract: params.custodyAddress,
  };
}
