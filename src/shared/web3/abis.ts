// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/abis`
 * Purpose: Minimal ABIs for the SKU registry, identity registry and the EIP-3009 settlement token.
 * Scope: Only the functions this service calls. Does not include events or admin functions.
 * Invariants: skus() tuple order is (agentId, licenseType, pricingToken, price, periodSeconds, active).
 * Side-effects: none
 * Links: adapters/server/chain
 * @public
 */

export const SKU_REGISTRY_ABI = [
  {
    name: "skus",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "skuId", type: "uint256" }],
    outputs: [
      { name: "agentId", type: "uint256" },
      { name: "licenseType", type: "uint8" },
      { name: "pricingToken", type: "address" },
      { name: "price", type: "uint256" },
      { name: "periodSeconds", type: "uint64" },
      { name: "active", type: "bool" },
    ],
  },
] as const;

export const IDENTITY_REGISTRY_ABI = [
  {
    name: "ownerOf",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "tokenId", type: "uint256" }],
    outputs: [{ name: "", type: "address" }],
  },
] as const;

/**
 * USDC v2 surface: EIP-3009 with the bytes-signature overload, plus ERC20 transfer.
 */
export const SETTLEMENT_TOKEN_ABI = [
  {
    name: "transferWithAuthorization",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "from", type: "address" },
      { name: "to", type: "address" },
      { name: "value", type: "uint256" },
      { name: "validAfter", type: "uint256" },
      { name: "validBefore", type: "uint256" },
      { name: "nonce", type: "bytes32" },
      { name: "signature", type: "bytes" },
    ],
    outputs: [],
  },
  {
    name: "authorizationState",
    type: "function",
    stateMutability: "view",
    inputs: [
      { name: "authorizer", type: "address" },
      { name: "nonce", type: "bytes32" },
    ],
    outputs: [{ name: "", type: "bool" }],
  },
  {
    name: "balanceOf",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "account", type: "address" }],
    outputs: [{ name: "", type: "uint256" }],
  },
  {
    name: "transfer",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "to", type: "address" },
      { name: "amount", type: "uint256" },
    ],
    outputs: [{ name: "", type: "bool" }],
  },
] as const;
