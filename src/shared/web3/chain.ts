// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/chain`
 * Purpose: Chain definition for the deployment, built from CHAIN_ID and EVM_RPC_URL.
 * Scope: Single EVM chain per deployment. Does not perform network calls.
 * Invariants: USDC has 6 decimals.
 * Side-effects: none
 * Links: bootstrap/container
 * @public
 */

import { type Chain, defineChain } from "viem";

export const USDC_DECIMALS = 6;

export function settlementChain(params: {
  chainId: number;
  rpcUrl: string;
}): Chain {
  return defineChain({
    id: params.chainId,
    name: `settlement-${params.chainId}`,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: [params.rpcUrl] } },
  });
}
