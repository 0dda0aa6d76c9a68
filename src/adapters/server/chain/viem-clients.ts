// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/chain/viem-clients`
 * Purpose: Public and wallet viem clients for the settlement chain.
 * Scope: Client construction only. Does not read contracts.
 * Invariants: One custody account per process; its address is the settlement custody address.
 * Side-effects: none until a client method is called
 * Links: bootstrap/container
 * @internal
 */

import {
  type Account,
  type Chain,
  createPublicClient,
  createWalletClient,
  http,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";

import { settlementChain } from "@/shared/web3";

export interface ChainClients {
  chain: Chain;
  publicClient: PublicClient<Transport, Chain>;
  walletClient: WalletClient<Transport, Chain, Account>;
  account: Account;
}

export function createChainClients(params: {
  chainId: number;
  rpcUrl: string;
  signerKey: `0x${string}`;
}): ChainClients {
  const chain = settlementChain({
    chainId: params.chainId,
    rpcUrl: params.rpcUrl,
  });
  const account = privateKeyToAccount(params.signerKey);
  const transport = http(params.rpcUrl);

  return {
    chain,
    publicClient: createPublicClient({ chain, transport }),
    walletClient: createWalletClient({ account, chain, transport }),
    account,
  };
}
