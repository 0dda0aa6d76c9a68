// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/chain/viem-identity-registry`
 * Purpose: IdentityRegistry backed by the ERC-721 identity registry's ownerOf.
 * Scope: Owner lookup per agent id. Does not cache ownership.
 * Invariants: A revert (nonexistent token) or a zero owner raises AgentNotFoundPortError; other RPC failures propagate.
 * Side-effects: IO (RPC calls)
 * Links: Implements IdentityRegistry port
 * @public
 */

import {
  BaseError,
  type Chain,
  ContractFunctionRevertedError,
  type PublicClient,
  type Transport,
} from "viem";

import type { AccountAddress } from "@/core";
import { isUsableAddress } from "@/core";
import type { IdentityRegistry } from "@/ports";
import { AgentNotFoundPortError } from "@/ports";
import { IDENTITY_REGISTRY_ABI } from "@/shared/web3";

export class ViemIdentityRegistryAdapter implements IdentityRegistry {
  constructor(
    private readonly client: PublicClient<Transport, Chain>,
    private readonly registryAddress: `0x${string}`
  ) {}

  async ownerOf(agentId: bigint): Promise<AccountAddress> {
    let owner: AccountAddress;
    try {
      owner = await this.client.readContract({
        address: this.registryAddress,
        abi: IDENTITY_REGISTRY_ABI,
        functionName: "ownerOf",
        args: [agentId],
      });
    } catch (error) {
      if (
        error instanceof BaseError &&
        error.walk((e) => e instanceof ContractFunctionRevertedError)
      ) {
        throw new AgentNotFoundPortError(agentId);
      }
      throw error;
    }

    if (!isUsableAddress(owner)) {
      throw new AgentNotFoundPortError(agentId);
    }
    return owner;
  }
}
