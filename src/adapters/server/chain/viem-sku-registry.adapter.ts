// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/chain/viem-sku-registry`
 * Purpose: SkuRegistry backed by the on-chain SKU registry contract.
 * Scope: Reads skus(uint256). Does not cache; SKUs can be deactivated at any time.
 * Invariants: A zeroed struct (no agent, zero pricing token) means the id was never registered and maps to null.
 * Side-effects: IO (RPC calls)
 * Links: Implements SkuRegistry port
 * @public
 */

import type { Chain, PublicClient, Transport } from "viem";

import type { Sku } from "@/core";
import { ZERO_ADDRESS, sameAddress } from "@/core";
import type { SkuRegistry } from "@/ports";
import { decodeLicenseType, SKU_REGISTRY_ABI } from "@/shared/web3";

export class ViemSkuRegistryAdapter implements SkuRegistry {
  constructor(
    private readonly client: PublicClient<Transport, Chain>,
    private readonly registryAddress: `0x${string}`
  ) {}

  async getSku(skuId: bigint): Promise<Sku | null> {
    const [agentId, licenseType, pricingToken, price, periodSeconds, active] =
      await this.client.readContract({
        address: this.registryAddress,
        abi: SKU_REGISTRY_ABI,
        functionName: "skus",
        args: [skuId],
      });

    if (agentId === 0n && sameAddress(pricingToken, ZERO_ADDRESS)) {
      return null;
    }

    return {
      skuId,
      agentId,
      licenseType: decodeLicenseType(licenseType),
      pricingToken,
      price,
      periodSeconds,
      active,
    };
  }
}
