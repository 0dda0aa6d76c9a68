// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/verifySku`
 * Purpose: SKU pre-verification for resource servers and payers, using the same checks as settle.
 * Scope: Read-only; no capability required.
 * Side-effects: IO (SKU registry read)
 * @public
 */

import type { AccountAddress, Sku } from "@/core";
import { assertSkuOffered } from "@/core";
import type { SkuRegistry } from "@/ports";

/**
 * @throws InactiveSkuError | SkuMismatchError | WrongTokenError
 */
export async function verifySku(
  skus: SkuRegistry,
  params: { skuId: bigint; agentId: bigint },
  settlementToken: AccountAddress
): Promise<Sku> {
  return assertSkuOffered(
    await skus.getSku(params.skuId),
    params,
    settlementToken
  );
}
