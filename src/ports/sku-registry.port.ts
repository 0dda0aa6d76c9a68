// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/sku-registry`
 * Purpose: Read-only access to the SKU registry.
 * Scope: SKU lookup by id. Does not write or cache SKUs.
 * Invariants: An id the registry does not know yields null, which callers treat as inactive.
 * Side-effects: none (interface definition only)
 * Links: ViemSkuRegistryAdapter, FakeSkuRegistryAdapter
 * @public
 */

import type { Sku } from "@/core";

export interface SkuRegistry {
  getSku(skuId: bigint): Promise<Sku | null>;
}
