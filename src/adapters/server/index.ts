// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { RoleAccessPolicy } from "./auth/role-access-policy.adapter";
export { type ChainClients, createChainClients } from "./chain/viem-clients";
export { ViemIdentityRegistryAdapter } from "./chain/viem-identity-registry.adapter";
export { ViemSkuRegistryAdapter } from "./chain/viem-sku-registry.adapter";
export {
  classifyRevertReason,
  ViemUsdcTokenAdapter,
} from "./chain/viem-usdc-token.adapter";
export { ViemWithdrawalAuthorizerAdapter } from "./chain/viem-withdrawal-authorizer.adapter";
export { closeDb, type Database, getDb, pingDb } from "./db/drizzle.client";
export { PinoSettlementEventSink } from "./events/pino-event-sink.adapter";
export { DrizzleSettlementLedgerAdapter } from "./settlement/drizzle-ledger.adapter";
export { SystemClock } from "./time/system.adapter";
