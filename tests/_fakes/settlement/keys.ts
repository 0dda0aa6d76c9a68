// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/settlement/keys`
 * Purpose: Placeholder keys, accounts, addresses and API tokens shared by settlement tests.
 * Scope: Throwaway test values only; none of these keys hold anything on any chain.
 * Side-effects: none
 * @public
 */

import { privateKeyToAccount } from "viem/accounts";

export const TEST_FACILITATOR_TOKEN = "test-facilitator-token";
export const TEST_ADMIN_TOKEN = "test-admin-token";
export const TEST_METRICS_TOKEN = "test-metrics-token";

export const CHAIN_ID = 2368;
export const USDC_ADDRESS: `0x${string}` = "0x0000000000000000000000000000000000005dc0";
export const CUSTODY_ADDRESS: `0x${string}` = "0x00000000000000000000000000000000000c0de5";
export const OTHER_TOKEN_ADDRESS: `0x${string}` = "0x0000000000000000000000000000000000000bad";
export const TREASURY_ADDRESS: `0x${string}` = "0x000000000000000000000000000000000000dEaD";
export const ZERO: `0x${string}` = "0x0000000000000000000000000000000000000000";

export const payerAccount = privateKeyToAccount(`0x${"11".repeat(32)}`);
export const ownerAccount = privateKeyToAccount(`0x${"22".repeat(32)}`);
export const newOwnerAccount = privateKeyToAccount(`0x${"33".repeat(32)}`);
export const strangerAccount = privateKeyToAccount(`0x${"44".repeat(32)}`);

/** Recipient for withdrawals; never signs */
export const DESTINATION_ADDRESS: `0x${string}` = "0x00000000000000000000000000000000000d0e57";

/** Deterministic bytes32 from a small integer */
export function bytes32(n: number): `0x${string}` {
  return `0x${n.toString(16).padStart(64, "0")}`;
}
