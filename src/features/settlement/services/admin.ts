// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/admin`
 * Purpose: Fee and treasury administration.
 * Scope: Admin-only reads and writes of the fee config. Does not touch settled revenue.
 * Invariants: Fee capped at MAX_FEE_BASIS_POINTS; changes apply to later settlements only.
 * Side-effects: IO (ledger, event sink)
 * @public
 */

import type { AccountAddress, FeeConfig } from "@/core";
import { assertValidFeeBasisPoints } from "@/core";
import type { Caller } from "@/ports";
import { requireCapability, type SettlementDeps } from "./deps";

type AdminDeps = Pick<
  SettlementDeps,
  "ledger" | "events" | "accessPolicy" | "feeDefaults"
>;

export async function getFeeConfig(
  deps: AdminDeps,
  caller: Caller
): Promise<FeeConfig> {
  requireCapability(deps.accessPolicy, caller, "admin");
  return deps.ledger.getFeeConfig(deps.feeDefaults);
}

/**
 * @throws UnauthorizedCallerError | InvalidFeeError
 */
export async function setFeeBasisPoints(
  deps: AdminDeps,
  caller: Caller,
  feeBasisPoints: number
): Promise<FeeConfig> {
  requireCapability(deps.accessPolicy, caller, "admin");
  assertValidFeeBasisPoints(feeBasisPoints);

  const previous = await deps.ledger.getFeeConfig(deps.feeDefaults);
  const updated = await deps.ledger.updateFeeConfig(
    { feeBasisPoints },
    deps.feeDefaults
  );
  deps.events.publish({
    type: "admin.fee_updated",
    previousFeeBasisPoints: previous.feeBasisPoints,
    feeBasisPoints: updated.feeBasisPoints,
  });
  return updated;
}

/**
 * Any well-formed address is accepted; the wire edge has already parsed it
 * @throws UnauthorizedCallerError
 */
export async function setTreasury(
  deps: AdminDeps,
  caller: Caller,
  treasuryAddress: AccountAddress
): Promise<FeeConfig> {
  requireCapability(deps.accessPolicy, caller, "admin");

  const previous = await deps.ledger.getFeeConfig(deps.feeDefaults);
  const updated = await deps.ledger.updateFeeConfig(
    { treasuryAddress },
    deps.feeDefaults
  );
  deps.events.publish({
    type: "admin.treasury_updated",
    previousTreasury: previous.treasuryAddress,
    treasuryAddress: updated.treasuryAddress,
  });
  return updated;
}
