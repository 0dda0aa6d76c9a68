// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/metering`
 * Purpose: Consume one per-call credit after a served request.
 * Scope: Facilitator-only decrement. Does not look at period windows.
 * Invariants: Zero credits raises NoCreditsError with nothing mutated; otherwise exactly one credit is removed. Not idempotent.
 * Side-effects: IO (ledger write, event sink)
 * @public
 */

import type { AccountAddress, EntitlementRecord } from "@/core";
import { NoCreditsError } from "@/core";
import type { Caller } from "@/ports";
import { requireCapability, type SettlementDeps } from "./deps";

type MeteringDeps = Pick<SettlementDeps, "ledger" | "events" | "accessPolicy">;

/**
 * @throws UnauthorizedCallerError | NoCreditsError
 */
export async function consumeCall(
  deps: MeteringDeps,
  caller: Caller,
  agentId: bigint,
  payer: AccountAddress
): Promise<EntitlementRecord> {
  requireCapability(deps.accessPolicy, caller, "meter");

  const updated = await deps.ledger.consumeCallCredit(agentId, payer);
  if (!updated) {
    throw new NoCreditsError(agentId, payer);
  }

  deps.events.publish({
    type: "metering.call_consumed",
    agentId,
    payer,
    remainingCredits: updated.callCredits,
  });
  return updated;
}
