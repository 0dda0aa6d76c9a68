// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/admin.fee-config.v1.contract`
 * Purpose: Contracts for admin fee configuration reads and updates.
 * Scope: GET /v1/admin/fee-config, PUT /v1/admin/fee-basis-points, PUT /v1/admin/treasury.
 * Invariants: feeBasisPoints is an integer; the 0..2000 cap is enforced by the service, not the schema.
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import { addressSchema, hexOutputSchema } from "./wire.v1";

export const feeConfigOutputSchema = z.object({
  feeBasisPoints: z.number().int(),
  treasuryAddress: hexOutputSchema,
});

export const adminFeeConfigReadOperation = {
  id: "admin.fee-config.read.v1",
  summary: "Read fee configuration",
  description: "Current platform fee and treasury address.",
  input: null,
  output: feeConfigOutputSchema,
} as const;

export const adminFeeBasisPointsUpdateOperation = {
  id: "admin.fee-basis-points.update.v1",
  summary: "Set platform fee",
  description: "Applies to settlements after the update; capped at 2000 bps.",
  input: z.object({ feeBasisPoints: z.number().int() }),
  output: feeConfigOutputSchema,
} as const;

export const adminTreasuryUpdateOperation = {
  id: "admin.treasury.update.v1",
  summary: "Set treasury address",
  description: "Fee revenue from later settlements accrues to the new address.",
  input: z.object({ treasuryAddress: addressSchema }),
  output: feeConfigOutputSchema,
} as const;

export type FeeConfigOutput = z.infer<typeof feeConfigOutputSchema>;
