// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/metering.consume.v1.contract`
 * Purpose: Contract for POST /v1/metering/consume, called after a served per-call request.
 * Scope: Request/response schemas. Not idempotent: each accepted call removes one credit.
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import {
  addressSchema,
  hexOutputSchema,
  uintOutputSchema,
  uintStringSchema,
} from "./wire.v1";

export const meteringConsumeOperation = {
  id: "metering.consume.v1",
  summary: "Consume one call credit",
  description:
    "Decrements the payer's call credits for the agent by one; fails with NO_CREDITS at zero.",
  input: z.object({
    agentId: uintStringSchema,
    payer: addressSchema,
  }),
  output: z.object({
    agentId: uintOutputSchema,
    payer: hexOutputSchema,
    remainingCredits: uintOutputSchema,
  }),
} as const;

export type MeteringConsumeOutput = z.infer<
  typeof meteringConsumeOperation.output
>;
