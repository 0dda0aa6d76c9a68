// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/access.read.v1.contract`
 * Purpose: Contract for GET /v1/access/:agentId/:payer.
 * Scope: Path params and entitlement snapshot. Read-only, unauthenticated.
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

export const accessReadOperation = {
  id: "access.read.v1",
  summary: "Check access for (agent, payer)",
  description:
    "True when the payer holds call credits or an unexpired period window for the agent.",
  input: z.object({
    agentId: uintStringSchema,
    payer: addressSchema,
  }),
  output: z.object({
    agentId: uintOutputSchema,
    payer: hexOutputSchema,
    hasAccess: z.boolean(),
    callCredits: uintOutputSchema,
    validUntil: uintOutputSchema,
    periodActive: z.boolean(),
    checkedAt: uintOutputSchema,
  }),
} as const;

export type AccessReadOutput = z.infer<typeof accessReadOperation.output>;
