// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.livez.read.v1.contract`
 * Purpose: Contract for the liveness probe.
 * Scope: Process is up and serving. No env, database or RPC checks.
 * Invariants: 200 = alive; anything else = not alive.
 * Side-effects: none
 * @internal
 */

import { z } from "zod";

export const metaLivezOperation = {
  id: "meta.livez.read.v1",
  summary: "Liveness probe",
  description: "Confirms the process is alive. No dependency checks.",
  input: null,
  output: z.object({
    status: z.literal("alive"),
    timestamp: z.string(), // ISO-8601
  }),
} as const;
