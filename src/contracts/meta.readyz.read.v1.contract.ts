// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.readyz.read.v1.contract`
 * Purpose: Contract for the readiness probe.
 * Scope: Checks the ledger store answers. In test mode the in-memory ledger is always ready.
 * Invariants: 200 = ready, 503 = not ready; the body mirrors the status.
 * Side-effects: none
 * @internal
 */

import { z } from "zod";

export const metaReadyzOperation = {
  id: "meta.readyz.read.v1",
  summary: "Readiness probe",
  description: "Ready when the ledger store responds.",
  input: null,
  output: z.object({
    status: z.enum(["ready", "not_ready"]),
    timestamp: z.string(),
    checks: z.object({ ledger: z.boolean() }),
  }),
} as const;

export type MetaReadyzOutput = z.infer<typeof metaReadyzOperation.output>;
