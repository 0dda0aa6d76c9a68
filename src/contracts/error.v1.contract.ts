// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/error.v1.contract`
 * Purpose: Error envelope returned by every v1 route on a non-2xx response.
 * Scope: Schema only.
 * Invariants: `code` is a stable machine-readable discriminant; `message` is for humans.
 * Side-effects: none
 * Links: bootstrap/http/errorMapping
 * @public
 */

import { z } from "zod";

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.string(), z.unknown()).optional(),
  }),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;
