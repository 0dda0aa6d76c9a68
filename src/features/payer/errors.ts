// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payer/errors`
 * Purpose: Errors raised on the payer side when talking to a facilitator.
 * Scope: Client-side failures only; settlement rejections arrive here as a status plus the server's error body.
 * Side-effects: none
 * @public
 */

export class FacilitatorHttpError extends Error {
  public readonly code = "FACILITATOR_HTTP_ERROR" as const;

  constructor(
    public readonly status: number,
    /** Parsed JSON body when the server sent one, raw text otherwise */
    public readonly body: unknown
  ) {
    super(`Facilitator responded with HTTP ${status}`);
    this.name = "FacilitatorHttpError";
  }
}

export function isFacilitatorHttpError(
  error: unknown
): error is FacilitatorHttpError {
  return error instanceof Error && error.name === "FacilitatorHttpError";
}
