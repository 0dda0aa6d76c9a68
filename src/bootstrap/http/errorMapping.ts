// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/errorMapping`
 * Purpose: Map request validation failures and settlement domain errors to HTTP responses.
 * Scope: Status + error envelope selection. Unknown errors return null and stay with the route wrapper.
 * Invariants: Every SettlementErrorCode has exactly one status; body matches contracts/error.v1.
 * Side-effects: none
 * Links: contracts/error.v1.contract, bootstrap/http/wrapRoute
 * @public
 */

import { ZodError } from "zod";

import type { ErrorResponse } from "@/contracts/error.v1.contract";
import {
  isSettlementDomainError,
  type SettlementDomainError,
  type SettlementErrorCode,
} from "@/features/settlement/public";

export type ErrorStatus = 400 | 401 | 402 | 403 | 404 | 409 | 500 | 502 | 503;

export interface MappedError {
  status: ErrorStatus;
  code: string;
  body: ErrorResponse;
}

/**
 * Body could not be read as JSON
 */
export class MalformedBodyError extends Error {
  constructor() {
    super("Request body is not valid JSON");
    this.name = "MalformedBodyError";
  }
}

const STATUS_BY_CODE: Record<SettlementErrorCode, ErrorStatus> = {
  REPLAY: 409,
  SKU_INACTIVE: 400,
  SKU_AGENT_MISMATCH: 400,
  WRONG_TOKEN: 400,
  AMOUNT_MISMATCH: 400,
  INVALID_PAYER: 400,
  UNKNOWN_AGENT: 404,
  FUNDS_PULL_FAILED: 402,
  SETTLEMENT_INCOMPLETE: 500,
  NO_CREDITS: 409,
  INSUFFICIENT_BALANCE: 409,
  TRANSFER_FAILED: 502,
  INVALID_FEE: 400,
  INVALID_WITHDRAWAL_AUTHORIZATION: 401,
  UNAUTHORIZED: 403,
};

function domainDetails(
  error: SettlementDomainError
): Record<string, unknown> | undefined {
  switch (error.code) {
    case "FUNDS_PULL_FAILED":
      return { paymentId: error.paymentId, reason: error.reason };
    case "SETTLEMENT_INCOMPLETE":
      return { paymentId: error.paymentId, txHash: error.txHash };
    case "TRANSFER_FAILED":
      return {
        balanceRestored: error.balanceRestored,
        pendingTxHash: error.pendingTxHash,
      };
    case "INVALID_WITHDRAWAL_AUTHORIZATION":
      return { reason: error.reason };
    case "REPLAY":
      return { paymentId: error.paymentId };
    default:
      return undefined;
  }
}

function envelope(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ErrorResponse {
  return details
    ? { error: { code, message, details } }
    : { error: { code, message } };
}

export function mapError(error: unknown): MappedError | null {
  if (error instanceof ZodError) {
    return {
      status: 400,
      code: "INVALID_REQUEST",
      body: envelope("INVALID_REQUEST", "Request validation failed", {
        issues: error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      }),
    };
  }

  if (error instanceof MalformedBodyError) {
    return {
      status: 400,
      code: "INVALID_REQUEST",
      body: envelope("INVALID_REQUEST", error.message),
    };
  }

  if (isSettlementDomainError(error)) {
    // Anonymous callers never authenticated at all
    const status =
      error.code === "UNAUTHORIZED" && error.caller === "anonymous"
        ? 401
        : STATUS_BY_CODE[error.code];
    return {
      status,
      code: error.code,
      body: envelope(error.code, error.message, domainDetails(error)),
    };
  }

  return null;
}
