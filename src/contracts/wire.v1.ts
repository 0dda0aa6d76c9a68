// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/wire.v1`
 * Purpose: Shared wire primitives for v1 settlement contracts.
 * Scope: uint256 values travel as decimal strings; addresses are checksummed on parse. Does not perform I/O.
 * Invariants: Parsed outputs are canonical (bigint, EIP-55 address, lowercase-insensitive bytes32).
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import {
  isAccountAddress,
  isSignatureHex,
  normalizeAddress,
  normalizePaymentId,
} from "@/shared/web3";

const DECIMAL_PATTERN = /^(0|[1-9][0-9]*)$/;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

/** uint256 as a decimal string */
export const uintStringSchema = z
  .string()
  .regex(DECIMAL_PATTERN, "expected a non-negative decimal integer string")
  .transform((value) => BigInt(value));

export const addressSchema = z
  .string()
  .refine(isAccountAddress, "expected a 20-byte hex address")
  .transform((value) => normalizeAddress(value));

export const bytes32Schema = z
  .string()
  .regex(BYTES32_PATTERN, "expected 0x-prefixed 32-byte hex")
  .transform((value) => normalizePaymentId(value));

export const signatureSchema = z
  .string()
  .refine(isSignatureHex, "expected a hex-encoded signature");

/** Any non-empty id; non-bytes32 values are hashed to bytes32 */
export const paymentIdSchema = z
  .string()
  .min(1)
  .max(256)
  .transform((value) => normalizePaymentId(value));

/** Output side: bigint rendered as a decimal string */
export const uintOutputSchema = z.string().regex(DECIMAL_PATTERN);

export const hexOutputSchema = z.string().startsWith("0x");
