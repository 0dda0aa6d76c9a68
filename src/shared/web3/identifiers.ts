// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/identifiers`
 * Purpose: Edge normalization for addresses, payment ids and on-chain license type codes.
 * Scope: Converts untrusted strings into canonical forms. Does not touch storage.
 * Invariants:
 * - Addresses come out EIP-55 checksummed.
 * - A payment id that is not 0x + 64 hex chars becomes keccak256(utf8(id)).
 * - License type 0 = PER_CALL, 1 = PER_PERIOD; other codes are rejected.
 * Side-effects: none
 * Links: contracts/*, adapters/server/chain/viem-sku-registry.adapter
 * @public
 */

import { getAddress, isAddress, isHex, keccak256, stringToHex } from "viem";

import type { AccountAddress, HexString, LicenseType } from "@/core";
import { isBytes32Hex } from "@/core";

export function isAccountAddress(value: string): value is AccountAddress {
  return isAddress(value, { strict: false });
}

/** 65-byte ECDSA signature or longer (contract wallets) */
export function isSignatureHex(value: string): value is HexString {
  return isHex(value, { strict: true }) && value.length >= 132;
}

/**
 * @throws Error if value is not a 20-byte hex address
 */
export function normalizeAddress(value: string): AccountAddress {
  return getAddress(value);
}

/**
 * Maps a caller-chosen payment id to bytes32
 */
export function normalizePaymentId(paymentId: string): HexString {
  if (isBytes32Hex(paymentId)) return paymentId;
  return keccak256(stringToHex(paymentId));
}

const LICENSE_TYPE_CODES: readonly LicenseType[] = ["PER_CALL", "PER_PERIOD"];

export function decodeLicenseType(code: number): LicenseType {
  const licenseType = LICENSE_TYPE_CODES[code];
  if (!licenseType) {
    throw new RangeError(`Unknown license type code: ${code}`);
  }
  return licenseType;
}

export function encodeLicenseType(licenseType: LicenseType): number {
  return LICENSE_TYPE_CODES.indexOf(licenseType);
}
