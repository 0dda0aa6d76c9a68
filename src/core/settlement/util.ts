// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/settlement/util`
 * Purpose: Time and payment-id helpers shared by settlement rules and services.
 * Scope: Pure conversions. Does not hash or perform I/O.
 * Invariants: Unix time is whole seconds (floor); bytes32 ids are 0x + 64 hex chars.
 * Side-effects: none
 * Links: Used by feature services with Clock port output
 * @public
 */

import type { HexString } from "./model";

const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

/**
 * Converts an ISO 8601 timestamp (Clock port format) to unix seconds
 */
export function toUnixSeconds(iso: string): bigint {
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) {
    throw new RangeError(`Invalid timestamp: ${iso}`);
  }
  return BigInt(Math.floor(ms / 1000));
}

export function isBytes32Hex(value: string): value is HexString {
  return BYTES32_PATTERN.test(value);
}
