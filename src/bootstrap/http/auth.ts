// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/auth`
 * Purpose: Bearer token authentication for facilitator, admin and metrics callers.
 * Scope: Resolves an Authorization header into a Caller. Does not decide capabilities (see AccessPolicy).
 * Invariants: Tokens compared in constant time over SHA-256 digests; unset tokens never match.
 * Side-effects: none
 * Links: bootstrap/container (ApiTokens), adapters/server/auth/role-access-policy.adapter
 * @public
 */

import { createHash, timingSafeEqual } from "node:crypto";

import type { Caller } from "@/ports";

import type { ApiTokens } from "../container";

/** Max auth header length */
const MAX_AUTH_HEADER_LENGTH = 512;
/** Max token length after parsing (before hashing) */
const MAX_TOKEN_LENGTH = 256;

/**
 * Constant-time string comparison using SHA-256 digests.
 */
export function safeCompare(a: string, b: string): boolean {
  const hashA = createHash("sha256").update(a, "utf8").digest();
  const hashB = createHash("sha256").update(b, "utf8").digest();
  return timingSafeEqual(hashA, hashB);
}

/**
 * Extract bearer token from Authorization header.
 * Case-insensitive "Bearer " prefix; null when absent or over the length limits.
 */
export function extractBearerToken(
  authHeader: string | null | undefined
): string | null {
  if (!authHeader) return null;
  if (authHeader.length > MAX_AUTH_HEADER_LENGTH) return null;

  const trimmed = authHeader.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;

  const token = trimmed.slice(7).trim();
  if (!token || token.length > MAX_TOKEN_LENGTH) return null;
  return token;
}

export function matchesToken(
  provided: string | null,
  configured: string | undefined
): boolean {
  if (!provided || !configured) return false;
  return safeCompare(provided, configured);
}

export function resolveCaller(
  authHeader: string | null | undefined,
  tokens: ApiTokens
): Caller {
  const token = extractBearerToken(authHeader);
  if (matchesToken(token, tokens.facilitator)) {
    return { kind: "facilitator", id: "api-token" };
  }
  if (matchesToken(token, tokens.admin)) {
    return { kind: "admin", id: "api-token" };
  }
  return { kind: "anonymous" };
}
