// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/identity-registry`
 * Purpose: Agent identity ownership lookups.
 * Scope: ownerOf(agentId). Does not cache; ownership is read at settlement time.
 * Invariants: Unknown agents raise AgentNotFoundPortError, never a zero address.
 * Side-effects: none (interface definition only)
 * Links: ViemIdentityRegistryAdapter, FakeIdentityRegistryAdapter
 * @public
 */

import type { AccountAddress } from "@/core";

/**
 * Port-level error thrown when the identity registry has no token for the agent
 */
export class AgentNotFoundPortError extends Error {
  constructor(public readonly agentId: bigint) {
    super(`Agent ${agentId} not found in identity registry`);
    this.name = "AgentNotFoundPortError";
  }
}

export function isAgentNotFoundPortError(
  error: unknown
): error is AgentNotFoundPortError {
  return error instanceof Error && error.name === "AgentNotFoundPortError";
}

export interface IdentityRegistry {
  /** @throws AgentNotFoundPortError */
  ownerOf(agentId: bigint): Promise<AccountAddress>;
}
