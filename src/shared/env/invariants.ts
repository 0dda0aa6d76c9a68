// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/invariants`
 * Purpose: Fail-fast validation of runtime secrets needed by production adapters.
 * Scope: Runtime secret checks at adapter wiring only. Does not run at module init.
 * Invariants: Throws RuntimeSecretError listing every missing setting; test mode needs none of them.
 * Side-effects: none
 * Notes: Called from bootstrap/container when APP_ENV=production.
 * Links: src/shared/env/server.ts, src/bootstrap/container.ts
 * @public
 */

import type { ServerEnv } from "./server";

/**
 * Production settings after assertRuntimeSecrets has narrowed them
 */
export interface ProductionSecrets {
  DATABASE_URL: string;
  EVM_RPC_URL: string;
  USDC_ADDRESS: `0x${string}`;
  SKU_REGISTRY_ADDRESS: `0x${string}`;
  IDENTITY_REGISTRY_ADDRESS: `0x${string}`;
  SETTLEMENT_SIGNER_KEY: `0x${string}`;
  FACILITATOR_API_TOKEN: string;
  ADMIN_API_TOKEN: string;
}

/**
 * Typed error for runtime secret validation failures.
 * Allows consumers to detect secret issues without string matching.
 */
export class RuntimeSecretError extends Error {
  readonly code = "MISSING_RUNTIME_SECRET" as const;

  constructor(
    message: string,
    public readonly missing: string[]
  ) {
    super(message);
    this.name = "RuntimeSecretError";
  }
}

/**
 * Asserts every production-only setting is present and returns them narrowed.
 *
 * @throws RuntimeSecretError naming all missing settings
 */
export function assertRuntimeSecrets(env: ServerEnv): ProductionSecrets {
  const {
    DATABASE_URL,
    EVM_RPC_URL,
    USDC_ADDRESS,
    SKU_REGISTRY_ADDRESS,
    IDENTITY_REGISTRY_ADDRESS,
    SETTLEMENT_SIGNER_KEY,
    FACILITATOR_API_TOKEN,
    ADMIN_API_TOKEN,
  } = env;

  if (
    DATABASE_URL &&
    EVM_RPC_URL &&
    USDC_ADDRESS &&
    SKU_REGISTRY_ADDRESS &&
    IDENTITY_REGISTRY_ADDRESS &&
    SETTLEMENT_SIGNER_KEY &&
    FACILITATOR_API_TOKEN &&
    ADMIN_API_TOKEN
  ) {
    return {
      DATABASE_URL,
      EVM_RPC_URL,
      USDC_ADDRESS,
      SKU_REGISTRY_ADDRESS,
      IDENTITY_REGISTRY_ADDRESS,
      SETTLEMENT_SIGNER_KEY,
      FACILITATOR_API_TOKEN,
      ADMIN_API_TOKEN,
    };
  }

  const candidates: Record<keyof ProductionSecrets, string | undefined> = {
    DATABASE_URL,
    EVM_RPC_URL,
    USDC_ADDRESS,
    SKU_REGISTRY_ADDRESS,
    IDENTITY_REGISTRY_ADDRESS,
    SETTLEMENT_SIGNER_KEY,
    FACILITATOR_API_TOKEN,
    ADMIN_API_TOKEN,
  };
  const missing = Object.entries(candidates)
    .filter(([, value]) => !value || value.trim() === "")
    .map(([key]) => key);

  throw new RuntimeSecretError(
    `APP_ENV=production requires ${missing.join(", ")}`,
    missing
  );
}
