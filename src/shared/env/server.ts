// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the settlement service; provides lazy server environment access. Does not read .env files (server entry loads dotenv).
 * Invariants: All env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV selects adapter wiring (test = in-process stand-ins, production = Postgres + RPC).
 *        Chain and database settings are optional in the schema; production wiring asserts them via assertRuntimeSecrets.
 *        Lazy init keeps module import free of env reads.
 * Links: src/bootstrap/container.ts, src/shared/env/invariants.ts
 * @public
 */

import { ZodError, z } from "zod";

import { buildDatabaseUrl } from "@/shared/db/db-url";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const hexAddress = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "expected 0x-prefixed 20-byte address")
  .transform((value): `0x${string}` => `0x${value.slice(2)}`);

const privateKey = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, "expected 0x-prefixed 32-byte private key")
  .transform((value): `0x${string}` => `0x${value.slice(2)}`);

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),

  // Service identity for observability
  SERVICE_NAME: z.string().default("agent-settlement"),

  PORT: z.coerce.number().int().positive().default(3000),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Database connection: either provide DATABASE_URL directly OR component pieces
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_USER: z.string().min(1).optional(),
  POSTGRES_PASSWORD: z.string().min(1).optional(),
  POSTGRES_DB: z.string().min(1).optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().default(5432),

  // Chain
  EVM_RPC_URL: z.string().url().optional(),
  CHAIN_ID: z.coerce.number().int().positive().default(2368),
  USDC_ADDRESS: hexAddress.optional(),
  SKU_REGISTRY_ADDRESS: hexAddress.optional(),
  IDENTITY_REGISTRY_ADDRESS: hexAddress.optional(),
  // Custody wallet: receives pulled funds, submits transfers
  SETTLEMENT_SIGNER_KEY: privateKey.optional(),

  // Fee config seed (first read only; admin setters own it afterwards)
  TREASURY_ADDRESS: hexAddress.default(
    "0x000000000000000000000000000000000000dEaD"
  ),
  DEFAULT_FEE_BPS: z.coerce.number().int().min(0).max(2000).default(250),

  // Bearer tokens for capability-scoped routes
  FACILITATOR_API_TOKEN: z.string().min(1).optional(),
  ADMIN_API_TOKEN: z.string().min(1).optional(),
  METRICS_TOKEN: z.string().min(1).optional(),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  DATABASE_URL: string | undefined;
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

function resolveDatabaseUrl(
  parsed: z.infer<typeof serverSchema>
): string | undefined {
  if (parsed.DATABASE_URL) return parsed.DATABASE_URL;
  if (
    !parsed.POSTGRES_USER ||
    !parsed.POSTGRES_PASSWORD ||
    !parsed.POSTGRES_DB ||
    !parsed.DB_HOST
  ) {
    return undefined;
  }
  return buildDatabaseUrl({
    POSTGRES_USER: parsed.POSTGRES_USER,
    POSTGRES_PASSWORD: parsed.POSTGRES_PASSWORD,
    POSTGRES_DB: parsed.POSTGRES_DB,
    DB_HOST: parsed.DB_HOST,
    DB_PORT: parsed.DB_PORT,
  });
}

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);

      ENV = {
        ...parsed,
        DATABASE_URL: resolveDatabaseUrl(parsed),
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // invalid_type covers undefined, so it is reported as missing
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/**
 * Drops the memoized env so the next serverEnv() re-reads process.env.
 * Tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
