// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `drizzle.config`
 * Purpose: drizzle-kit configuration for settlement ledger migrations.
 * Scope: Migration generation and application. Does not handle runtime connections.
 * Invariants: Schema path matches src/shared/db/schema.settlement.ts.
 * Side-effects: IO (file system during migration generation)
 * Notes: DATABASE_URL wins; otherwise built from POSTGRES_* and DB_HOST/DB_PORT.
 * @public
 */

import "dotenv/config";

import { defineConfig } from "drizzle-kit";

import { buildDatabaseUrl } from "./src/shared/db/db-url";

function getDatabaseUrl(): string {
  if (process.env.DATABASE_URL) {
    return process.env.DATABASE_URL;
  }

  return buildDatabaseUrl({
    POSTGRES_USER: process.env.POSTGRES_USER,
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD,
    POSTGRES_DB: process.env.POSTGRES_DB,
    DB_HOST: process.env.DB_HOST,
    DB_PORT: process.env.DB_PORT,
  });
}

export default defineConfig({
  schema: "./src/shared/db/schema.settlement.ts",
  out: "./src/adapters/server/db/migrations",
  dialect: "postgresql",
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  verbose: true,
  strict: true,
});
