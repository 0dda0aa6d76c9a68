// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/db-url`
 * Purpose: Database URL construction for PostgreSQL connections.
 * Scope: Builds DATABASE_URL from env pieces for the server env and drizzle-kit. Does not handle connections or validation.
 * Invariants: Pure function; credentials are percent-encoded; requires POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB, DB_HOST.
 * Side-effects: none
 * Links: src/shared/env/server.ts, drizzle.config.ts
 * @public
 */

export interface DbEnvInput {
  POSTGRES_USER?: string | undefined;
  POSTGRES_PASSWORD?: string | undefined;
  POSTGRES_DB?: string | undefined;
  DB_HOST?: string | undefined;
  DB_PORT?: string | number | undefined;
}

export function buildDatabaseUrl(env: DbEnvInput): string {
  const { POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB, DB_HOST } = env;
  if (!POSTGRES_USER || !POSTGRES_PASSWORD || !POSTGRES_DB || !DB_HOST) {
    throw new TypeError(
      "Missing required DB env vars: POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB, DB_HOST"
    );
  }

  const port = Number(env.DB_PORT ?? 5432);
  if (!Number.isInteger(port) || port <= 0) {
    throw new TypeError(`Invalid DB_PORT value: ${String(env.DB_PORT)}`);
  }

  const user = encodeURIComponent(POSTGRES_USER);
  const password = encodeURIComponent(POSTGRES_PASSWORD);
  return `postgresql://${user}:${password}@${DB_HOST}:${port}/${POSTGRES_DB}`;
}
