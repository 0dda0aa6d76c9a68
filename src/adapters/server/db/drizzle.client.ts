// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client configuration and connection management.
 * Scope: Database connection setup and Drizzle ORM instance. Does not handle business logic or migrations.
 * Invariants: One connection pool per process; created on first access with the URL the container resolved.
 * Side-effects: IO (database connections) - only on first access
 * Notes: postgres.js driver; bigint columns use mode "bigint" so amounts never pass through floats.
 * Links: Used by DrizzleSettlementLedgerAdapter; wired in bootstrap/container
 * @internal
 */

import { sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "@/shared/db/schema.settlement";

export type Database = PostgresJsDatabase<typeof schema>;

let _client: postgres.Sql | null = null;
let _db: Database | null = null;

export function getDb(databaseUrl: string): Database {
  if (!_db) {
    _client = postgres(databaseUrl, {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: "agent_settlement",
      },
    });
    _db = drizzle(_client, { schema });
  }
  return _db;
}

/**
 * Closes the pool (graceful shutdown)
 */
export async function closeDb(): Promise<void> {
  if (_client) {
    await _client.end({ timeout: 5 });
  }
  _client = null;
  _db = null;
}

/**
 * Readiness probe: one round trip
 */
export async function pingDb(db: Database): Promise<void> {
  await db.execute(sql`select 1`);
}
