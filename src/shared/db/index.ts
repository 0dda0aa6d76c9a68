// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db`
 * Purpose: Settlement ledger tables and the Postgres URL builder.
 * Scope: Re-exports only. Connections live in adapters/server/db.
 * Side-effects: none
 * @public
 */

export * from "./db-url";
export * from "./schema.settlement";
