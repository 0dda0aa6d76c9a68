// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.settlement`
 * Purpose: Settlement tables: replay guard, receipt anchors, entitlement and revenue ledgers, fee config, withdrawal nonces.
 * Scope: Table definitions only. Does not include queries.
 * Invariants:
 * - consumed_payments.payment_id is the primary key; the insert is the replay guard.
 * - entitlements keyed by (agent_id, payer); revenue_balances keyed by beneficiary. Rows are never deleted.
 * - call_credits, balance >= 0 enforced by check constraints.
 * - fee_config is a singleton row (id = 1) with fee_basis_points in 0..2000.
 * - agent_id and sku_id are uint256 on chain, stored as decimal text.
 * - Addresses are stored lowercase.
 * Side-effects: none (schema definitions only)
 * Links: src/adapters/server/settlement/drizzle-ledger.adapter.ts
 * @public
 */

import { sql } from "drizzle-orm";
import {
  bigint,
  check,
  index,
  integer,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const consumedPayments = pgTable("consumed_payments", {
  paymentId: text("payment_id").primaryKey(),
  consumedAt: timestamp("consumed_at", { withTimezone: true }).notNull(),
});

/**
 * Receipt anchor written in the same transaction as the ledger credits.
 */
export const settlements = pgTable(
  "settlements",
  {
    paymentId: text("payment_id")
      .primaryKey()
      .references(() => consumedPayments.paymentId),
    skuId: text("sku_id").notNull(),
    agentId: text("agent_id").notNull(),
    payer: text("payer").notNull(),
    amount: bigint("amount", { mode: "bigint" }).notNull(),
    licenseType: text("license_type", {
      enum: ["PER_CALL", "PER_PERIOD"],
    }).notNull(),
    owner: text("owner").notNull(),
    treasury: text("treasury").notNull(),
    fee: bigint("fee", { mode: "bigint" }).notNull(),
    net: bigint("net", { mode: "bigint" }).notNull(),
    settledAt: timestamp("settled_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    agentPayerIdx: index("settlements_agent_payer_idx").on(
      table.agentId,
      table.payer
    ),
  })
);

export const entitlements = pgTable(
  "entitlements",
  {
    agentId: text("agent_id").notNull(),
    payer: text("payer").notNull(),
    callCredits: bigint("call_credits", { mode: "bigint" })
      .notNull()
      .default(sql`0`),
    validUntil: bigint("valid_until", { mode: "bigint" })
      .notNull()
      .default(sql`0`),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.agentId, table.payer] }),
    creditsNonNegative: check(
      "entitlements_call_credits_non_negative",
      sql`${table.callCredits} >= 0`
    ),
  })
);

export const revenueBalances = pgTable(
  "revenue_balances",
  {
    beneficiary: text("beneficiary").primaryKey(),
    balance: bigint("balance", { mode: "bigint" }).notNull().default(sql`0`),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    balanceNonNegative: check(
      "revenue_balances_balance_non_negative",
      sql`${table.balance} >= 0`
    ),
  })
);

export const feeConfig = pgTable(
  "fee_config",
  {
    id: integer("id").primaryKey().default(1),
    feeBasisPoints: integer("fee_basis_points").notNull(),
    treasuryAddress: text("treasury_address").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    singleton: check("fee_config_singleton", sql`${table.id} = 1`),
    feeCap: check(
      "fee_config_fee_cap",
      sql`${table.feeBasisPoints} between 0 and 2000`
    ),
  })
);

export const withdrawalNonces = pgTable(
  "withdrawal_nonces",
  {
    beneficiary: text("beneficiary").notNull(),
    nonce: text("nonce").notNull(),
    consumedAt: timestamp("consumed_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.beneficiary, table.nonce] }),
  })
);
