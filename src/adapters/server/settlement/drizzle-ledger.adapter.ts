// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/settlement/drizzle-ledger`
 * Purpose: Drizzle-based implementation of SettlementLedgerRepository for PostgreSQL persistence.
 * Scope: Replay guard, entitlement and revenue ledgers, fee config and withdrawal nonces. Does not validate receipts or compute splits.
 * Invariants:
 * - Burns and nonce consumption are INSERT ... ON CONFLICT DO NOTHING on the primary key.
 * - Grants, credits and debits are single-statement read-modify-writes; debits and credit consumption are conditional.
 * - applySettlement runs in one transaction.
 * - Addresses and payment ids are stored lowercase; reads return checksummed addresses.
 * Side-effects: IO (database operations)
 * Links: Implements SettlementLedgerRepository port; mirrors core/entitlements/rules in SQL
 * @public
 */

import { and, eq, gt, gte, sql } from "drizzle-orm";
import { getAddress } from "viem";

import type { Database } from "@/adapters/server/db/drizzle.client";
import type {
  AccountAddress,
  EntitlementGrant,
  EntitlementRecord,
  FeeConfig,
  HexString,
  SettlementRecord,
} from "@/core";
import { emptyEntitlement } from "@/core";
import type {
  ApplySettlementParams,
  SettlementLedgerRepository,
} from "@/ports";
import {
  consumedPayments,
  entitlements,
  feeConfig,
  revenueBalances,
  settlements,
  withdrawalNonces,
} from "@/shared/db";

type Tx = Parameters<Parameters<Database["transaction"]>[0]>[0];
type Executor = Database | Tx;

type EntitlementRow = typeof entitlements.$inferSelect;
type SettlementRow = typeof settlements.$inferSelect;
type FeeConfigRow = typeof feeConfig.$inferSelect;

const FEE_CONFIG_ID = 1;

function key(value: string): string {
  return value.toLowerCase();
}

export class DrizzleSettlementLedgerAdapter
  implements SettlementLedgerRepository
{
  constructor(private readonly db: Database) {}

  async isPaymentConsumed(paymentId: HexString): Promise<boolean> {
    const rows = await this.db
      .select({ paymentId: consumedPayments.paymentId })
      .from(consumedPayments)
      .where(eq(consumedPayments.paymentId, key(paymentId)))
      .limit(1);
    return rows.length > 0;
  }

  async consumePaymentId(
    paymentId: HexString,
    consumedAt: Date
  ): Promise<boolean> {
    const inserted = await this.db
      .insert(consumedPayments)
      .values({ paymentId: key(paymentId), consumedAt })
      .onConflictDoNothing({ target: consumedPayments.paymentId })
      .returning({ paymentId: consumedPayments.paymentId });
    return inserted.length === 1;
  }

  async applySettlement(
    params: ApplySettlementParams
  ): Promise<EntitlementRecord> {
    const { settlement, grant } = params;

    return await this.db.transaction(async (tx) => {
      const entitlement = await this.upsertGrant(
        tx,
        settlement.agentId,
        settlement.payer,
        grant
      );
      await this.credit(tx, settlement.owner, settlement.net);
      await this.credit(tx, settlement.treasury, settlement.fee);

      await tx.insert(settlements).values({
        paymentId: key(settlement.paymentId),
        skuId: settlement.skuId.toString(),
        agentId: settlement.agentId.toString(),
        payer: key(settlement.payer),
        amount: settlement.amount,
        licenseType: settlement.licenseType,
        owner: key(settlement.owner),
        treasury: key(settlement.treasury),
        fee: settlement.fee,
        net: settlement.net,
        settledAt: settlement.settledAt,
      });

      return entitlement;
    });
  }

  async findSettlement(paymentId: HexString): Promise<SettlementRecord | null> {
    const [row] = await this.db
      .select()
      .from(settlements)
      .where(eq(settlements.paymentId, key(paymentId)))
      .limit(1);
    return row ? this.mapSettlement(row) : null;
  }

  async getEntitlement(
    agentId: bigint,
    payer: AccountAddress
  ): Promise<EntitlementRecord> {
    const [row] = await this.db
      .select()
      .from(entitlements)
      .where(
        and(
          eq(entitlements.agentId, agentId.toString()),
          eq(entitlements.payer, key(payer))
        )
      )
      .limit(1);
    return row ? this.mapEntitlement(row) : emptyEntitlement(agentId, payer);
  }

  async consumeCallCredit(
    agentId: bigint,
    payer: AccountAddress
  ): Promise<EntitlementRecord | null> {
    const [row] = await this.db
      .update(entitlements)
      .set({
        callCredits: sql`${entitlements.callCredits} - 1`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(entitlements.agentId, agentId.toString()),
          eq(entitlements.payer, key(payer)),
          gt(entitlements.callCredits, 0n)
        )
      )
      .returning();
    return row ? this.mapEntitlement(row) : null;
  }

  async getBalance(beneficiary: AccountAddress): Promise<bigint> {
    const [row] = await this.db
      .select({ balance: revenueBalances.balance })
      .from(revenueBalances)
      .where(eq(revenueBalances.beneficiary, key(beneficiary)))
      .limit(1);
    return row?.balance ?? 0n;
  }

  async debitBalance(
    beneficiary: AccountAddress,
    amount: bigint
  ): Promise<bigint | null> {
    const [row] = await this.db
      .update(revenueBalances)
      .set({
        balance: sql`${revenueBalances.balance} - ${amount}`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(revenueBalances.beneficiary, key(beneficiary)),
          gte(revenueBalances.balance, amount)
        )
      )
      .returning({ balance: revenueBalances.balance });
    return row ? row.balance : null;
  }

  async creditBalance(
    beneficiary: AccountAddress,
    amount: bigint
  ): Promise<bigint> {
    return await this.credit(this.db, beneficiary, amount);
  }

  async getFeeConfig(defaults: FeeConfig): Promise<FeeConfig> {
    return await this.db.transaction(async (tx) => {
      await tx
        .insert(feeConfig)
        .values({
          id: FEE_CONFIG_ID,
          feeBasisPoints: defaults.feeBasisPoints,
          treasuryAddress: key(defaults.treasuryAddress),
        })
        .onConflictDoNothing({ target: feeConfig.id });

      const [row] = await tx
        .select()
        .from(feeConfig)
        .where(eq(feeConfig.id, FEE_CONFIG_ID))
        .limit(1);
      if (!row) {
        throw new Error("fee_config row missing after seed");
      }
      return this.mapFeeConfig(row);
    });
  }

  async updateFeeConfig(
    patch: Partial<FeeConfig>,
    defaults: FeeConfig
  ): Promise<FeeConfig> {
    const merged = { ...defaults, ...patch };
    const set: Partial<typeof feeConfig.$inferInsert> = {
      updatedAt: new Date(),
    };
    if (patch.feeBasisPoints !== undefined) {
      set.feeBasisPoints = patch.feeBasisPoints;
    }
    if (patch.treasuryAddress !== undefined) {
      set.treasuryAddress = key(patch.treasuryAddress);
    }

    const [row] = await this.db
      .insert(feeConfig)
      .values({
        id: FEE_CONFIG_ID,
        feeBasisPoints: merged.feeBasisPoints,
        treasuryAddress: key(merged.treasuryAddress),
      })
      .onConflictDoUpdate({ target: feeConfig.id, set })
      .returning();
    if (!row) {
      throw new Error("fee_config upsert returned no row");
    }
    return this.mapFeeConfig(row);
  }

  async consumeWithdrawalNonce(
    beneficiary: AccountAddress,
    nonce: HexString
  ): Promise<boolean> {
    const inserted = await this.db
      .insert(withdrawalNonces)
      .values({ beneficiary: key(beneficiary), nonce: key(nonce) })
      .onConflictDoNothing({
        target: [withdrawalNonces.beneficiary, withdrawalNonces.nonce],
      })
      .returning({ nonce: withdrawalNonces.nonce });
    return inserted.length === 1;
  }

  // ---------------------------------------------------------------------------
  // Statements shared by transactional and standalone paths
  // ---------------------------------------------------------------------------

  private async upsertGrant(
    executor: Executor,
    agentId: bigint,
    payer: AccountAddress,
    grant: EntitlementGrant
  ): Promise<EntitlementRecord> {
    const id = { agentId: agentId.toString(), payer: key(payer) };

    const insert =
      grant.kind === "call"
        ? { ...id, callCredits: 1n, validUntil: 0n }
        : { ...id, callCredits: 0n, validUntil: grant.now + grant.periodSeconds };

    const set =
      grant.kind === "call"
        ? {
            callCredits: sql`${entitlements.callCredits} + 1`,
            updatedAt: new Date(),
          }
        : {
            validUntil: sql`greatest(${entitlements.validUntil}, ${grant.now}::bigint) + ${grant.periodSeconds}::bigint`,
            updatedAt: new Date(),
          };

    const [row] = await executor
      .insert(entitlements)
      .values(insert)
      .onConflictDoUpdate({
        target: [entitlements.agentId, entitlements.payer],
        set,
      })
      .returning();
    if (!row) {
      throw new Error("entitlement upsert returned no row");
    }
    return this.mapEntitlement(row);
  }

  private async credit(
    executor: Executor,
    beneficiary: AccountAddress,
    amount: bigint
  ): Promise<bigint> {
    const [row] = await executor
      .insert(revenueBalances)
      .values({ beneficiary: key(beneficiary), balance: amount })
      .onConflictDoUpdate({
        target: revenueBalances.beneficiary,
        set: {
          balance: sql`${revenueBalances.balance} + ${amount}`,
          updatedAt: new Date(),
        },
      })
      .returning({ balance: revenueBalances.balance });
    if (!row) {
      throw new Error("revenue credit returned no row");
    }
    return row.balance;
  }

  private mapEntitlement(row: EntitlementRow): EntitlementRecord {
    return {
      agentId: BigInt(row.agentId),
      payer: getAddress(row.payer),
      callCredits: row.callCredits,
      validUntil: row.validUntil,
    };
  }

  private mapSettlement(row: SettlementRow): SettlementRecord {
    return {
      paymentId: `0x${row.paymentId.slice(2)}`,
      skuId: BigInt(row.skuId),
      agentId: BigInt(row.agentId),
      payer: getAddress(row.payer),
      amount: row.amount,
      licenseType: row.licenseType,
      owner: getAddress(row.owner),
      treasury: getAddress(row.treasury),
      fee: row.fee,
      net: row.net,
      settledAt: row.settledAt,
    };
  }

  private mapFeeConfig(row: FeeConfigRow): FeeConfig {
    return {
      feeBasisPoints: row.feeBasisPoints,
      treasuryAddress: getAddress(row.treasuryAddress),
    };
  }
}
