// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/settlement/fake-usdc-token`
 * Purpose: In-process EIP-3009 token for tests and APP_ENV=test wiring.
 * Scope: Balances, authorization nonces, validity window and real typed-data signature checks. Does not model gas or blocks.
 * Invariants:
 * - Checks run in the token's order: validAfter < now < validBefore, nonce unused, signature by `from`, balance.
 * - A rejected pull moves no funds and does not consume the nonce.
 * - Transfers out of custody fail for the zero address, on insufficient custody balance, or while a failure is configured.
 * - With a confirmation failure configured, funds move and the call then throws TransactionUnconfirmedPortError.
 * Side-effects: none (in-memory only)
 * Notes: Time comes from the injected Clock so tests can move across validity windows.
 * Links: Implements SettlementToken port
 * @public
 */

import { verifyTypedData } from "viem";

import type { AccountAddress, HexString } from "@/core";
import { isUsableAddress, toUnixSeconds } from "@/core";
import type {
  Clock,
  PullWithAuthorizationParams,
  SettlementToken,
  TokenTransferResult,
} from "@/ports";
import {
  AuthorizationRejectedPortError,
  TransactionUnconfirmedPortError,
  TransferRejectedPortError,
} from "@/ports";
import { TRANSFER_WITH_AUTHORIZATION_TYPES, usdcDomain } from "@/shared/web3";

export interface FakeUsdcTokenConfig {
  chainId: number;
  tokenAddress: AccountAddress;
  custodyAddress: AccountAddress;
  clock: Clock;
}

export class FakeUsdcTokenAdapter implements SettlementToken {
  readonly tokenAddress: AccountAddress;
  readonly custodyAddress: AccountAddress;

  private readonly balances = new Map<string, bigint>();
  private readonly usedAuthorizations = new Set<string>();
  private transferFailure: string | null = null;
  private confirmationFailure: string | null = null;
  private txCounter = 0;

  public lastPullParams: PullWithAuthorizationParams | undefined;
  public transfers: { to: AccountAddress; amount: bigint }[] = [];

  constructor(private readonly config: FakeUsdcTokenConfig) {
    this.tokenAddress = config.tokenAddress;
    this.custodyAddress = config.custodyAddress;
  }

  mint(account: AccountAddress, amount: bigint): void {
    this.credit(account, amount);
  }

  balanceOf(account: AccountAddress): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  /**
   * Makes every subsequent transfer() fail with the given detail; null clears it
   */
  setTransferFailure(detail: string | null): void {
    this.transferFailure = detail;
  }

  /**
   * Makes every subsequent pull and transfer move funds, then fail to confirm with the given detail; null clears it
   */
  setConfirmationFailure(detail: string | null): void {
    this.confirmationFailure = detail;
  }

  reset(): void {
    this.balances.clear();
    this.usedAuthorizations.clear();
    this.transferFailure = null;
    this.confirmationFailure = null;
    this.lastPullParams = undefined;
    this.transfers = [];
  }

  async pullWithAuthorization(
    params: PullWithAuthorizationParams
  ): Promise<TokenTransferResult> {
    this.lastPullParams = params;
    const { from, to, amount, proof } = params;
    const now = toUnixSeconds(this.config.clock.now());

    if (now <= proof.validAfter) {
      throw new AuthorizationRejectedPortError(
        "NOT_YET_VALID",
        `authorization is not yet valid (now ${now}, validAfter ${proof.validAfter})`
      );
    }
    if (now >= proof.validBefore) {
      throw new AuthorizationRejectedPortError(
        "EXPIRED",
        `authorization is expired (now ${now}, validBefore ${proof.validBefore})`
      );
    }

    const authorizationKey = this.authorizationKey(from, proof.nonce);
    if (this.usedAuthorizations.has(authorizationKey)) {
      throw new AuthorizationRejectedPortError(
        "NONCE_USED",
        "authorization is used or canceled"
      );
    }

    const signedByPayer = await this.isSignedBy(params);
    if (!signedByPayer) {
      throw new AuthorizationRejectedPortError(
        "INVALID_SIGNATURE",
        "invalid signature"
      );
    }

    if (this.balanceOf(from) < amount) {
      throw new AuthorizationRejectedPortError(
        "INSUFFICIENT_FUNDS",
        "transfer amount exceeds balance"
      );
    }

    this.usedAuthorizations.add(authorizationKey);
    this.debit(from, amount);
    this.credit(to, amount);
    return this.confirm(this.nextTxHash());
  }

  async isAuthorizationUsed(
    authorizer: AccountAddress,
    nonce: HexString
  ): Promise<boolean> {
    return this.usedAuthorizations.has(this.authorizationKey(authorizer, nonce));
  }

  async transfer(
    to: AccountAddress,
    amount: bigint
  ): Promise<TokenTransferResult> {
    if (this.transferFailure !== null) {
      throw new TransferRejectedPortError(to, this.transferFailure);
    }
    if (!isUsableAddress(to)) {
      throw new TransferRejectedPortError(to, "transfer to the zero address");
    }
    if (this.balanceOf(this.custodyAddress) < amount) {
      throw new TransferRejectedPortError(
        to,
        "transfer amount exceeds custody balance"
      );
    }

    this.debit(this.custodyAddress, amount);
    this.credit(to, amount);
    this.transfers.push({ to, amount });
    return this.confirm(this.nextTxHash());
  }

  private confirm(txHash: HexString): TokenTransferResult {
    if (this.confirmationFailure !== null) {
      throw new TransactionUnconfirmedPortError(
        txHash,
        this.confirmationFailure
      );
    }
    return { txHash };
  }

  private async isSignedBy(
    params: PullWithAuthorizationParams
  ): Promise<boolean> {
    const { from, to, amount, proof } = params;
    try {
      return await verifyTypedData({
        address: from,
        domain: usdcDomain({
          chainId: this.config.chainId,
          tokenAddress: this.tokenAddress,
        }),
        types: TRANSFER_WITH_AUTHORIZATION_TYPES,
        primaryType: "TransferWithAuthorization",
        message: {
          from,
          to,
          value: amount,
          validAfter: proof.validAfter,
          validBefore: proof.validBefore,
          nonce: proof.nonce,
        },
        signature: proof.signature,
      });
    } catch {
      // unrecoverable signature bytes
      return false;
    }
  }

  private authorizationKey(authorizer: string, nonce: string): string {
    return `${authorizer.toLowerCase()}:${nonce.toLowerCase()}`;
  }

  private credit(account: AccountAddress, amount: bigint): void {
    this.balances.set(account.toLowerCase(), this.balanceOf(account) + amount);
  }

  private debit(account: AccountAddress, amount: bigint): void {
    this.balances.set(account.toLowerCase(), this.balanceOf(account) - amount);
  }

  private nextTxHash(): HexString {
    this.txCounter += 1;
    return `0x${this.txCounter.toString(16).padStart(64, "0")}`;
  }
}
