// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/chain/viem-usdc-token`
 * Purpose: SettlementToken backed by a USDC (FiatTokenV2) contract via viem.
 * Scope: transferWithAuthorization into custody, authorizationState reads, transfers out of custody. Does not retry or bump gas.
 * Invariants:
 * - Every write is simulated first; a simulated revert never reaches the chain.
 * - Each write waits for its receipt; a reverted receipt is a rejection.
 * - A receipt that cannot be read after broadcast is TransactionUnconfirmedPortError, since the write may have landed.
 * - Revert strings map to FundsPullFailureReason; unmatched reverts map to REVERTED.
 * Side-effects: IO (RPC calls, transactions signed by the custody key)
 * Links: Implements SettlementToken port
 * @public
 */

import {
  BaseError,
  ContractFunctionRevertedError,
  type Hex,
} from "viem";

import type { AccountAddress, FundsPullFailureReason, HexString } from "@/core";
import type {
  PullWithAuthorizationParams,
  SettlementToken,
  TokenTransferResult,
} from "@/ports";
import {
  AuthorizationRejectedPortError,
  TransactionUnconfirmedPortError,
  TransferRejectedPortError,
} from "@/ports";
import type { Logger } from "@/shared/observability";
import { SETTLEMENT_TOKEN_ABI } from "@/shared/web3";
import type { ChainClients } from "./viem-clients";

const REVERT_REASONS: ReadonlyArray<[RegExp, FundsPullFailureReason]> = [
  [/not yet valid/i, "NOT_YET_VALID"],
  [/expired/i, "EXPIRED"],
  [/used or canceled|already used/i, "NONCE_USED"],
  [/invalid signature|invalid signer/i, "INVALID_SIGNATURE"],
  [/exceeds balance|insufficient/i, "INSUFFICIENT_FUNDS"],
];

export function classifyRevertReason(
  reason: string | undefined
): FundsPullFailureReason {
  if (!reason) return "REVERTED";
  for (const [pattern, code] of REVERT_REASONS) {
    if (pattern.test(reason)) return code;
  }
  return "REVERTED";
}

function revertReasonOf(error: unknown): string | undefined {
  if (!(error instanceof BaseError)) return undefined;
  const reverted = error.walk((e) => e instanceof ContractFunctionRevertedError);
  if (reverted instanceof ContractFunctionRevertedError) {
    return reverted.reason ?? reverted.shortMessage;
  }
  return undefined;
}

export class ViemUsdcTokenAdapter implements SettlementToken {
  readonly custodyAddress: AccountAddress;

  constructor(
    private readonly clients: ChainClients,
    readonly tokenAddress: AccountAddress,
    private readonly log: Logger
  ) {
    this.custodyAddress = clients.account.address;
  }

  async pullWithAuthorization(
    params: PullWithAuthorizationParams
  ): Promise<TokenTransferResult> {
    const { from, to, amount, proof } = params;

    let txHash: Hex;
    try {
      const { request } = await this.clients.publicClient.simulateContract({
        account: this.clients.account,
        address: this.tokenAddress,
        abi: SETTLEMENT_TOKEN_ABI,
        functionName: "transferWithAuthorization",
        args: [
          from,
          to,
          amount,
          proof.validAfter,
          proof.validBefore,
          proof.nonce,
          proof.signature,
        ],
      });
      txHash = await this.clients.walletClient.writeContract(request);
    } catch (error) {
      const reason = revertReasonOf(error);
      if (reason === undefined) throw error;
      throw new AuthorizationRejectedPortError(
        classifyRevertReason(reason),
        reason
      );
    }

    this.log.info(
      { txHash, functionName: "transferWithAuthorization" },
      "tx submitted"
    );

    if (!(await this.confirm(txHash))) {
      this.log.warn({ txHash }, "transferWithAuthorization reverted");
      throw new AuthorizationRejectedPortError(
        "REVERTED",
        `transaction ${txHash} reverted`
      );
    }

    return { txHash };
  }

  async isAuthorizationUsed(
    authorizer: AccountAddress,
    nonce: HexString
  ): Promise<boolean> {
    return await this.clients.publicClient.readContract({
      address: this.tokenAddress,
      abi: SETTLEMENT_TOKEN_ABI,
      functionName: "authorizationState",
      args: [authorizer, nonce],
    });
  }

  async transfer(
    to: AccountAddress,
    amount: bigint
  ): Promise<TokenTransferResult> {
    // Nothing is broadcast when simulation fails, so any failure here is a rejection
    const { request } = await this.clients.publicClient
      .simulateContract({
        account: this.clients.account,
        address: this.tokenAddress,
        abi: SETTLEMENT_TOKEN_ABI,
        functionName: "transfer",
        args: [to, amount],
      })
      .catch((error: unknown) => {
        throw new TransferRejectedPortError(
          to,
          revertReasonOf(error) ??
            (error instanceof Error ? error.message : String(error))
        );
      });

    let txHash: Hex;
    try {
      txHash = await this.clients.walletClient.writeContract(request);
    } catch (error) {
      const reason = revertReasonOf(error);
      if (reason === undefined) throw error;
      throw new TransferRejectedPortError(to, reason);
    }

    this.log.info({ txHash, functionName: "transfer" }, "tx submitted");

    if (!(await this.confirm(txHash))) {
      this.log.warn({ txHash }, "transfer reverted");
      throw new TransferRejectedPortError(to, `transaction ${txHash} reverted`);
    }

    return { txHash };
  }

  /**
   * Waits for the receipt; true when the transaction succeeded, false when it reverted
   * @throws TransactionUnconfirmedPortError
   */
  private async confirm(txHash: Hex): Promise<boolean> {
    try {
      const receipt = await this.clients.publicClient.waitForTransactionReceipt(
        { hash: txHash }
      );
      return receipt.status === "success";
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.log.error({ txHash, err: error }, "receipt unavailable");
      throw new TransactionUnconfirmedPortError(txHash, detail);
    }
  }
}
