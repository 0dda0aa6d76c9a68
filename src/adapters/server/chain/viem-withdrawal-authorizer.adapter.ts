// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/chain/viem-withdrawal-authorizer`
 * Purpose: WithdrawalAuthorizer that checks an EIP-712 Withdrawal signature against the beneficiary address.
 * Scope: Offline signature recovery (EOA signatures). Does not consume nonces or read balances.
 * Invariants: Domain is bound to chain id and custody address, so a signature is not portable across deployments.
 * Side-effects: none
 * Links: Implements WithdrawalAuthorizer port; used by both production and test wiring
 * @public
 */

import { verifyTypedData } from "viem";

import type { AccountAddress, HexString, WithdrawalRequest } from "@/core";
import type { WithdrawalAuthorizer } from "@/ports";
import { WITHDRAWAL_TYPES, withdrawalDomain } from "@/shared/web3";

export class ViemWithdrawalAuthorizerAdapter implements WithdrawalAuthorizer {
  constructor(
    private readonly chainId: number,
    private readonly custodyAddress: AccountAddress
  ) {}

  async isSignedByBeneficiary(
    request: WithdrawalRequest,
    signature: HexString
  ): Promise<boolean> {
    try {
      return await verifyTypedData({
        address: request.beneficiary,
        domain: withdrawalDomain({
          chainId: this.chainId,
          custodyAddress: this.custodyAddress,
        }),
        types: WITHDRAWAL_TYPES,
        primaryType: "Withdrawal",
        message: {
          beneficiary: request.beneficiary,
          to: request.to,
          amount: request.amount,
          nonce: request.nonce,
          deadline: request.deadline,
        },
        signature,
      });
    } catch {
      // unrecoverable signature bytes
      return false;
    }
  }
}
