// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payer/services/withdrawalAuthorization`
 * Purpose: Sign an EIP-712 Withdrawal request as the beneficiary.
 * Scope: Typed-data signing only. The engine verifies it in ViemWithdrawalAuthorizerAdapter.
 * Invariants: Domain is bound to the chain id and the engine's custody address.
 * Side-effects: none
 * @public
 */

import type { LocalAccount } from "viem";

import type { AccountAddress, HexString, WithdrawalRequest } from "@/core";
import { WITHDRAWAL_TYPES, withdrawalDomain } from "@/shared/web3";

export async function signWithdrawalRequest(params: {
  account: LocalAccount;
  chainId: number;
  custodyAddress: AccountAddress;
  request: Omit<WithdrawalRequest, "beneficiary">;
}): Promise<{ request: WithdrawalRequest; signature: HexString }> {
  const request: WithdrawalRequest = {
    ...params.request,
    beneficiary: params.account.address,
  };
  const signature = await params.account.signTypedData({
    domain: withdrawalDomain({
      chainId: params.chainId,
      custodyAddress: params.custodyAddress,
    }),
    types: WITHDRAWAL_TYPES,
    primaryType: "Withdrawal",
    message: request,
  });
  return { request, signature };
}
