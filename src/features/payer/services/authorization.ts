// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payer/services/authorization`
 * Purpose: Sign EIP-3009 TransferWithAuthorization payloads on behalf of a payer.
 * Scope: Typed-data signing with a local viem account. Does not submit anything.
 * Invariants: Domain is USD Coin / version 2 on the configured chain and token; `to` is the settlement custody address.
 * Side-effects: none
 * Links: shared/web3/eip712, adapters/test/settlement/fake-usdc-token.adapter
 * @public
 */

import { bytesToHex, type LocalAccount } from "viem";

import type { AccountAddress, AuthorizationProof, HexString } from "@/core";
import { TRANSFER_WITH_AUTHORIZATION_TYPES, usdcDomain } from "@/shared/web3";

export interface UsdcAuthorizationParams {
  account: LocalAccount;
  chainId: number;
  tokenAddress: AccountAddress;
  to: AccountAddress;
  value: bigint;
  validAfter: bigint;
  validBefore: bigint;
  /** Random 32 bytes when omitted */
  nonce?: HexString;
}

export interface SignedUsdcAuthorization extends AuthorizationProof {
  from: AccountAddress;
  to: AccountAddress;
  value: bigint;
}

export function randomBytes32(): HexString {
  return bytesToHex(crypto.getRandomValues(new Uint8Array(32)));
}

export async function buildUsdcAuthorization(
  params: UsdcAuthorizationParams
): Promise<SignedUsdcAuthorization> {
  const nonce = params.nonce ?? randomBytes32();
  const message = {
    from: params.account.address,
    to: params.to,
    value: params.value,
    validAfter: params.validAfter,
    validBefore: params.validBefore,
    nonce,
  };

  const signature = await params.account.signTypedData({
    domain: usdcDomain({
      chainId: params.chainId,
      tokenAddress: params.tokenAddress,
    }),
    types: TRANSFER_WITH_AUTHORIZATION_TYPES,
    primaryType: "TransferWithAuthorization",
    message,
  });

  return { ...message, signature };
}
