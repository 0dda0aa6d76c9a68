// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/withdrawal-authorizer`
 * Purpose: Verifies that a withdrawal request was signed by its beneficiary.
 * Scope: Signature check only. Does not consume nonces or check deadlines.
 * Side-effects: none (interface definition only)
 * Links: ViemWithdrawalAuthorizerAdapter
 * @public
 */

import type { HexString, WithdrawalRequest } from "@/core";

export interface WithdrawalAuthorizer {
  isSignedByBeneficiary(
    request: WithdrawalRequest,
    signature: HexString
  ): Promise<boolean>;
}
