// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payer/public`
 * Purpose: Payer-side API: sign USDC authorizations, build payment intents, submit them to a facilitator.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  type FacilitatorClientOptions,
  submitToFacilitator,
  toSettleRequestBody,
} from "./api/facilitatorClient";
export { FacilitatorHttpError, isFacilitatorHttpError } from "./errors";
export {
  buildUsdcAuthorization,
  randomBytes32,
  type SignedUsdcAuthorization,
  type UsdcAuthorizationParams,
} from "./services/authorization";
export {
  AUTHORIZATION_SKEW_SECONDS,
  type BuildPaymentIntentParams,
  buildPaymentIntent,
  DEFAULT_AUTHORIZATION_TTL_SECONDS,
  type PaymentIntent,
} from "./services/paymentIntent";
export { signWithdrawalRequest } from "./services/withdrawalAuthorization";
