// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http`
 * Purpose: HTTP utilities for bootstrapping: route wrapper, auth, error mapping, entitlement gate.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  extractBearerToken,
  matchesToken,
  resolveCaller,
  safeCompare,
} from "./auth";
export {
  type EntitlementGateOptions,
  entitlementGate,
} from "./entitlementGate";
export {
  type ErrorStatus,
  MalformedBodyError,
  type MappedError,
  mapError,
} from "./errorMapping";
export { registerAdminRoutes } from "./routes/admin.routes";
export { registerMetaRoutes } from "./routes/meta.routes";
export { registerPaymentRoutes } from "./routes/payments.routes";
export { registerRevenueRoutes } from "./routes/revenue.routes";
export { registerSettlementRoutes } from "./routes/settlement.routes";
export { readJsonBody, type RouteHandler, wrapRoute } from "./wrapRoute";
