// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Public API for request-scoped context.
 * Scope: Re-export RequestContext type and factory.
 * Side-effects: none
 * @public
 */

export {
  createRequestContext,
  REQUEST_ID_HEADER,
  sanitizeReqId,
} from "./factory";
export type { Clock, RequestContext } from "./types";
