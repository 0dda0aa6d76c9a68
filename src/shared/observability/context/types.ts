// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Request-scoped context passed from the route wrapper into handlers.
 * Scope: Define RequestContext interface. Does not implement context creation.
 * Invariants: log is a child logger with reqId, route, method bound.
 * Side-effects: none
 * Links: Created by context/factory; consumed by bootstrap/http routes
 * @public
 */

import type { Logger } from "pino";

/**
 * Structural clock (any ports/Clock satisfies it)
 */
export interface Clock {
  now(): string;
}

export interface RequestContext {
  log: Logger;
  reqId: string;
  routeId: string;
  clock: Clock;
}
