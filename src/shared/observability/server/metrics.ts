// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and metric definitions.
 * Scope: Shared registry singleton plus HTTP, settlement and withdrawal metrics. Does not implement the scrape endpoint.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (no ids, no addresses).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: getOrCreate pattern prevents duplicate registration when test files re-import the module.
 * Links: Exposed via GET /metrics (bootstrap/http/routes/health)
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: "agent-settlement",
    env: process.env.DEPLOY_ENVIRONMENT ?? "local",
  });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: labelNames as T[],
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames: labelNames as T[],
    buckets,
    registers: [metricsRegistry],
  });
}

// =============================================================================
// HTTP Metrics
// =============================================================================

export const httpRequestsTotal = getOrCreateCounter(
  "http_requests_total",
  "Total number of HTTP requests",
  ["route", "method", "status"] as const
);

export const httpRequestDurationMs = getOrCreateHistogram(
  "http_request_duration_ms",
  "HTTP request duration in milliseconds",
  ["route", "method"] as const,
  [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000]
);

// =============================================================================
// Settlement Metrics
// =============================================================================

/**
 * outcome is "settled" or a domain error code (REPLAY, AMOUNT_MISMATCH, ...)
 */
export const settlementsTotal = getOrCreateCounter(
  "settlements_total",
  "Settlement attempts by outcome",
  ["outcome"] as const
);

/**
 * USDC base units attributed to owners (net) and treasury (fee)
 */
export const settlementRevenueUnitsTotal = getOrCreateCounter(
  "settlement_revenue_units_total",
  "Settled revenue in token base units by kind",
  ["kind"] as const
);

export const withdrawalsTotal = getOrCreateCounter(
  "withdrawals_total",
  "Withdrawal attempts by outcome",
  ["outcome"] as const
);

// =============================================================================
// Helpers
// =============================================================================

/**
 * Map HTTP status code to bucket for low-cardinality label.
 */
export function statusBucket(status: number): "2xx" | "4xx" | "5xx" {
  if (status >= 200 && status < 300) return "2xx";
  if (status >= 400 && status < 500) return "4xx";
  return "5xx";
}
