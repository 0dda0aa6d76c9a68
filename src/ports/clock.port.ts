// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for entitlement windows, authorization validity and withdrawal deadlines.
 * Scope: Provides current time in ISO format. Does not convert to unix seconds (see core toUnixSeconds).
 * Invariants: Always returns ISO 8601 string format
 * Side-effects: none (interface only)
 * Links: SystemClock (server), FakeClock (tests)
 * @public
 */

export interface Clock {
  /** Current time as ISO 8601 string */
  now(): string;
}
