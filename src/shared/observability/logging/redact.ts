// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys. Payer signatures count as secrets; addresses and amounts do not.
 * Side-effects: none
 * Links: Imported by logger module
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "apiToken",
  "secret",
  "FACILITATOR_API_TOKEN",
  "ADMIN_API_TOKEN",
  "METRICS_TOKEN",
  // HTTP headers
  "req.headers.authorization",
  "headers.authorization",
  "authorization",
  // Wallet/crypto
  "privateKey",
  "SETTLEMENT_SIGNER_KEY",
  "signature",
  "proof.signature",
  "authorization.signature",
];
