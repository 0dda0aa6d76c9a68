// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3`
 * Purpose: Barrel export for chain configuration, ABIs, typed-data definitions and identifier normalization.
 * Scope: Re-exports only; no runtime side effects.
 * Side-effects: none
 * @public
 */

export * from "./abis";
export * from "./chain";
export * from "./eip712";
export * from "./identifiers";
