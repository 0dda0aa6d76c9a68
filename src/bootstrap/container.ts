// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports for runtime dependency injection. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; config.unhandledErrorPolicy set by env.
 * Side-effects: IO (initializes logger, emits startup log, opens DB pool in production)
 * Notes: APP_ENV=test wires in-process ledger, registries and token; APP_ENV=production wires Postgres and RPC.
 *        createContainer(overrides) lets tests swap any port while keeping the rest of the wiring.
 * Links: Used by bootstrap/app and bootstrap/server.
 * @public
 */

import type { Logger } from "pino";

import {
  createChainClients,
  DrizzleSettlementLedgerAdapter,
  getDb,
  PinoSettlementEventSink,
  pingDb,
  RoleAccessPolicy,
  SystemClock,
  ViemIdentityRegistryAdapter,
  ViemSkuRegistryAdapter,
  ViemUsdcTokenAdapter,
  ViemWithdrawalAuthorizerAdapter,
} from "@/adapters/server";
import {
  FakeIdentityRegistryAdapter,
  FakeSkuRegistryAdapter,
  FakeUsdcTokenAdapter,
  InMemorySettlementLedgerAdapter,
} from "@/adapters/test";
import type { SettlementDeps } from "@/features/settlement/public";
import { assertRuntimeSecrets, serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";
import { normalizeAddress } from "@/shared/web3";

export type UnhandledErrorPolicy = "rethrow" | "respond_500";

/** Custody account used by the in-process token in test mode */
export const TEST_CUSTODY_ADDRESS = "0x00000000000000000000000000000000000c0de5";
/** Token address used by the in-process token in test mode */
export const TEST_USDC_ADDRESS = "0x0000000000000000000000000000000000005dc0";

export interface ApiTokens {
  facilitator: string | undefined;
  admin: string | undefined;
  metrics: string | undefined;
}

export interface ContainerConfig {
  /** How route wrappers handle unhandled errors: rethrow for test, respond_500 for production */
  unhandledErrorPolicy: UnhandledErrorPolicy;
  apiTokens: ApiTokens;
  chainId: number;
  serviceName: string;
}

export interface Container extends SettlementDeps {
  log: Logger;
  config: ContainerConfig;
  /** True when the ledger store answers */
  checkReadiness(): Promise<boolean>;
}

let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only.
 */
export function resetContainer(): void {
  _container = null;
}

export function createContainer(overrides: Partial<Container> = {}): Container {
  const env = serverEnv();
  const log = overrides.log ?? makeLogger({ service: env.SERVICE_NAME });
  const clock = overrides.clock ?? new SystemClock();

  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      chainId: env.CHAIN_ID,
    },
    "container initialized"
  );

  const config: ContainerConfig = {
    unhandledErrorPolicy: env.isTestMode ? "rethrow" : "respond_500",
    apiTokens: {
      facilitator: env.FACILITATOR_API_TOKEN,
      admin: env.ADMIN_API_TOKEN,
      metrics: env.METRICS_TOKEN,
    },
    chainId: env.CHAIN_ID,
    serviceName: env.SERVICE_NAME,
    ...overrides.config,
  };

  const feeDefaults = overrides.feeDefaults ?? {
    feeBasisPoints: env.DEFAULT_FEE_BPS,
    treasuryAddress: normalizeAddress(env.TREASURY_ADDRESS),
  };

  const shared = {
    log,
    config,
    clock,
    feeDefaults,
    events: overrides.events ?? new PinoSettlementEventSink(log),
    accessPolicy: overrides.accessPolicy ?? new RoleAccessPolicy(),
  };

  if (env.isTestMode) {
    const ledger = overrides.ledger ?? new InMemorySettlementLedgerAdapter();
    const token =
      overrides.token ??
      new FakeUsdcTokenAdapter({
        chainId: env.CHAIN_ID,
        tokenAddress: TEST_USDC_ADDRESS,
        custodyAddress: TEST_CUSTODY_ADDRESS,
        clock,
      });
    return {
      ...shared,
      ledger,
      token,
      skus: overrides.skus ?? new FakeSkuRegistryAdapter(),
      identity: overrides.identity ?? new FakeIdentityRegistryAdapter(),
      withdrawalAuthorizer:
        overrides.withdrawalAuthorizer ??
        new ViemWithdrawalAuthorizerAdapter(env.CHAIN_ID, token.custodyAddress),
      checkReadiness: overrides.checkReadiness ?? (async () => true),
    };
  }

  const secrets = assertRuntimeSecrets(env);
  const db = getDb(secrets.DATABASE_URL);
  const clients = createChainClients({
    chainId: env.CHAIN_ID,
    rpcUrl: secrets.EVM_RPC_URL,
    signerKey: secrets.SETTLEMENT_SIGNER_KEY,
  });
  const token =
    overrides.token ??
    new ViemUsdcTokenAdapter(clients, secrets.USDC_ADDRESS, log);

  return {
    ...shared,
    ledger: overrides.ledger ?? new DrizzleSettlementLedgerAdapter(db),
    token,
    skus:
      overrides.skus ??
      new ViemSkuRegistryAdapter(
        clients.publicClient,
        secrets.SKU_REGISTRY_ADDRESS
      ),
    identity:
      overrides.identity ??
      new ViemIdentityRegistryAdapter(
        clients.publicClient,
        secrets.IDENTITY_REGISTRY_ADDRESS
      ),
    withdrawalAuthorizer:
      overrides.withdrawalAuthorizer ??
      new ViemWithdrawalAuthorizerAdapter(env.CHAIN_ID, token.custodyAddress),
    checkReadiness:
      overrides.checkReadiness ??
      (async () => {
        try {
          await pingDb(db);
          return true;
        } catch (error) {
          log.warn({ err: error }, "readiness check failed");
          return false;
        }
      }),
  };
}
