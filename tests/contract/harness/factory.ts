// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/harness/factory`
 * Purpose: Hono app over in-process settlement fakes, plus request helpers for HTTP contract tests.
 * Scope: Wires createApp(createContainer(...)) to the settlement test harness. Does NOT listen on a socket.
 * Invariants: Each harness gets a fresh ledger, token and clock; requests go through app.request only.
 * Side-effects: none
 * Links: tests/_fakes/settlement/builders, src/bootstrap/app
 * @public
 */

import type { Hono } from "hono";

import { createApp } from "@/bootstrap/app";
import { type Container, createContainer } from "@/bootstrap/container";
import type { AuthorizationProof, PaymentReceipt } from "@/core";
import { toSettleRequestBody } from "@/features/payer/public";
import {
  makeSettlementHarness,
  type SettlementHarness,
  TEST_FACILITATOR_TOKEN,
} from "@tests/_fakes";

export interface HttpHarness {
  h: SettlementHarness;
  container: Container;
  app: Hono;
  get(path: string, token?: string): Promise<Response>;
  send(
    method: "POST" | "PUT",
    path: string,
    body: unknown,
    token?: string
  ): Promise<Response>;
  /** POST /v1/settlements as the facilitator */
  settle(receipt: PaymentReceipt, proof: AuthorizationProof): Promise<Response>;
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

export function makeHttpHarness(
  overrides: Partial<Container> = {}
): HttpHarness {
  const h = makeSettlementHarness();
  const container = createContainer({ ...h.deps, ...overrides });
  const app = createApp(container);

  const get = async (path: string, token?: string) =>
    app.request(path, { headers: token ? bearer(token) : {} });

  const send = async (
    method: "POST" | "PUT",
    path: string,
    body: unknown,
    token?: string
  ) =>
    app.request(path, {
      method,
      headers: {
        "Content-Type": "application/json",
        ...(token ? bearer(token) : {}),
      },
      body: typeof body === "string" ? body : JSON.stringify(body),
    });

  return {
    h,
    container,
    app,
    get,
    send,
    settle: (receipt, proof) =>
      send(
        "POST",
        "/v1/settlements",
        toSettleRequestBody({ receipt, proof }),
        TEST_FACILITATOR_TOKEN
      ),
  };
}
