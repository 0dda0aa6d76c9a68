// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/bootstrap/http/entitlementGate`
 * Purpose: Paid-route middleware: 402 without entitlement, metering after a served call, no metering under an active period.
 * Scope: Small Hono app over a container built from the settlement harness. Does NOT use the settlement routes.
 * Invariants: Credits are spent only for 2xx responses; period holders are never metered.
 * Side-effects: none
 * Links: src/bootstrap/http/entitlementGate.ts
 */

import { Hono } from "hono";
import { beforeEach, describe, expect, it } from "vitest";

import { createContainer } from "@/bootstrap/container";
import { entitlementGate } from "@/bootstrap/http";
import { settle } from "@/features/settlement/public";
import { isAccountAddress } from "@/shared/web3";
import {
  AGENT_ID,
  makeSettlementHarness,
  PER_PERIOD_SKU_ID,
  payerAccount,
  type SettlementHarness,
} from "@tests/_fakes";

function makeGatedApp(h: SettlementHarness): Hono {
  const container = createContainer({ ...h.deps });
  const app = new Hono();
  app.use(
    "/agents/:agentId/*",
    entitlementGate(container, {
      resolveAgentId: (c) => {
        const raw = c.req.param("agentId");
        return raw && /^\d+$/.test(raw) ? BigInt(raw) : null;
      },
      resolvePayer: (c) => {
        const payer = c.req.header("x-payer");
        return payer && isAccountAddress(payer) ? payer : null;
      },
    })
  );
  app.get("/agents/:agentId/run", (c) => c.json({ ok: true }));
  app.get("/agents/:agentId/broken", (c) => c.json({ ok: false }, 500));
  return app;
}

describe("entitlementGate", () => {
  let h: SettlementHarness;
  let app: Hono;
  const headers = { "x-payer": payerAccount.address };

  const credits = async () =>
    (await h.ledger.getEntitlement(AGENT_ID, payerAccount.address)).callCredits;

  const buy = async (n: number, skuId?: bigint) => {
    const { receipt, proof } = await h.paidReceipt(n, skuId);
    await settle(h.deps, h.facilitator, receipt, proof);
  };

  beforeEach(() => {
    h = makeSettlementHarness();
    app = makeGatedApp(h);
  });

  it("asks for payment when the payer is not identified", async () => {
    const res = await app.request(`/agents/${AGENT_ID}/run`);

    expect(res.status).toBe(402);
    expect(await res.json()).toEqual({
      error: {
        code: "PAYMENT_REQUIRED",
        message: "Agent and payer must be identified",
      },
    });
  });

  it("asks for payment without an entitlement", async () => {
    const res = await app.request(`/agents/${AGENT_ID}/run`, { headers });

    expect(res.status).toBe(402);
    expect(await res.json()).toEqual({
      error: {
        code: "PAYMENT_REQUIRED",
        message: "No entitlement for agent 7",
      },
    });
  });

  it("spends one credit per served call", async () => {
    await buy(1);
    await buy(2);

    const res = await app.request(`/agents/${AGENT_ID}/run`, { headers });

    expect(res.status).toBe(200);
    expect(await credits()).toBe(1n);
  });

  it("blocks the call after the last credit is spent", async () => {
    await buy(1);

    expect(
      (await app.request(`/agents/${AGENT_ID}/run`, { headers })).status
    ).toBe(200);
    expect(
      (await app.request(`/agents/${AGENT_ID}/run`, { headers })).status
    ).toBe(402);
  });

  it("does not charge for a failed call", async () => {
    await buy(1);

    const res = await app.request(`/agents/${AGENT_ID}/broken`, { headers });

    expect(res.status).toBe(500);
    expect(await credits()).toBe(1n);
  });

  it("serves period holders without touching credits", async () => {
    await buy(1);
    await buy(2, PER_PERIOD_SKU_ID);
    h.events.clear();

    const res = await app.request(`/agents/${AGENT_ID}/run`, { headers });

    expect(res.status).toBe(200);
    expect(await credits()).toBe(1n);
    expect(h.events.ofType("metering.call_consumed")).toHaveLength(0);
  });
});
