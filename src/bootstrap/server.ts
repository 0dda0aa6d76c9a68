// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/server`
 * Purpose: Process entry point: load .env, build the container and serve the Hono app over Node http.
 * Scope: Listening and graceful shutdown only. Routes live in bootstrap/app.
 * Invariants: SIGINT/SIGTERM close the server, then the database pool, then exit.
 * Side-effects: IO (network listener, process signals, database pool)
 * @internal
 */

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/server`
 * Purpose: Process entry point: load .env, build the container and app, listen, shut down cleanly.
 * Scope: Node HTTP server via @hono/node-server. Does not contain route logic.
 * Side-effects: IO (network listener, DB pool shutdown on SIGINT/SIGTERM)
 * @public
 */

import "dotenv/config";

import { serve } from "@hono/node-server";

import { closeDb } from "@/adapters/server";
import { serverEnv } from "@/shared/env";

import { createApp } from "./app";
import { getContainer } from "./container";

const container = getContainer();
const app = createApp(container);
const port = serverEnv().PORT;

const server = serve({ fetch: app.fetch, port }, (info) => {
  container.log.info({ port: info.port }, "settlement service listening");
});

function shutdown(signal: string): void {
  container.log.info({ signal }, "shutting down");
  server.close(() => {
    closeDb()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        container.log.error({ err: error }, "db shutdown failed");
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
