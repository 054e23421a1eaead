// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/health`
 * Purpose: Health and metrics HTTP server for orchestrator probes and scrapers.
 * Scope: /livez (liveness), /readyz (readiness), /metrics (Prometheus text format) endpoints.
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * - /metrics serves the container's registry, never the prom-client global
 * Side-effects: Binds HTTP server to HEALTH_PORT
 * @internal
 */

import { createServer, type Server } from "node:http";

import type { Registry } from "prom-client";

import type { Logger } from "./observability/logger";

export interface HealthState {
  ready: boolean;
}

export function startHealthServer(
  state: HealthState,
  port: number,
  deps: { metricsRegistry: Registry; logger: Logger }
): Server {
  const server = createServer((req, res) => {
    if (req.url === "/livez") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else if (req.url === "/readyz") {
      if (state.ready) {
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("ok");
      } else {
        res.writeHead(503, { "Content-Type": "text/plain" });
        res.end("not ready");
      }
    } else if (req.url === "/metrics") {
      void deps.metricsRegistry.metrics().then(
        (body) => {
          res.writeHead(200, {
            "Content-Type": deps.metricsRegistry.contentType,
            "Cache-Control": "no-store",
          });
          res.end(body);
        },
        (err: unknown) => {
          deps.logger.error({ err }, "Failed to collect metrics");
          res.writeHead(500, { "Content-Type": "text/plain" });
          res.end("metrics unavailable");
        }
      );
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("not found");
    }
  });

  server.listen(port);
  return server;
}
