/**
 * Minimal HTTP health server for liveness and readiness (e.g. Kubernetes).
 * GET /health  -> 200 if process is up.
 * GET /ready   -> 200 only if getReady() returns true (session running, gateways connected), else 503.
 * GET /metrics -> pipeline counters as JSON.
 */

import * as http from "http";
import { logger } from "./logging";
import { getCounters } from "./metrics";

const DEFAULT_PORT = 8080;

export interface HealthServerOptions {
  /** 0 picks an ephemeral port. */
  port?: number;
  getReady?: () => boolean;
  /** Extra fields merged into /metrics (e.g. active streams). */
  getDetails?: () => Record<string, unknown>;
}

export function startHealthServer(options: HealthServerOptions = {}): http.Server {
  const port = options.port ?? DEFAULT_PORT;
  const getReady = options.getReady ?? (() => false);

  const server = http.createServer((req, res) => {
    const url = req.url ?? "";
    if (req.method === "GET" && (url === "/health" || url === "/")) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: true }));
      return;
    }
    if (req.method === "GET" && url === "/ready") {
      const ready = getReady();
      const status = ready ? 200 : 503;
      res.writeHead(status, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: ready, ready }));
      return;
    }
    if (req.method === "GET" && url === "/metrics") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ counters: getCounters(), ...options.getDetails?.() }));
      return;
    }
    res.writeHead(404);
    res.end();
  });

  server.listen(port, () => {
    logger.info({ event: "HEALTH_SERVER_STARTED", port }, "Health server listening");
  });

  return server;
}
