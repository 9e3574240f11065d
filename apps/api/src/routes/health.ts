// src/routes/health.ts

import type { FastifyInstance } from "fastify";

export interface HealthRouteOptions {
  /** Resolves when the dedup store answers. */
  ping: () => Promise<unknown>;
}

export default async function healthRoute(
  app: FastifyInstance,
  opts: HealthRouteOptions
) {
  app.get("/health", async (req, reply) => {
    const start = Date.now();
    const timestamp = new Date().toISOString();

    let storeOk = false;
    let latencyMs: number | null = null;

    try {
      await opts.ping();
      storeOk = true;
      latencyMs = Date.now() - start;
    } catch (err) {
      req.log.error({ err }, "Dedup store health check failed");
    }

    return reply.status(storeOk ? 200 : 503).send({
      status: storeOk ? "UP" : "DOWN",
      service: "filerelay-api-v1",
      ready: storeOk,
      timestamp,
      checks: {
        dedupStore: {
          ok: storeOk,
          latencyMs,
          timestamp,
        },
      },
    });
  });

  // Liveness only, for clients that probe the root.
  app.get("/", async (_req, reply) => reply.type("text/plain").send("filerelay is working."));

  app.get("/favicon.ico", async (_req, reply) => reply.code(204).send());
}
