// src/app.ts

import Fastify, { type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import uploadRoutes from "./routes/uploads.routes.js";
import healthRoute from "./routes/health.js";
import { proxyRoutes } from "./routes/proxy.routes.js";
import { ChunkConfig, UploadConfig } from "./config/uploads.config.js";
import type { RelayPipeline } from "./services/relay/relay.pipeline.js";

export interface AppDeps {
  pipeline: RelayPipeline;
  ping: () => Promise<unknown>;
  /** Used by the download passthrough. */
  fetchImpl?: typeof fetch;
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp(deps: AppDeps) {
  const app = Fastify({
    logger: deps.logger ?? {
      level: process.env.NODE_ENV === "production" ? "info" : "debug",
      redact: {
        paths: ["req.headers.authorization"],
        remove: true,
      },
    },
    // Non-multipart bodies are small JSON.
    bodyLimit: 1024 * 1024,
  });

  await app.register(multipart, {
    limits: {
      // Routes narrow this per request.
      fileSize: Math.max(ChunkConfig.maxBytes, UploadConfig.maxDirectBytes),
      files: 1,
    },
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode =
      Number.isInteger(err.statusCode) && err.statusCode !== undefined
        ? err.statusCode
        : 500;

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return reply.code(statusCode).send({
      error: {
        code: statusCode < 500 ? "INVALID_REQUEST" : "INTERNAL_ERROR",
        message:
          statusCode < 500
            ? err.message
            : "Unexpected server error",

        retryable: false,
      },
    });
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.code(404).send({
      message: `Route ${req.method}:${req.url} not found`,
      error: "Not Found",
      statusCode: 404,
    });
  });

  await app.register(uploadRoutes, { pipeline: deps.pipeline });
  await app.register(proxyRoutes, { fetchImpl: deps.fetchImpl });
  await app.register(healthRoute, { ping: deps.ping });

  return app;
}
