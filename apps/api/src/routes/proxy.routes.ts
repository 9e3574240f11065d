// src/routes/proxy.routes.ts

import type { FastifyInstance } from "fastify";
import { Readable } from "node:stream";

import { DestinationEnv, ProxyLimits } from "../config/destinations.config.js";
import { sendApiError } from "../utils/apiError.js";

export interface ProxyRoutesOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

// Hop-by-hop headers, plus content-encoding: fetch already decoded the body.
const SKIPPED_HEADERS = new Set([
  "connection",
  "keep-alive",
  "transfer-encoding",
  "content-encoding",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "upgrade",
]);

/**
 * Download passthrough: GET /<destination>/<path> is fetched from the
 * destination's public host and streamed back with its status and headers.
 */
export async function proxyRoutes(app: FastifyInstance, opts: ProxyRoutesOptions) {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const timeoutMs = opts.timeoutMs ?? ProxyLimits.timeoutMs;

  for (const [prefix, host] of Object.entries(DestinationEnv.publicHosts)) {
    const stripPrefix = `/${prefix}/`;

    app.get(`/${prefix}/*`, async (req, reply) => {
      // Raw path keeps the client's percent-encoding intact.
      const rawPath = req.url.split("?")[0] ?? "";
      const filePath = rawPath.slice(stripPrefix.length);

      if (!filePath) {
        return sendApiError(reply, 400, "INVALID_REQUEST", "File path is missing.");
      }

      const targetUrl = host + filePath;
      req.log.info({ path: rawPath, targetUrl }, "Proxying download");

      const headers: Record<string, string> = {};
      const range = req.headers.range;
      if (typeof range === "string" && range) {
        headers.Range = range;
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      timeout.unref();
      // Client went away before the response completed.
      reply.raw.once("close", () => {
        if (!reply.raw.writableFinished) controller.abort();
      });

      let upstream: Response;
      try {
        upstream = await fetchImpl(targetUrl, {
          method: "GET",
          headers,
          signal: controller.signal,
        });
      } catch (err) {
        clearTimeout(timeout);
        req.log.error({ err, targetUrl }, "Proxy request failed");
        return sendApiError(reply, 502, "BACKEND_UNREACHABLE", "Bad Gateway", {
          retryable: true,
        });
      }

      const hadEncoding = upstream.headers.has("content-encoding");
      upstream.headers.forEach((value, key) => {
        if (SKIPPED_HEADERS.has(key)) return;
        // A decoded body no longer matches the upstream length.
        if (hadEncoding && key === "content-length") return;
        reply.header(key, value);
      });

      reply.status(upstream.status);

      if (!upstream.body) {
        clearTimeout(timeout);
        return reply.send();
      }

      const body = Readable.fromWeb(upstream.body);
      body.once("close", () => clearTimeout(timeout));
      return reply.send(body);
    });
  }
}
