// src/config/destinations.config.ts

import { parseHttpUrlEnv, parsePositiveIntEnv } from "./env.js";

export const DestinationEnv = {
  uploadUrls: {
    pomf: parseHttpUrlEnv("POMF_UPLOAD_URL", "https://pomf.lain.la/upload.php"),
    catbox: parseHttpUrlEnv("CATBOX_UPLOAD_URL", "https://catbox.moe/user/api.php"),
    litterbox: parseHttpUrlEnv(
      "LITTERBOX_UPLOAD_URL",
      "https://litterbox.catbox.moe/resources/internals/api.php"
    ),
  },

  // Public file hosts behind the download passthrough, keyed by path prefix.
  publicHosts: {
    catbox: "https://files.catbox.moe/",
    litterbox: "https://litter.catbox.moe/",
    pomf: "https://pomf.lain.la/",
  },
} as const;

export const ForwardLimits = {
  timeoutMs: parsePositiveIntEnv("FORWARD_TIMEOUT_MS", 5 * 60_000),

  /**
   * Max concurrent outbound forwards per process.
   */
  concurrency: parsePositiveIntEnv("FORWARD_CONCURRENCY", 4),

  /**
   * Buffer between the multipart producer and the HTTP client.
   */
  pipeHighWaterMark: 64 * 1024,
};

export const ProxyLimits = {
  timeoutMs: parsePositiveIntEnv("PROXY_TIMEOUT_MS", 5 * 60_000),
};

export const LitterboxTtls = ["1h", "12h", "24h", "72h"] as const;

export type LitterboxTtl = (typeof LitterboxTtls)[number];

export const DEFAULT_LITTERBOX_TTL: LitterboxTtl = "1h";
