// src/state/client.ts

import { Redis } from "@upstash/redis";

import { requireEnv } from "../config/env.js";

export interface DedupStoreSettings {
  url: string;
  token: string;
}

export function dedupStoreSettingsFromEnv(): DedupStoreSettings {
  return {
    url: requireEnv("UPSTASH_REDIS_REST_URL"),
    token: requireEnv("UPSTASH_REDIS_REST_TOKEN"),
  };
}

let connection: Redis | null = null;

/**
 * Connects the dedup store and checks that it answers. Runs once before the
 * server listens; a second call returns the existing client.
 */
export async function connectDedupStore(
  settings: DedupStoreSettings = dedupStoreSettingsFromEnv()
): Promise<Redis> {
  if (connection) return connection;

  const client = new Redis({
    ...settings,
    retry: {
      retries: 3,
      backoff: attempt => Math.min(100 * 2 ** attempt, 1000),
    },
  });
  await client.ping();

  connection = client;
  return client;
}

export function dedupStoreClient(): Redis {
  if (!connection) {
    throw new Error("Dedup store not connected; await connectDedupStore() at startup");
  }
  return connection;
}

/** The REST client holds no sockets; dropping the handle is the whole close. */
export function disconnectDedupStore(): void {
  connection = null;
}
