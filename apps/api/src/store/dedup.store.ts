// src/store/dedup.store.ts

import type { CacheableDestination } from "../services/relay/destinations.js";
import { CACHEABLE_DESTINATIONS } from "../services/relay/destinations.js";
import { dedupKeys } from "../state/keys.js";

export interface CacheRecord {
  fingerprint: string;
  urls: Partial<Record<CacheableDestination, string>>;
}

/**
 * Persistent fingerprint → URL mapping. Lookups of unknown fingerprints
 * return an empty record; upserts overwrite.
 */
export interface DedupStore {
  lookup(fingerprint: string): Promise<CacheRecord>;
  upsert(
    fingerprint: string,
    destination: CacheableDestination,
    url: string
  ): Promise<void>;
}

/**
 * The slice of the Upstash client the store needs.
 */
export interface HashClient {
  hgetall(key: string): Promise<Record<string, unknown> | null>;
  hset(key: string, values: Record<string, string>): Promise<number>;
}

export class RedisDedupStore implements DedupStore {
  constructor(private readonly redis: () => HashClient) {}

  async lookup(fingerprint: string): Promise<CacheRecord> {
    const data = await this.redis().hgetall(dedupKeys.record(fingerprint));
    const urls: CacheRecord["urls"] = {};

    for (const destination of CACHEABLE_DESTINATIONS) {
      const value = data?.[destination];
      if (typeof value === "string" && value.length > 0) {
        urls[destination] = value;
      }
    }

    return { fingerprint, urls };
  }

  async upsert(
    fingerprint: string,
    destination: CacheableDestination,
    url: string
  ): Promise<void> {
    await this.redis().hset(dedupKeys.record(fingerprint), {
      [destination]: url,
      [`${destination}UpdatedAt`]: String(Date.now()),
    });
  }
}
