// src/services/relay/dedup.cache.ts

import type { DedupStore } from "../../store/dedup.store.js";
import { CacheLookupError, CacheStoreError, errorMessage } from "../../utils/errors.js";
import { isCacheable, type Destination } from "./destinations.js";

export type CacheStoreOutcome =
  | { ok: true; skipped: boolean }
  | { ok: false; error: CacheStoreError };

/**
 * Cache policy over a DedupStore. The ephemeral destination never reads or
 * writes; for the others a stored URL is always a hit (no TTL, no
 * revalidation against the destination).
 */
export class DedupCache {
  constructor(private readonly backing: DedupStore) {}

  async lookup(fingerprint: string, destination: Destination): Promise<string | null> {
    if (!isCacheable(destination)) return null;

    try {
      const record = await this.backing.lookup(fingerprint);
      return record.urls[destination] ?? null;
    } catch (err) {
      throw new CacheLookupError(`dedup lookup failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Never throws: a failed write is returned so the caller can still hand
   * out the URL it already has.
   */
  async remember(
    fingerprint: string,
    destination: Destination,
    url: string
  ): Promise<CacheStoreOutcome> {
    if (!isCacheable(destination)) return { ok: true, skipped: true };

    try {
      await this.backing.upsert(fingerprint, destination, url);
      return { ok: true, skipped: false };
    } catch (err) {
      return {
        ok: false,
        error: new CacheStoreError(`dedup store failed: ${errorMessage(err)}`, {
          cause: err,
        }),
      };
    }
  }
}
