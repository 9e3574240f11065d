// src/types/upload.ts

import type { LitterboxTtl } from "../config/destinations.config.js";

/**
 * A complete file on transient storage, owned by the request that created it.
 */
export interface Artifact {
  path: string;
  /** Name submitted to the destination. */
  filename: string;
  sizeBytes: number;
}

export interface DestinationOptions {
  /** catbox account hash; anonymous upload when absent. */
  userhash?: string;
  /** litterbox retention. */
  time: LitterboxTtl;
}

/** Destination fields as the client sent them. */
export interface RelayRequest {
  destination: string;
  userhash?: string;
  time?: string;
}

export interface FinishUploadRequest extends RelayRequest {
  uploadId: string;
  filename: string;
}

export type PipelineStage =
  | "received"
  | "assembling"
  | "hashing"
  | "cache_lookup"
  | "forwarding"
  | "cache_store"
  | "done"
  | "failed";

export interface RelayResult {
  url: string;
  cached: boolean;
  /** Set when the URL was obtained but could not be cached. */
  warning?: string;
}
