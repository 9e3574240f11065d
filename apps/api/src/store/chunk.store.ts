// src/store/chunk.store.ts

import type { Readable } from "stream";

/** A received chunk not yet assigned to a session. */
export interface StagedChunk {
  readonly ref: string;
}

export interface ChunkStore {
  /**
   * Stores one chunk. Rewriting an index replaces the previous payload.
   */
  putChunk(uploadId: string, index: string, stream: Readable): Promise<void>;

  /**
   * Holds a chunk whose session and index are not known yet. Exactly one of
   * `commitChunk` or `discardStaged` must follow.
   */
  stageChunk(stream: Readable): Promise<StagedChunk>;

  /** Moves a staged chunk into place; same semantics as `putChunk`. */
  commitChunk(staged: StagedChunk, uploadId: string, index: string): Promise<void>;

  discardStaged(staged: StagedChunk): Promise<void>;

  /**
   * Chunk indices present for the session, in directory order. Indices are
   * returned as stored; ordering is the assembler's job.
   */
  listChunks(uploadId: string): Promise<string[]>;

  openChunk(uploadId: string, index: string): Readable;

  cleanup(uploadId: string): Promise<void>;
}
