// src/services/upload/upload.assemble.ts

import { createWriteStream } from "fs";
import fsp from "fs/promises";
import { once } from "events";

import type { ChunkStore } from "../../store/chunk.store.js";
import type { Artifact } from "../../types/upload.js";
import { AssemblyIOError, NoChunksError, errorMessage } from "../../utils/errors.js";
import { artifactPath, removeArtifact } from "./upload.artifact.js";

/**
 * Numeric index of a stored chunk, or null when the name does not parse.
 * Indices may exceed 2^53, hence bigint.
 */
export function parseChunkIndex(index: string): bigint | null {
  return /^\d+$/.test(index) ? BigInt(index) : null;
}

function compareIndex(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ascending numeric order. Indices that do not parse are kept and go last,
 * ordered by name among themselves.
 */
export function orderChunks(indices: string[]): string[] {
  return indices
    .map(index => ({ index, n: parseChunkIndex(index) }))
    .sort((a, b) => {
      if (a.n !== null && b.n !== null) return compareIndex(a.n, b.n) || compareName(a.index, b.index);
      if (a.n !== null) return -1;
      if (b.n !== null) return 1;
      return compareName(a.index, b.index);
    })
    .map(entry => entry.index);
}

async function concatChunks(params: {
  chunkStore: ChunkStore;
  uploadId: string;
  indices: string[];
  outPath: string;
}) {
  const ws = createWriteStream(params.outPath, { flags: "wx" });
  const finished = once(ws, "finish");
  const failed = once(ws, "error").then(([err]) => {
    throw err;
  });
  // Both are raced below; keep the loser from surfacing as unhandled.
  finished.catch(() => undefined);
  failed.catch(() => undefined);

  try {
    for (const index of params.indices) {
      const rs = params.chunkStore.openChunk(params.uploadId, index);
      for await (const buf of rs) {
        if (!ws.write(buf)) {
          await Promise.race([once(ws, "drain"), failed]);
        }
      }
    }

    ws.end();
    await Promise.race([finished, failed]);
  } catch (err) {
    if (!ws.closed) {
      const closed = once(ws, "close");
      ws.destroy();
      await closed;
    }
    throw err;
  }
}

/**
 * Concatenates a session's chunks into a fresh artifact. On failure no
 * artifact is left behind. Does not remove the session; callers own that.
 */
export async function assembleChunks(params: {
  chunkStore: ChunkStore;
  uploadId: string;
  filename: string;
  artifactsDir: string;
}): Promise<Artifact> {
  const { chunkStore, uploadId } = params;

  const indices = await chunkStore.listChunks(uploadId);
  if (indices.length === 0) {
    throw new NoChunksError(uploadId);
  }

  const outPath = artifactPath(params.artifactsDir, params.filename);

  try {
    await concatChunks({
      chunkStore,
      uploadId,
      indices: orderChunks(indices),
      outPath,
    });
    const stat = await fsp.stat(outPath);
    return { path: outPath, filename: params.filename, sizeBytes: stat.size };
  } catch (err) {
    await removeArtifact(outPath);
    throw new AssemblyIOError(
      `failed to assemble ${uploadId}: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}
