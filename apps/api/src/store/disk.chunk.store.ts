// src/store/disk.chunk.store.ts

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import crypto from "crypto";
import { once } from "events";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";

import { UploadConfig } from "../config/uploads.config.js";
import { StorageIOError, errorMessage } from "../utils/errors.js";
import type { ChunkStore, StagedChunk } from "./chunk.store.js";

export const CHUNK_PREFIX = "chunk_";

export class DiskChunkStore implements ChunkStore {
  constructor(private readonly baseDir: string = UploadConfig.chunksDir) {}

  private dir(uploadId: string) {
    return path.join(this.baseDir, uploadId);
  }

  private chunkPath(uploadId: string, index: string) {
    return path.join(this.dir(uploadId), `${CHUNK_PREFIX}${index}`);
  }

  async putChunk(uploadId: string, index: string, stream: Readable): Promise<void> {
    const dir = this.dir(uploadId);
    // Each write gets its own temp file; the rename makes the last writer win.
    const tempPath = path.join(dir, `.${CHUNK_PREFIX}${index}.${crypto.randomUUID()}.tmp`);

    await this.writeStream({
      dir,
      tempPath,
      finalPath: this.chunkPath(uploadId, index),
      stream,
      what: `chunk ${index} for ${uploadId}`,
    });
  }

  async stageChunk(stream: Readable): Promise<StagedChunk> {
    // Hidden, outside any session: never listed, swept by GC if orphaned.
    const stagedPath = path.join(this.baseDir, `.staged_${crypto.randomUUID()}.tmp`);

    await this.writeStream({
      dir: this.baseDir,
      tempPath: stagedPath,
      finalPath: null,
      stream,
      what: "staged chunk",
    });
    return { ref: stagedPath };
  }

  async commitChunk(staged: StagedChunk, uploadId: string, index: string): Promise<void> {
    try {
      await fsp.mkdir(this.dir(uploadId), { recursive: true });
      await fsp.rename(staged.ref, this.chunkPath(uploadId, index));
    } catch (err) {
      await this.discardStaged(staged);
      throw new StorageIOError(
        `failed to write chunk ${index} for ${uploadId}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  async discardStaged(staged: StagedChunk): Promise<void> {
    await fsp.rm(staged.ref, { force: true }).catch(() => undefined);
  }

  /**
   * Streams into `tempPath`, then renames to `finalPath` when one is given.
   * On failure the temp file is gone.
   */
  private async writeStream(params: {
    dir: string;
    tempPath: string;
    finalPath: string | null;
    stream: Readable;
    what: string;
  }): Promise<void> {
    const { tempPath, stream } = params;

    let sourceError: unknown = null;
    stream.once("error", err => {
      sourceError = err;
    });

    let ws: fs.WriteStream | null = null;
    try {
      await fsp.mkdir(params.dir, { recursive: true });
      ws = fs.createWriteStream(tempPath, { flags: "wx" });
      await pipeline(stream, ws);
      if (params.finalPath) await fsp.rename(tempPath, params.finalPath);
    } catch (err) {
      // The temp file may still be opening.
      if (ws && !ws.closed) await once(ws, "close");
      await fsp.rm(tempPath, { force: true }).catch(() => undefined);
      stream.destroy();

      // Client-side stream failures (aborts, size limits) keep their own identity.
      if (sourceError) throw sourceError;
      throw new StorageIOError(`failed to write ${params.what}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async listChunks(uploadId: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fsp.readdir(this.dir(uploadId));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageIOError(
        `failed to list chunks for ${uploadId}: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    return names
      .filter(name => name.startsWith(CHUNK_PREFIX))
      .map(name => name.slice(CHUNK_PREFIX.length));
  }

  openChunk(uploadId: string, index: string): Readable {
    return fs.createReadStream(this.chunkPath(uploadId, index));
  }

  async cleanup(uploadId: string): Promise<void> {
    await fsp.rm(this.dir(uploadId), { recursive: true, force: true });
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
