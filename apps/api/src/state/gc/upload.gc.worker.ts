// src/state/gc/upload.gc.worker.ts

import fs from "fs/promises";
import path from "path";
import type { FastifyBaseLogger } from "fastify";

import { isLiveArtifact } from "../../services/upload/upload.artifact.js";

export interface UploadGcResult {
  sessions: number;
  artifacts: number;
}

/**
 * Entries of `dir` whose mtime is older than the grace period.
 */
async function staleEntries(dir: string, cutoffMs: number): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch {
    return [];
  }

  const stale: string[] = [];
  for (const name of names) {
    try {
      const st = await fs.lstat(path.join(dir, name));
      if (st.mtimeMs < cutoffMs) stale.push(name);
    } catch {
      // Removed concurrently by the request that owned it.
    }
  }
  return stale;
}

/**
 * Removes chunk sessions whose client never called /finish, and artifacts
 * left behind by a failed cleanup. Sessions count as abandoned once no chunk
 * has landed for the grace period; artifacts still owned by a request in this
 * process are never touched.
 */
export async function runUploadGc(params: {
  chunksDir: string;
  artifactsDir: string;
  graceMs: number;
  log: FastifyBaseLogger;
  now?: number;
}): Promise<UploadGcResult> {
  const cutoff = (params.now ?? Date.now()) - params.graceMs;
  const result: UploadGcResult = { sessions: 0, artifacts: 0 };

  for (const uploadId of await staleEntries(params.chunksDir, cutoff)) {
    params.log.warn({ uploadId }, "GC deleting abandoned chunk session");
    await fs.rm(path.join(params.chunksDir, uploadId), { recursive: true, force: true });
    result.sessions++;

    /**
     * Yield to event loop to avoid starvation
     * when GC backlog is large.
     */
    await new Promise(r => setImmediate(r));
  }

  for (const name of await staleEntries(params.artifactsDir, cutoff)) {
    if (isLiveArtifact(path.join(params.artifactsDir, name))) continue;

    params.log.warn({ artifact: name }, "GC deleting stale artifact");
    await fs.rm(path.join(params.artifactsDir, name), { force: true });
    result.artifacts++;
  }

  return result;
}
