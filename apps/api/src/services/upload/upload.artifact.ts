// src/services/upload/upload.artifact.ts

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import crypto from "crypto";
import { once } from "events";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";

import type { Artifact } from "../../types/upload.js";
import { StorageIOError, errorMessage } from "../../utils/errors.js";

const MAX_NAME_LENGTH = 200;

/**
 * Filesystem-safe form of a client filename. The original name is still what
 * gets submitted to the destination.
 */
export function safeFilename(filename: string): string {
  const base = path.basename(filename).replace(/[^\w.\- ]/g, "_").slice(-MAX_NAME_LENGTH);
  return base.replace(/^\.+/, "") || "file";
}

// Artifacts owned by an in-flight request. Age alone says nothing about
// these: a forward can sit in the queue past the GC grace period.
const liveArtifacts = new Set<string>();

/**
 * Allocates a fresh artifact path and marks it live until `removeArtifact`.
 */
export function artifactPath(artifactsDir: string, filename: string): string {
  const p = path.join(artifactsDir, `${crypto.randomUUID()}-${safeFilename(filename)}`);
  liveArtifacts.add(p);
  return p;
}

export function isLiveArtifact(filePath: string): boolean {
  return liveArtifacts.has(filePath);
}

/**
 * Streams a directly uploaded file into a new artifact.
 */
export async function writeArtifact(params: {
  artifactsDir: string;
  filename: string;
  stream: Readable;
}): Promise<Artifact> {
  const outPath = artifactPath(params.artifactsDir, params.filename);

  let sourceError: unknown = null;
  params.stream.once("error", err => {
    sourceError = err;
  });

  const ws = fs.createWriteStream(outPath, { flags: "wx" });

  try {
    await pipeline(params.stream, ws);
    const stat = await fsp.stat(outPath);
    return { path: outPath, filename: params.filename, sizeBytes: stat.size };
  } catch (err) {
    if (!ws.closed) await once(ws, "close");
    await removeArtifact(outPath);
    params.stream.destroy();

    if (sourceError) throw sourceError;
    throw new StorageIOError(`failed to write file to disk: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export async function removeArtifact(filePath: string): Promise<void> {
  await fsp.rm(filePath, { force: true }).catch(() => undefined);
  liveArtifacts.delete(filePath);
}
