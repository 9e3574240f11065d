// src/routes/uploads.routes.ts

import type { FastifyInstance, FastifyRequest } from "fastify";
import type { MultipartFile } from "@fastify/multipart";
import { finished } from "stream/promises";

import { sendApiError, sendRelayError } from "../utils/apiError.js";
import { InputError } from "../utils/errors.js";
import { ChunkConfig, UploadConfig } from "../config/uploads.config.js";
import type { RelayPipeline } from "../services/relay/relay.pipeline.js";
import type { StagedChunk } from "../store/chunk.store.js";
import type { Artifact } from "../types/upload.js";

export interface UploadRoutesOptions {
  pipeline: RelayPipeline;
}

// Upload ids name a directory on disk.
const UPLOAD_ID_RE = /^[A-Za-z0-9_-]{1,128}$/;
const CHUNK_INDEX_RE = /^[A-Za-z0-9_-]{1,32}$/;

function isUploadId(value: unknown): value is string {
  return typeof value === "string" && UPLOAD_ID_RE.test(value);
}

/**
 * All-digit indices are stored in canonical decimal form so "007" and "7"
 * address the same chunk. Anything else is kept verbatim and assembled last.
 */
export function normalizeChunkIndex(raw: string): string | null {
  if (!CHUNK_INDEX_RE.test(raw)) return null;
  return /^\d+$/.test(raw) ? raw.replace(/^0+(?=\d)/, "") : raw;
}

export function formatBytes(bytes: number): string {
  const KB = 1024;
  const MB = 1024 * KB;
  const GB = 1024 * MB;

  if (bytes >= GB) return `${(bytes / GB).toFixed(2)} GB`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(2)} MB`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(2)} KB`;
  return `${bytes} B`;
}

async function discard(part: MultipartFile) {
  part.file.resume();
  await finished(part.file);
}

function chunkTarget(fields: Record<string, string>) {
  const { uploadId, index } = fields;
  if (!uploadId || !index) {
    throw new InputError("Missing uploadId or index");
  }
  if (!isUploadId(uploadId)) {
    throw new InputError("uploadId must match [A-Za-z0-9_-]{1,128}");
  }

  const normalized = normalizeChunkIndex(index);
  if (normalized === null) {
    throw new InputError("index must match [A-Za-z0-9_-]{1,32}");
  }

  return { uploadId, index: normalized };
}

/**
 * Plain fields of a JSON or multipart body. File parts are drained.
 */
async function readFields(req: FastifyRequest): Promise<Record<string, string>> {
  const fields: Record<string, string> = {};

  if (req.isMultipart()) {
    for await (const part of req.parts()) {
      if (part.type === "file") {
        await discard(part);
      } else if (typeof part.value === "string") {
        fields[part.fieldname] = part.value;
      }
    }
    return fields;
  }

  const body: unknown = req.body;
  if (typeof body === "object" && body !== null) {
    for (const [name, value] of Object.entries(body)) {
      if (typeof value === "string") fields[name] = value;
    }
  }
  return fields;
}

export default async function uploadRoutes(
  app: FastifyInstance,
  opts: UploadRoutesOptions
) {
  const { pipeline } = opts;

  app.post("/chunk", async (req, reply) => {
    const log = req.log;

    if (!req.isMultipart()) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "Request must be multipart/form-data");
    }

    const fields: Record<string, string> = {};
    let stored: { uploadId: string; index: string } | null = null;
    // Chunk part that arrived before uploadId/index.
    let staged: StagedChunk | null = null;

    try {
      for await (const part of req.parts({ limits: { fileSize: ChunkConfig.maxBytes } })) {
        if (part.type === "field") {
          if (typeof part.value === "string") fields[part.fieldname] = part.value;
          continue;
        }

        if (part.fieldname !== "chunk" || stored || staged) {
          await discard(part);
          continue;
        }

        if (fields.uploadId === undefined || fields.index === undefined) {
          staged = await pipeline.stageChunk(part.file);
          continue;
        }

        let target: { uploadId: string; index: string };
        try {
          target = chunkTarget(fields);
        } catch (err) {
          await discard(part);
          throw err;
        }

        await pipeline.putChunk(target.uploadId, target.index, part.file);
        stored = target;
      }

      if (staged) {
        const target = chunkTarget(fields);
        await pipeline.commitChunk(staged, target.uploadId, target.index);
        staged = null;
        stored = target;
      }
    } catch (err) {
      if (staged) await pipeline.discardStagedChunk(staged);
      return sendRelayError(reply, log, err);
    }

    if (!stored) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "Missing chunk file");
    }

    log.info({ uploadId: stored.uploadId, index: stored.index }, "Chunk received");

    return {
      ok: true,
      uploadId: stored.uploadId,
      index: stored.index,
      message: `Chunk ${stored.index} for ${stored.uploadId} received.`,
    };
  });

  app.post("/finish", async (req, reply) => {
    const log = req.log;

    let fields: Record<string, string>;
    try {
      fields = await readFields(req);
    } catch (err) {
      return sendRelayError(reply, log, err);
    }

    const { uploadId, filename, destination, userhash, time } = fields;

    if (!uploadId || !filename || !destination) {
      return sendApiError(
        reply,
        400,
        "INVALID_REQUEST",
        "Missing uploadId, filename, or destination"
      );
    }

    if (!isUploadId(uploadId)) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "uploadId must match [A-Za-z0-9_-]{1,128}");
    }

    try {
      const result = await pipeline.finishChunkedUpload(
        { uploadId, filename, destination, userhash, time },
        log
      );

      log.info({ uploadId, destination, cached: result.cached }, "Upload relayed");
      return { url: result.url };
    } catch (err) {
      return sendRelayError(reply, log, err);
    }
  });

  app.post("/direct", async (req, reply) => {
    const log = req.log;

    if (!req.isMultipart()) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "Request must be multipart/form-data");
    }

    const fields: Record<string, string> = {};
    let artifact: Artifact | null = null;

    try {
      for await (const part of req.parts({ limits: { fileSize: UploadConfig.maxDirectBytes } })) {
        if (part.type === "field") {
          if (typeof part.value === "string") fields[part.fieldname] = part.value;
          continue;
        }

        if (part.fieldname !== "file" || artifact) {
          await discard(part);
          continue;
        }

        artifact = await pipeline.storeDirectFile(part.filename || "file", part.file);
      }
    } catch (err) {
      if (artifact) await pipeline.releaseArtifact(artifact);
      return sendRelayError(reply, log, err);
    }

    if (!artifact) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "Missing file");
    }

    const { destination = "", userhash, time } = fields;

    log.info(
      { filename: artifact.filename, destination, size: formatBytes(artifact.sizeBytes) },
      "Direct upload received"
    );

    try {
      const result = await pipeline.relayDirectUpload(
        artifact,
        { destination, userhash, time },
        log
      );

      log.info({ destination, cached: result.cached }, "Upload relayed");
      return { url: result.url };
    } catch (err) {
      return sendRelayError(reply, log, err);
    }
  });
}
