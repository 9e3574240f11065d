// src/config/uploads.config.ts
import path from "path";

import { parsePositiveIntEnv, requireEnv } from "./env.js";

const tmpDir = path.resolve(requireEnv("UPLOAD_TMP_DIR"));

export const UploadConfig = {
  tmpDir,

  // One directory per upload session, holding chunk_<index> files.
  chunksDir: path.join(tmpDir, "chunks"),

  // Assembled or directly uploaded files waiting to be forwarded.
  artifactsDir: path.join(tmpDir, "artifacts"),

  maxDirectBytes: parsePositiveIntEnv("MAX_DIRECT_UPLOAD_BYTES", 1024 * 1024 * 1024), // 1 GiB
};

export const ChunkConfig = {
  maxBytes: parsePositiveIntEnv("MAX_CHUNK_BYTES", 32 * 1024 * 1024), // 32 MiB
};

export const GcConfig = {
  gcInterval: 5 * 60 * 1000,  // 5 minutes
  grace: 15 * 60 * 1000,      // 15 minutes
};
