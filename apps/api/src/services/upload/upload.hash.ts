// src/services/upload/upload.hash.ts

import { createReadStream } from "fs";
import crypto from "crypto";

import { StorageIOError, errorMessage } from "../../utils/errors.js";

/**
 * SHA-256 of the file's bytes, hex encoded. One streamed pass; used as a
 * dedup key only.
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");

  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new StorageIOError(`failed to hash file: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return hash.digest("hex");
}
