import Fastify from "fastify";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { Readable } from "stream";
import FormData from "form-data";

import type { CacheableDestination } from "../../src/services/relay/destinations.js";
import type { CacheRecord, DedupStore } from "../../src/store/dedup.store.js";

export const silentLog = Fastify({ logger: false }).log;

export function makeTmpDir(prefix = "filerelay-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function bytes(text: string): Readable {
  return Readable.from([Buffer.from(text)]);
}

export function failingStream(message: string): Readable {
  return new Readable({
    read() {
      this.destroy(new Error(message));
    },
  });
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export class MemoryDedupStore implements DedupStore {
  readonly records = new Map<string, CacheRecord["urls"]>();

  async lookup(fingerprint: string): Promise<CacheRecord> {
    return { fingerprint, urls: { ...this.records.get(fingerprint) } };
  }

  async upsert(
    fingerprint: string,
    destination: CacheableDestination,
    url: string
  ): Promise<void> {
    const urls = this.records.get(fingerprint) ?? {};
    urls[destination] = url;
    this.records.set(fingerprint, urls);
  }
}

export type MultipartValue = string | { content: string; filename: string };

export function multipartBody(fields: Array<[string, MultipartValue]>) {
  const form = new FormData();
  for (const [name, value] of fields) {
    if (typeof value === "string") {
      form.append(name, value);
    } else {
      form.append(name, Buffer.from(value.content), { filename: value.filename });
    }
  }

  return {
    payload: form.getBuffer(),
    headers: { "content-type": `multipart/form-data; boundary=${form.getBoundary()}` },
  };
}
