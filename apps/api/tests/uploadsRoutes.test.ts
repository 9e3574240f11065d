import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import fs from "fs/promises";
import path from "path";
import type { FastifyInstance } from "fastify";

import { buildApp } from "../src/app.js";
import { formatBytes, normalizeChunkIndex } from "../src/routes/uploads.routes.js";
import { DedupCache } from "../src/services/relay/dedup.cache.js";
import type { Forwarder } from "../src/services/relay/forward.js";
import { RelayPipeline } from "../src/services/relay/relay.pipeline.js";
import { DiskChunkStore } from "../src/store/disk.chunk.store.js";
import { ForwardError } from "../src/utils/errors.js";
import { MemoryDedupStore, listDir, makeTmpDir, multipartBody } from "./support/helpers.js";

describe("normalizeChunkIndex", () => {
  it("strips leading zeros from digit-only indices", () => {
    expect(normalizeChunkIndex("007")).toBe("7");
    expect(normalizeChunkIndex("0")).toBe("0");
    expect(normalizeChunkIndex("000")).toBe("0");
  });

  it("keeps other safe names verbatim", () => {
    expect(normalizeChunkIndex("part-a")).toBe("part-a");
  });

  it("rejects names that could leave the session directory", () => {
    expect(normalizeChunkIndex("../1")).toBeNull();
    expect(normalizeChunkIndex("")).toBeNull();
  });
});

describe("formatBytes", () => {
  it("picks the largest fitting unit", () => {
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.00 MB");
  });
});

describe("upload routes", () => {
  let root = "";
  let chunksDir = "";
  let artifactsDir = "";
  let forwarded: string[];
  let forward: Mock<Forwarder>;
  let app: FastifyInstance;

  beforeEach(async () => {
    root = await makeTmpDir();
    chunksDir = path.join(root, "chunks");
    artifactsDir = path.join(root, "artifacts");
    await fs.mkdir(chunksDir);
    await fs.mkdir(artifactsDir);

    forwarded = [];
    forward = vi.fn<Forwarder>(async request => {
      forwarded.push(await fs.readFile(request.artifactPath, "utf8"));
      return "https://files.catbox.moe/abc123.txt";
    });

    const pipeline = new RelayPipeline({
      chunkStore: new DiskChunkStore(chunksDir),
      dedupCache: new DedupCache(new MemoryDedupStore()),
      forward,
      artifactsDir,
    });

    app = await buildApp({ pipeline, ping: async () => "PONG", logger: false });
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  function postChunk(uploadId: string, index: string, content: string) {
    const { payload, headers } = multipartBody([
      ["uploadId", uploadId],
      ["index", index],
      ["chunk", { content, filename: "blob" }],
    ]);
    return app.inject({ method: "POST", url: "/chunk", payload, headers });
  }

  it("acknowledges a stored chunk", async () => {
    const res = await postChunk("sess-1", "1", "B");

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      uploadId: "sess-1",
      index: "1",
      message: "Chunk 1 for sess-1 received.",
    });
    expect(await fs.readFile(path.join(chunksDir, "sess-1", "chunk_1"), "utf8")).toBe("B");
  });

  it("stores zero-padded indices under their canonical name", async () => {
    const res = await postChunk("sess-1", "007", "x");

    expect(res.json()).toMatchObject({ index: "7" });
    expect(await listDir(path.join(chunksDir, "sess-1"))).toEqual(["chunk_7"]);
  });

  it("relays chunks uploaded out of order once /finish is called", async () => {
    await postChunk("sess-2", "1", "B");
    await postChunk("sess-2", "0", "A");
    await postChunk("sess-2", "2", "C");

    const res = await app.inject({
      method: "POST",
      url: "/finish",
      payload: { uploadId: "sess-2", filename: "abc.txt", destination: "catbox" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ url: "https://files.catbox.moe/abc123.txt" });
    expect(forwarded).toEqual(["ABC"]);
    expect(await listDir(chunksDir)).toEqual([]);
    expect(await listDir(artifactsDir)).toEqual([]);
  });

  it("accepts /finish fields as multipart form data", async () => {
    await postChunk("sess-3", "0", "A");
    const { payload, headers } = multipartBody([
      ["uploadId", "sess-3"],
      ["filename", "a.txt"],
      ["destination", "litterbox"],
      ["time", "72h"],
    ]);

    const res = await app.inject({ method: "POST", url: "/finish", payload, headers });

    expect(res.statusCode).toBe(200);
    expect(forward.mock.calls[0][0]).toMatchObject({
      destination: "litterbox",
      filename: "a.txt",
      options: { time: "72h" },
    });
  });

  it("accepts a chunk whose fields arrive after the file part", async () => {
    const { payload, headers } = multipartBody([
      ["chunk", { content: "A", filename: "blob" }],
      ["uploadId", "sess-4"],
      ["index", "03"],
    ]);

    const res = await app.inject({ method: "POST", url: "/chunk", payload, headers });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      uploadId: "sess-4",
      index: "3",
      message: "Chunk 3 for sess-4 received.",
    });
    expect(await listDir(chunksDir)).toEqual(["sess-4"]);
    expect(await fs.readFile(path.join(chunksDir, "sess-4", "chunk_3"), "utf8")).toBe("A");
  });

  it("drops the held chunk when the trailing fields are missing", async () => {
    const { payload, headers } = multipartBody([
      ["chunk", { content: "A", filename: "blob" }],
      ["uploadId", "sess-4b"],
    ]);

    const res = await app.inject({ method: "POST", url: "/chunk", payload, headers });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: {
        code: "INVALID_REQUEST",
        message: "Missing uploadId or index",
        retryable: false,
      },
    });
    expect(await listDir(chunksDir)).toEqual([]);
  });

  it("drops the held chunk when a trailing upload id is invalid", async () => {
    const { payload, headers } = multipartBody([
      ["chunk", { content: "A", filename: "blob" }],
      ["uploadId", "../etc"],
      ["index", "0"],
    ]);

    const res = await app.inject({ method: "POST", url: "/chunk", payload, headers });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("uploadId must match [A-Za-z0-9_-]{1,128}");
    expect(await listDir(chunksDir)).toEqual([]);
  });

  it("rejects an upload id that is not a plain name", async () => {
    const res = await postChunk("../etc", "0", "A");

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("uploadId must match [A-Za-z0-9_-]{1,128}");
  });

  it("requires a chunk part", async () => {
    const { payload, headers } = multipartBody([
      ["uploadId", "sess-5"],
      ["index", "0"],
    ]);

    const res = await app.inject({ method: "POST", url: "/chunk", payload, headers });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Missing chunk file");
  });

  it("requires multipart for /chunk", async () => {
    const res = await app.inject({ method: "POST", url: "/chunk", payload: { uploadId: "x" } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Request must be multipart/form-data");
  });

  it("lists the missing /finish fields", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/finish",
      payload: { uploadId: "sess-6", destination: "catbox" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Missing uploadId, filename, or destination");
  });

  it("answers 400 for an unsupported destination without forwarding", async () => {
    await postChunk("sess-7", "0", "A");

    const res = await app.inject({
      method: "POST",
      url: "/finish",
      payload: { uploadId: "sess-7", filename: "a", destination: "dropbox" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: "UNSUPPORTED_DESTINATION",
      message: "destination 'dropbox' is not supported",
      retryable: false,
    });
    expect(forward).not.toHaveBeenCalled();
    expect(await listDir(chunksDir)).toEqual([]);
  });

  it("answers 404 when /finish names a session with no chunks", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/finish",
      payload: { uploadId: "ghost", filename: "a", destination: "catbox" },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe("NO_CHUNKS");
  });

  it("surfaces a destination rejection with its status and body", async () => {
    forward.mockRejectedValueOnce(
      new ForwardError("rejected", "upload failed with status 412: File too large", {
        destination: "catbox",
        status: 412,
        body: "File too large",
      })
    );
    await postChunk("sess-8", "0", "A");

    const res = await app.inject({
      method: "POST",
      url: "/finish",
      payload: { uploadId: "sess-8", filename: "a", destination: "catbox" },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: {
        code: "UPLOAD_FAILED",
        message: "upload failed with status 412: File too large",
        retryable: false,
        details: { destination: "catbox", status: 412, body: "File too large" },
      },
    });
  });

  it("maps a destination timeout to 504", async () => {
    forward.mockRejectedValueOnce(
      new ForwardError("timeout", "upload to pomf timed out after 10ms", { destination: "pomf" })
    );
    await postChunk("sess-9", "0", "A");

    const res = await app.inject({
      method: "POST",
      url: "/finish",
      payload: { uploadId: "sess-9", filename: "a", destination: "pomf" },
    });

    expect(res.statusCode).toBe(504);
    expect(res.json().error).toMatchObject({ code: "BACKEND_TIMEOUT", retryable: true });
  });

  it("relays a direct upload with fields after the file", async () => {
    const { payload, headers } = multipartBody([
      ["file", { content: "direct bytes", filename: "notes.txt" }],
      ["destination", "catbox"],
      ["userhash", "test-userhash"],
    ]);

    const res = await app.inject({ method: "POST", url: "/direct", payload, headers });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ url: "https://files.catbox.moe/abc123.txt" });
    expect(forwarded).toEqual(["direct bytes"]);
    expect(forward.mock.calls[0][0]).toMatchObject({
      destination: "catbox",
      filename: "notes.txt",
      options: { time: "1h", userhash: "test-userhash" },
    });
    expect(await listDir(artifactsDir)).toEqual([]);
  });

  it("requires a file part on /direct", async () => {
    const { payload, headers } = multipartBody([["destination", "catbox"]]);

    const res = await app.inject({ method: "POST", url: "/direct", payload, headers });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Missing file");
  });

  it("removes the direct artifact when the destination is missing", async () => {
    const { payload, headers } = multipartBody([["file", { content: "x", filename: "x.txt" }]]);

    const res = await app.inject({ method: "POST", url: "/direct", payload, headers });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Missing destination");
    expect(await listDir(artifactsDir)).toEqual([]);
  });
});

describe("service routes", () => {
  async function appWith(ping: () => Promise<unknown>) {
    const pipeline = new RelayPipeline({
      chunkStore: new DiskChunkStore(await makeTmpDir()),
      dedupCache: new DedupCache(new MemoryDedupStore()),
      forward: async () => "https://files.catbox.moe/unused",
      artifactsDir: await makeTmpDir(),
    });
    return buildApp({ pipeline, ping, logger: false });
  }

  it("reports UP while the dedup store answers", async () => {
    const app = await appWith(async () => "PONG");

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: "UP",
      service: "filerelay-api-v1",
      ready: true,
      checks: { dedupStore: { ok: true } },
    });
    await app.close();
  });

  it("reports DOWN with 503 when the dedup store fails", async () => {
    const app = await appWith(async () => {
      throw new Error("connection refused");
    });

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ status: "DOWN", ready: false, checks: { dedupStore: { ok: false, latencyMs: null } } });
    await app.close();
  });

  it("answers the root with a plain-text liveness line", async () => {
    const app = await appWith(async () => {
      throw new Error("connection refused");
    });

    const res = await app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/plain/);
    expect(res.body).toBe("filerelay is working.");
    await app.close();
  });

  it("answers the favicon with no content", async () => {
    const app = await appWith(async () => "PONG");

    const res = await app.inject({ method: "GET", url: "/favicon.ico" });

    expect(res.statusCode).toBe(204);
    expect(res.body).toBe("");
    await app.close();
  });

  it("renders unknown routes as JSON 404s", async () => {
    const app = await appWith(async () => "PONG");

    const res = await app.inject({ method: "GET", url: "/nope" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ message: "Route GET:/nope not found", error: "Not Found", statusCode: 404 });
    await app.close();
  });
});
