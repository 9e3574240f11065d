// src/server.ts

import fs from "fs/promises";
import os from "os";
import path from "path";

import { buildApp } from "./app.js";
import { UploadConfig } from "./config/uploads.config.js";
import { connectDedupStore, dedupStoreClient, disconnectDedupStore } from "./state/client.js";
import { startUploadGc, stopUploadGc } from "./state/gc/upload.gc.scheduler.js";
import { chunkStore, RedisDedupStore } from "./store/index.js";
import { DedupCache } from "./services/relay/dedup.cache.js";
import { createForwarder } from "./services/relay/forward.js";
import { queuedForwarder } from "./services/relay/forward.limiter.js";
import { RelayPipeline } from "./services/relay/relay.pipeline.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

async function prepareUploadTmpDir() {
  const dir = UploadConfig.tmpDir;
  const home = os.homedir();

  if (!path.isAbsolute(dir)) {
    throw new Error("UPLOAD_TMP_DIR must be an absolute path");
  }
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`UPLOAD_TMP_DIR is unsafe: ${dir}`);
  }

  await fs.mkdir(UploadConfig.chunksDir, { recursive: true });
  await fs.mkdir(UploadConfig.artifactsDir, { recursive: true });

  // Write probe.
  const probe = path.join(UploadConfig.artifactsDir, `.write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(probe, "ok");
  await fs.unlink(probe);
}

await connectDedupStore().catch((err) => {
  console.error("Failed to connect the dedup store:", err);
  process.exit(1);
});

const pipeline = new RelayPipeline({
  chunkStore,
  dedupCache: new DedupCache(new RedisDedupStore(dedupStoreClient)),
  forward: queuedForwarder(createForwarder()),
  artifactsDir: UploadConfig.artifactsDir,
});

const app = await buildApp({
  pipeline,
  ping: () => dedupStoreClient().ping(),
});

try {
  await prepareUploadTmpDir();
  app.log.info("Dedup store connected; upload directories ready");
} catch (err) {
  app.log.error(err, "Failed to prepare upload directories");
  process.exit(1);
}

startUploadGc(app.log);

const PORT = Number(process.env.PORT ?? 3000);

try {
  await app.listen({
    port: PORT,
    host: "0.0.0.0",
  });

  app.log.info(
    { port: PORT, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadGc();
    await app.close();
    disconnectDedupStore();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
