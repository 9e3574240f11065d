// src/services/relay/relay.pipeline.ts

import type { Readable } from "stream";
import type { FastifyBaseLogger } from "fastify";

import type { ChunkStore, StagedChunk } from "../../store/chunk.store.js";
import type {
  Artifact,
  DestinationOptions,
  FinishUploadRequest,
  PipelineStage,
  RelayRequest,
  RelayResult,
} from "../../types/upload.js";
import {
  classifyForwardError,
  recordForwardMetric,
} from "../../types/forward.metrics.js";
import { ForwardError, InputError, errorMessage } from "../../utils/errors.js";
import { assembleChunks } from "../upload/upload.assemble.js";
import { removeArtifact, writeArtifact } from "../upload/upload.artifact.js";
import { hashFile } from "../upload/upload.hash.js";
import type { DedupCache } from "./dedup.cache.js";
import {
  isCacheable,
  parseDestinationOptions,
  resolveDestination,
  type Destination,
} from "./destinations.js";
import type { Forwarder } from "./forward.js";

export interface RelayPipelineDeps {
  chunkStore: ChunkStore;
  dedupCache: DedupCache;
  forward: Forwarder;
  artifactsDir: string;
}

interface RelayTarget {
  destination: Destination;
  options: DestinationOptions;
}

class StageTracker {
  private stage: PipelineStage = "received";

  constructor(private readonly log: FastifyBaseLogger) {}

  enter(next: PipelineStage) {
    this.log.debug({ from: this.stage, to: next }, "Relay stage");
    this.stage = next;
  }

  fail(err: unknown) {
    this.log.debug({ stage: this.stage, err }, "Relay failed");
    this.stage = "failed";
  }
}

/**
 * received → (assembling) → hashing → cache_lookup → forwarding → cache_store → done.
 * The ephemeral destination goes straight to forwarding. Every terminal state
 * removes the request's artifact, and a chunk session is removed as soon as
 * assembly has been attempted.
 */
export class RelayPipeline {
  constructor(private readonly deps: RelayPipelineDeps) {}

  putChunk(uploadId: string, index: string, stream: Readable): Promise<void> {
    return this.deps.chunkStore.putChunk(uploadId, index, stream);
  }

  stageChunk(stream: Readable): Promise<StagedChunk> {
    return this.deps.chunkStore.stageChunk(stream);
  }

  commitChunk(staged: StagedChunk, uploadId: string, index: string): Promise<void> {
    return this.deps.chunkStore.commitChunk(staged, uploadId, index);
  }

  discardStagedChunk(staged: StagedChunk): Promise<void> {
    return this.deps.chunkStore.discardStaged(staged);
  }

  storeDirectFile(filename: string, stream: Readable): Promise<Artifact> {
    return writeArtifact({ artifactsDir: this.deps.artifactsDir, filename, stream });
  }

  releaseArtifact(artifact: Artifact): Promise<void> {
    return removeArtifact(artifact.path);
  }

  async finishChunkedUpload(
    request: FinishUploadRequest,
    log: FastifyBaseLogger
  ): Promise<RelayResult> {
    const stages = new StageTracker(log);
    let artifact: Artifact | null = null;

    try {
      let target: RelayTarget;
      let assembled: Artifact;
      try {
        target = this.resolveTarget(request);
        stages.enter("assembling");
        assembled = await assembleChunks({
          chunkStore: this.deps.chunkStore,
          uploadId: request.uploadId,
          filename: request.filename,
          artifactsDir: this.deps.artifactsDir,
        });
        artifact = assembled;
      } finally {
        await this.releaseSession(request.uploadId, log);
      }

      log.info({ uploadId: request.uploadId, sizeBytes: assembled.sizeBytes }, "Assembled file ready");
      return await this.relay(assembled, target, stages, log);
    } catch (err) {
      stages.fail(err);
      throw err;
    } finally {
      if (artifact) await removeArtifact(artifact.path);
    }
  }

  async relayDirectUpload(
    artifact: Artifact,
    request: RelayRequest,
    log: FastifyBaseLogger
  ): Promise<RelayResult> {
    const stages = new StageTracker(log);

    try {
      const target = this.resolveTarget(request);
      return await this.relay(artifact, target, stages, log);
    } catch (err) {
      stages.fail(err);
      throw err;
    } finally {
      await removeArtifact(artifact.path);
    }
  }

  private resolveTarget(request: RelayRequest): RelayTarget {
    if (!request.destination) {
      throw new InputError("Missing destination");
    }

    return {
      destination: resolveDestination(request.destination).id,
      options: parseDestinationOptions(request),
    };
  }

  private async releaseSession(uploadId: string, log: FastifyBaseLogger) {
    await this.deps.chunkStore.cleanup(uploadId).catch(err => {
      log.warn({ uploadId, err }, "Failed to remove chunk session");
    });
  }

  private async relay(
    artifact: Artifact,
    target: RelayTarget,
    stages: StageTracker,
    log: FastifyBaseLogger
  ): Promise<RelayResult> {
    const { destination } = target;

    if (!isCacheable(destination)) {
      log.info({ destination }, "Ephemeral destination; skipping dedup cache");
      stages.enter("forwarding");
      const url = await this.forward(artifact, target, log);
      stages.enter("done");
      return { url, cached: false };
    }

    stages.enter("hashing");
    const fingerprint = await hashFile(artifact.path);
    const short = fingerprint.slice(0, 10);

    stages.enter("cache_lookup");
    const cachedUrl = await this.deps.dedupCache.lookup(fingerprint, destination);
    if (cachedUrl) {
      log.info({ hash: short, destination }, "Cache hit; returning stored URL");
      stages.enter("done");
      return { url: cachedUrl, cached: true };
    }

    log.info({ hash: short, destination }, "Cache miss; uploading");
    stages.enter("forwarding");
    const url = await this.forward(artifact, target, log);

    stages.enter("cache_store");
    const stored = await this.deps.dedupCache.remember(fingerprint, destination, url);
    stages.enter("done");

    if (!stored.ok) {
      log.warn({ hash: short, destination, err: stored.error }, "Failed to store URL in dedup cache");
      return { url, cached: false, warning: stored.error.message };
    }

    return { url, cached: false };
  }

  private async forward(
    artifact: Artifact,
    target: RelayTarget,
    log: FastifyBaseLogger
  ): Promise<string> {
    const start = Date.now();

    try {
      const url = await this.deps.forward({
        destination: target.destination,
        artifactPath: artifact.path,
        filename: artifact.filename,
        options: target.options,
      });

      recordForwardMetric(log, {
        destination: target.destination,
        sizeBytes: artifact.sizeBytes,
        durationMs: Date.now() - start,
        outcome: "success",
        timestamp: Date.now(),
      });
      log.info({ destination: target.destination, url }, "Uploaded");

      return url;
    } catch (err) {
      recordForwardMetric(log, {
        destination: target.destination,
        sizeBytes: artifact.sizeBytes,
        durationMs: Date.now() - start,
        outcome: classifyForwardError(err),
        error: errorMessage(err),
        httpStatus: err instanceof ForwardError ? err.status : undefined,
        timestamp: Date.now(),
      });

      throw err;
    }
  }
}
