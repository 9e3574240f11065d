// src/services/relay/forward.ts

import { createReadStream } from "fs";
import { PassThrough, type Readable } from "stream";
import FormData from "form-data";

import { ForwardLimits } from "../../config/destinations.config.js";
import type { DestinationOptions } from "../../types/upload.js";
import { ForwardError, errorMessage } from "../../utils/errors.js";
import { nodeToWeb } from "../../utils/nodeToWeb.js";
import { resolveDestination, type DestinationSpec } from "./destinations.js";

export interface ForwardRequest {
  destination: string;
  artifactPath: string;
  /** Name the destination sees. */
  filename: string;
  options: DestinationOptions;
}

/** Resolves with the public URL of the uploaded file. */
export type Forwarder = (request: ForwardRequest) => Promise<string>;

export interface ForwarderOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  highWaterMark?: number;
  /** Opens the artifact for reading; a plain file stream unless overridden. */
  openArtifact?: (artifactPath: string) => Readable;
}

/**
 * Producer half: form-data writes field parts, then the file's bytes, into a
 * bounded pipe. A failure on the producer side destroys the pipe with the
 * error so the consumer aborts instead of sending a truncated body.
 */
function encodeMultipart(
  spec: DestinationSpec,
  request: ForwardRequest,
  options: Pick<Required<ForwarderOptions>, "highWaterMark" | "openArtifact">
) {
  const form = new FormData();
  for (const [name, value] of spec.extraFields(request.options)) {
    form.append(name, value);
  }

  const file = options.openArtifact(request.artifactPath);
  form.append(spec.fileField, file, { filename: request.filename });

  const pipe = new PassThrough({ highWaterMark: options.highWaterMark });
  let producerError: Error | null = null;

  form.on("error", (err: Error) => {
    producerError = err;
    pipe.destroy(err);
  });
  form.pipe(pipe);

  return {
    body: pipe,
    contentType: `multipart/form-data; boundary=${form.getBoundary()}`,
    producerError: () => producerError,
    release: () => {
      file.destroy();
      pipe.destroy();
    },
  };
}

async function forwardOnce(
  request: ForwardRequest,
  options: Required<ForwarderOptions>
): Promise<string> {
  // Unknown destinations fail here, before the file is opened.
  const spec = resolveDestination(request.destination);
  const destination = spec.id;

  const encoded = encodeMultipart(spec, request, options);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  let status: number;
  let ok: boolean;
  let text: string;

  try {
    const res = await options.fetchImpl(spec.uploadUrl, {
      method: "POST",
      headers: { "Content-Type": encoded.contentType },
      body: nodeToWeb(encoded.body),
      duplex: "half",
      signal: controller.signal,
    });

    status = res.status;
    ok = res.ok;
    text = await res.text();
  } catch (err) {
    const sourceErr = encoded.producerError();
    if (sourceErr) {
      throw new ForwardError(
        "source",
        `failed to stream file content: ${sourceErr.message}`,
        { destination, cause: sourceErr }
      );
    }

    if (controller.signal.aborted) {
      throw new ForwardError(
        "timeout",
        `upload to ${destination} timed out after ${options.timeoutMs}ms`,
        { destination, cause: err }
      );
    }

    throw new ForwardError("network", `http request failed: ${errorMessage(err)}`, {
      destination,
      cause: err,
    });
  } finally {
    clearTimeout(timeout);
    encoded.release();
  }

  if (!ok) {
    throw new ForwardError("rejected", `upload failed with status ${status}: ${text}`, {
      destination,
      status,
      body: text,
    });
  }

  return spec.parseResponse(text);
}

export function createForwarder(options: ForwarderOptions = {}): Forwarder {
  const resolved: Required<ForwarderOptions> = {
    fetchImpl: options.fetchImpl ?? fetch,
    timeoutMs: options.timeoutMs ?? ForwardLimits.timeoutMs,
    highWaterMark: options.highWaterMark ?? ForwardLimits.pipeHighWaterMark,
    openArtifact: options.openArtifact ?? (artifactPath => createReadStream(artifactPath)),
  };

  return request => forwardOnce(request, resolved);
}
