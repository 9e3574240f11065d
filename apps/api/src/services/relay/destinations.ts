// src/services/relay/destinations.ts

import {
  DEFAULT_LITTERBOX_TTL,
  DestinationEnv,
  LitterboxTtls,
  type LitterboxTtl,
} from "../../config/destinations.config.js";
import type { DestinationOptions, RelayRequest } from "../../types/upload.js";
import {
  ForwardError,
  InputError,
  UnsupportedDestinationError,
} from "../../utils/errors.js";

export type Destination = "pomf" | "catbox" | "litterbox";

/** Self-destructing links: never cached, always forwarded fresh. */
export const EPHEMERAL_DESTINATION = "litterbox" satisfies Destination;

export type CacheableDestination = Exclude<Destination, typeof EPHEMERAL_DESTINATION>;

export const CACHEABLE_DESTINATIONS: readonly CacheableDestination[] = ["pomf", "catbox"];

export interface DestinationSpec<Id extends Destination = Destination> {
  readonly id: Id;
  readonly uploadUrl: string;
  /** Multipart field carrying the file bytes. */
  readonly fileField: string;
  /** Plain fields written before the file part, in order. */
  extraFields(options: DestinationOptions): Array<[name: string, value: string]>;
  /** Turns a 2xx response body into the public URL. */
  parseResponse(body: string): string;
}

function parsePlainTextUrl(destination: Destination, body: string): string {
  const url = body.trim();
  if (!/^https?:\/\/\S+$/.test(url)) {
    throw new ForwardError("invalid_response", `${destination} response is not a URL: ${body}`, {
      destination,
      body,
    });
  }
  return url;
}

function parsePomfResponse(body: string): string {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ForwardError("invalid_response", "failed to parse pomf response", {
      destination: "pomf",
      body,
      cause: err,
    });
  }

  if (!isRecord(json) || json.success !== true) {
    const reason = isRecord(json) && typeof json.error === "string" ? json.error : body;
    throw new ForwardError("rejected", `pomf upload failed: ${reason}`, {
      destination: "pomf",
      body,
    });
  }

  const first = Array.isArray(json.files) ? json.files[0] : undefined;
  if (!isRecord(first) || typeof first.url !== "string" || !first.url) {
    throw new ForwardError("invalid_response", "pomf response missing file URL", {
      destination: "pomf",
      body,
    });
  }

  return first.url;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export const destinations: { readonly [Id in Destination]: DestinationSpec<Id> } = {
  pomf: {
    id: "pomf",
    uploadUrl: DestinationEnv.uploadUrls.pomf,
    fileField: "files[]",
    extraFields: () => [],
    parseResponse: parsePomfResponse,
  },
  catbox: {
    id: "catbox",
    uploadUrl: DestinationEnv.uploadUrls.catbox,
    fileField: "fileToUpload",
    extraFields: ({ userhash }) => {
      const fields: Array<[string, string]> = [["reqtype", "fileupload"]];
      if (userhash) fields.push(["userhash", userhash]);
      return fields;
    },
    parseResponse: body => parsePlainTextUrl("catbox", body),
  },
  litterbox: {
    id: "litterbox",
    uploadUrl: DestinationEnv.uploadUrls.litterbox,
    fileField: "fileToUpload",
    extraFields: ({ time }) => [
      ["reqtype", "fileupload"],
      ["time", time],
    ],
    parseResponse: body => parsePlainTextUrl("litterbox", body),
  },
};

export function isDestination(value: string): value is Destination {
  return Object.prototype.hasOwnProperty.call(destinations, value);
}

export function isCacheable(destination: Destination): destination is CacheableDestination {
  return destination !== EPHEMERAL_DESTINATION;
}

export function resolveDestination(name: string): DestinationSpec {
  if (!isDestination(name)) {
    throw new UnsupportedDestinationError(name);
  }
  return destinations[name];
}

function isLitterboxTtl(value: string): value is LitterboxTtl {
  return LitterboxTtls.some(ttl => ttl === value);
}

export function parseDestinationOptions(
  request: Pick<RelayRequest, "userhash" | "time">
): DestinationOptions {
  const time = request.time || DEFAULT_LITTERBOX_TTL;
  if (!isLitterboxTtl(time)) {
    throw new InputError(`time must be one of ${LitterboxTtls.join(", ")}`);
  }

  return {
    time,
    ...(request.userhash ? { userhash: request.userhash } : {}),
  };
}
