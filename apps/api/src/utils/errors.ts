// src/utils/errors.ts

import type { ApiErrorCode } from "./apiError.js";

export abstract class RelayError extends Error {
  abstract readonly code: ApiErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return false;
  }

  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class InputError extends RelayError {
  readonly code = "INVALID_REQUEST";
  readonly statusCode = 400;
}

export class UnsupportedDestinationError extends RelayError {
  readonly code = "UNSUPPORTED_DESTINATION";
  readonly statusCode = 400;

  constructor(readonly destination: string) {
    super(`destination '${destination}' is not supported`);
  }
}

export class NoChunksError extends RelayError {
  readonly code = "NO_CHUNKS";
  readonly statusCode = 404;

  constructor(readonly uploadId: string, options?: { cause?: unknown }) {
    super(`no chunks found for ${uploadId}`, options);
  }
}

/** Disk read/write failure while storing, assembling or hashing. */
export class StorageIOError extends RelayError {
  readonly code: ApiErrorCode = "STORAGE_IO_FAILED";
  readonly statusCode = 500;
}

export class AssemblyIOError extends StorageIOError {
  readonly code = "ASSEMBLY_FAILED";
}

export class CacheLookupError extends RelayError {
  readonly code = "CACHE_UNAVAILABLE";
  readonly statusCode = 500;

  get retryable(): boolean {
    return true;
  }
}

export class CacheStoreError extends RelayError {
  readonly code = "CACHE_STORE_FAILED";
  readonly statusCode = 500;
}

export type ForwardFailureKind =
  | "rejected"
  | "invalid_response"
  | "network"
  | "timeout"
  | "source";

const FORWARD_FAILURES: Record<
  ForwardFailureKind,
  { code: ApiErrorCode; statusCode: number; retryable: boolean }
> = {
  rejected: { code: "UPLOAD_FAILED", statusCode: 500, retryable: false },
  invalid_response: { code: "UPLOAD_FAILED", statusCode: 500, retryable: false },
  source: { code: "UPLOAD_SOURCE_FAILED", statusCode: 500, retryable: false },
  network: { code: "BACKEND_UNREACHABLE", statusCode: 502, retryable: true },
  timeout: { code: "BACKEND_TIMEOUT", statusCode: 504, retryable: true },
};

export class ForwardError extends RelayError {
  readonly destination: string;
  readonly status?: number;
  readonly body?: string;

  constructor(
    readonly kind: ForwardFailureKind,
    message: string,
    context: {
      destination: string;
      status?: number;
      body?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: context.cause });
    this.destination = context.destination;
    this.status = context.status;
    this.body = context.body;
  }

  get code(): ApiErrorCode {
    return FORWARD_FAILURES[this.kind].code;
  }

  get statusCode(): number {
    return FORWARD_FAILURES[this.kind].statusCode;
  }

  get retryable(): boolean {
    return FORWARD_FAILURES[this.kind].retryable;
  }

  details(): Record<string, unknown> {
    return {
      destination: this.destination,
      ...(this.status !== undefined && { status: this.status }),
      ...(this.body !== undefined && { body: this.body }),
    };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
