// src/utils/apiError.ts

import type { FastifyBaseLogger, FastifyReply } from "fastify";
import { RelayError } from "./errors.js";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and utils/errors.ts.
 */
export type ApiErrorCode =
  | "INVALID_REQUEST"
  | "UNSUPPORTED_DESTINATION"
  | "NO_CHUNKS"
  | "FILE_TOO_LARGE"
  | "STORAGE_IO_FAILED"
  | "ASSEMBLY_FAILED"
  | "CACHE_UNAVAILABLE"
  | "CACHE_STORE_FAILED"
  | "UPLOAD_FAILED"
  | "UPLOAD_SOURCE_FAILED"
  | "BACKEND_UNREACHABLE"
  | "BACKEND_TIMEOUT"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("statusCode" in err)) {
    return undefined;
  }
  const { statusCode } = err;
  return typeof statusCode === "number" && Number.isInteger(statusCode)
    ? statusCode
    : undefined;
}

/**
 * Renders any failure from a relay route: domain errors keep their code and
 * details, client-side multipart errors keep their 4xx status, everything
 * else is an opaque 500.
 */
export function sendRelayError(
  reply: FastifyReply,
  log: FastifyBaseLogger,
  err: unknown
) {
  if (err instanceof RelayError) {
    if (err.statusCode >= 500) {
      log.error({ err }, "Relay request failed");
    } else {
      log.info({ code: err.code, message: err.message }, "Relay request rejected");
    }

    return sendApiError(reply, err.statusCode, err.code, err.message, {
      retryable: err.retryable,
      details: err.details(),
    });
  }

  const status = httpStatusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    const message = err instanceof Error ? err.message : "Invalid request";
    return sendApiError(
      reply,
      status,
      status === 413 ? "FILE_TOO_LARGE" : "INVALID_REQUEST",
      message
    );
  }

  log.error({ err }, "Request error");
  return sendApiError(reply, 500, "INTERNAL_ERROR", "Unexpected server error");
}
