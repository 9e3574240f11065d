// src/types/forward.metrics.ts

import type { FastifyBaseLogger } from "fastify";
import { ForwardError } from "../utils/errors.js";

export type ForwardOutcome =
  | "success"
  | "rejected"
  | "invalid_response"
  | "timeout"
  | "network_error"
  | "source_error"
  | "unknown_error";

export interface ForwardMetric {
  destination: string;
  sizeBytes: number;
  durationMs: number;
  outcome: ForwardOutcome;
  error?: string;
  httpStatus?: number;
  timestamp: number;
}

export function recordForwardMetric(
  log: FastifyBaseLogger,
  metric: ForwardMetric
) {
  log.info({ metric }, "[forward.metric]");
}

export function classifyForwardError(err: unknown): ForwardOutcome {
  if (!(err instanceof ForwardError)) return "unknown_error";

  switch (err.kind) {
    case "rejected":
      return "rejected";
    case "invalid_response":
      return "invalid_response";
    case "timeout":
      return "timeout";
    case "network":
      return "network_error";
    case "source":
      return "source_error";
  }
}
