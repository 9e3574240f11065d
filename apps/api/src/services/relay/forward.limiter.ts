// src/services/relay/forward.limiter.ts

import PQueue from "p-queue";
import { ForwardLimits } from "../../config/destinations.config.js";
import type { Forwarder } from "./forward.js";

export const forwardQueue = new PQueue({
  concurrency: ForwardLimits.concurrency,
});

/**
 * Runs forwards through a queue so at most `concurrency` uploads leave the
 * process at once. Queued requests are not retried or reordered.
 */
export function queuedForwarder(forward: Forwarder, queue: PQueue = forwardQueue): Forwarder {
  return request => queue.add(() => forward(request), { throwOnTimeout: true });
}
