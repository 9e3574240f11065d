import type { Readable } from "stream";
import { ReadableStream } from "stream/web";

/**
 * Pull-driven adapter: the Node stream is paused whenever the web stream's
 * queue is full, so the producer behind `stream` feels backpressure.
 */
export function nodeToWeb(stream: Readable): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      stream.on("data", (chunk: Buffer) => {
        controller.enqueue(chunk);
        if ((controller.desiredSize ?? 0) <= 0) {
          stream.pause();
        }
      });
      stream.on("end", () => controller.close());
      stream.on("error", err => controller.error(err));
      stream.pause();
    },
    pull() {
      stream.resume();
    },
    cancel(reason) {
      stream.destroy(reason instanceof Error ? reason : undefined);
    },
  });
}
