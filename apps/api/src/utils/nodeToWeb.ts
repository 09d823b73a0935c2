import { Readable } from "stream";
import { ReadableStream } from "stream/web";

/**
 * Pull-based bridge: a chunk leaves `stream` only when the consumer
 * reads, and `onChunk` runs once per chunk handed over.
 */
export function nodeToWeb(
  stream: Readable,
  onChunk?: (chunk: Uint8Array) => Promise<void> | void
): ReadableStream<Uint8Array> {
  const iterator: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        const { done, value } = await iterator.next();
        if (done) {
          controller.close();
          return;
        }

        const chunk =
          typeof value === "string" ? Buffer.from(value) : value;
        if (!(chunk instanceof Uint8Array)) {
          throw new TypeError("Stream produced a non-binary chunk");
        }

        controller.enqueue(new Uint8Array(chunk));
        await onChunk?.(chunk);
      },
      cancel() {
        stream.destroy();
      },
    },
    { highWaterMark: 0 }
  );
}
