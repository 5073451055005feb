import { createSignal, type Operation, resource, type Stream } from "effection";
import type { Readable } from "node:stream";

import type { OutputStream } from "./exec/api.ts";

export function useReadable(target: Readable): OutputStream {
  return resource(function* (provide) {
    let signal = createSignal<Uint8Array, void>();

    let listener = (chunk: Uint8Array) => signal.send(chunk);
    let close = () => signal.close();

    target.on("data", listener);
    target.on("end", close);

    try {
      yield* provide(yield* signal);
    } finally {
      target.off("data", listener);
      target.off("end", close);
      signal.close();
    }
  });
}

/**
 * Read every chunk of `stream` into a string until it closes.
 */
export function* collect(stream: OutputStream): Operation<string> {
  let decoder = new TextDecoder();
  let text = "";
  let subscription = yield* stream;
  let next = yield* subscription.next();
  while (!next.done) {
    text += decoder.decode(next.value, { stream: true });
    next = yield* subscription.next();
  }
  return text + decoder.decode();
}

/**
 * Hand every chunk of `stream` to `sink` until the stream closes.
 */
export function* forward<T>(
  stream: Stream<T, void>,
  sink: (chunk: T) => void,
): Operation<void> {
  let subscription = yield* stream;
  let next = yield* subscription.next();
  while (!next.done) {
    sink(next.value);
    next = yield* subscription.next();
  }
}
