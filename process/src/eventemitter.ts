import { type Operation, withResolvers } from "effection";
import type { EventEmitter } from "node:events";

/**
 * Create an {@link Operation} that yields the arguments of the next event
 * emitted by an EventEmitter.
 */
export function once<TArgs extends unknown[] = unknown[]>(
  source: EventEmitter | null,
  eventName: string,
): Operation<TArgs> {
  const result = withResolvers<TArgs>();

  let listener = (...args: TArgs) => {
    result.resolve(args);
    source?.off(eventName, listener);
  };

  source?.on(eventName, listener);

  return result.operation;
}
