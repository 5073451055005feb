import type { Operation } from "effection";

/**
 * Run `op` and return the error it fails with. Fails itself when `op`
 * succeeds or throws something that is not an `Error`.
 */
export function* captureError(op: Operation<unknown>): Operation<Error> {
  try {
    yield* op;
  } catch (error) {
    if (error instanceof Error) {
      return error;
    }
    throw new Error(`expected an Error to be thrown, got ${String(error)}`);
  }
  throw new Error("expected operation to throw an error, but it did not!");
}
