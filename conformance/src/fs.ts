import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { type Operation, resource, until } from "effection";

export function* exists(filePath: string): Operation<boolean> {
  try {
    yield* until(fsp.access(filePath));
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether `filePath` is a regular file the current user may execute.
 */
export function* isExecutable(filePath: string): Operation<boolean> {
  try {
    let stat = yield* until(fsp.stat(filePath));
    if (!stat.isFile()) {
      return false;
    }
    yield* until(fsp.access(filePath, fs.constants.X_OK));
    return true;
  } catch {
    return false;
  }
}

export function* ensureDir(dirPath: string): Operation<void> {
  yield* until(fsp.mkdir(dirPath, { recursive: true }));
}

export function* readTextFile(filePath: string): Operation<string> {
  return yield* until(fsp.readFile(filePath, "utf-8"));
}

export function* writeTextFile(
  filePath: string,
  content: string,
): Operation<void> {
  yield* ensureDir(path.dirname(filePath));
  yield* until(fsp.writeFile(filePath, content));
}

export interface FileSink {
  readonly path: string;
  write(chunk: Uint8Array | string): void;
}

/**
 * Open `filePath` for writing, truncating it, for the lifetime of the
 * current scope. Everything written is flushed before the scope exits.
 */
export function useFileSink(filePath: string): Operation<FileSink> {
  return resource(function* (provide) {
    yield* ensureDir(path.dirname(filePath));
    let stream = fs.createWriteStream(filePath, { flags: "w" });
    let failure: Error | undefined;
    stream.on("error", (error) => {
      failure = error;
    });

    try {
      yield* provide({
        path: filePath,
        write(chunk) {
          stream.write(chunk);
        },
      });
    } finally {
      yield* until(
        new Promise<void>((resolve, reject) => {
          if (failure) {
            reject(failure);
          } else {
            stream.once("error", reject);
            stream.end(() => resolve());
          }
        }),
      );
    }
  });
}
