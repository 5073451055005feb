import * as fsp from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type Operation, resource, until } from "effection";

import { useLogger } from "../src/logger.ts";
import type { Catalog, ExecutionContext, TestCase } from "../src/types.ts";

export function active(id: string): TestCase {
  return { id, status: "active" };
}

export function catalogOf(...cases: TestCase[]): Catalog {
  return { source: "test-catalog.yaml", cases };
}

/**
 * Write an executable `/bin/sh` script.
 */
export function* writeScript(filePath: string, body: string): Operation<void> {
  yield* until(fsp.mkdir(path.dirname(filePath), { recursive: true }));
  yield* until(fsp.writeFile(filePath, `#!/bin/sh\n${body}\n`));
  yield* until(fsp.chmod(filePath, 0o755));
}

export interface FakeSuite {
  root: string;
  suiteDirectory: string;
  validationDirectory: string;
  runtime: string;
  logDirectory: string;
  /** install `body` as the validation executable for `id` */
  addCase(id: string, body: string): Operation<void>;
  context(overrides?: Partial<ExecutionContext>): ExecutionContext;
}

/**
 * A throwaway validation suite in a temp directory, with a runtime that does
 * nothing. Cases run unprivileged and without a settle delay.
 */
export function useFakeSuite(): Operation<FakeSuite> {
  return resource<FakeSuite>(function* (provide) {
    let root = yield* until(
      fsp.mkdtemp(path.join(os.tmpdir(), "runtime-conformance-")),
    );
    let suiteDirectory = path.join(root, "suite");
    let validationDirectory = path.join(suiteDirectory, "validation");
    let runtime = path.join(root, "bin", "fake-runtime");
    let logDirectory = path.join(root, "log");

    yield* until(fsp.mkdir(validationDirectory, { recursive: true }));
    yield* writeScript(runtime, "exit 0");

    try {
      yield* provide({
        root,
        suiteDirectory,
        validationDirectory,
        runtime,
        logDirectory,
        *addCase(id, body) {
          yield* writeScript(path.join(validationDirectory, id), body);
        },
        context(overrides = {}) {
          return {
            root,
            runtime: { path: runtime },
            selectionPattern: ".",
            logDirectory,
            debugFlagsEnabled: true,
            catalogPath: path.join(root, "catalog.yaml"),
            suiteDirectory,
            validationDirectory,
            goPath: path.join(root, "gopath"),
            buildCommand: "sh build.sh",
            privilege: "none",
            settleDelayMs: 0,
            ...overrides,
          };
        },
      });
    } finally {
      yield* until(fsp.rm(root, { recursive: true, force: true }));
    }
  });
}

export type LogLevel = "info" | "debug" | "warn" | "error";

export interface CapturedLog {
  entries: { level: LogLevel; message: string }[];
  /** everything passed to `write` */
  written: string;
  messages(level: LogLevel): string[];
}

/**
 * Replace the logger of the current scope with one that records.
 */
export function* useCapturedLog(): Operation<CapturedLog> {
  let captured: CapturedLog = {
    entries: [],
    written: "",
    messages(level) {
      return captured.entries
        .filter((entry) => entry.level === level)
        .map((entry) => entry.message);
    },
  };

  let record = (level: LogLevel) =>
    function* (message: string): Operation<void> {
      captured.entries.push({ level, message });
    };

  yield* useLogger({
    info: record("info"),
    debug: record("debug"),
    warn: record("warn"),
    error: record("error"),
    *write(text) {
      captured.written += text;
    },
  });

  return captured;
}
