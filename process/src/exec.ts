import * as shellwords from "shellwords";

import { type Operation, spawn } from "effection";
import type { ExecOptions, Process, ProcessResult } from "./exec/api.ts";
import { createPosixProcess } from "./exec/posix.ts";
import { collect } from "./helpers.ts";

export * from "./exec/api.ts";
export * from "./exec/error.ts";

export interface Exec extends Operation<Process> {
  /**
   * Run the process to completion and collect its output.
   */
  join(): Operation<ProcessResult>;
}

/**
 * Execute `command` with `options`. The command string is split into words
 * the way a shell would, without running one.
 *
 * The process, and every process in its group, is terminated when the
 * scope that started it exits.
 */
export function exec(command: string, options: ExecOptions = {}): Exec {
  let [cmd = "", ...args] = shellwords.split(command);
  let opts = { ...options, arguments: args.concat(options.arguments ?? []) };

  return {
    *[Symbol.iterator]() {
      return yield* createPosixProcess(cmd, opts);
    },
    *join() {
      let process = yield* createPosixProcess(cmd, opts);

      let stdout = yield* spawn(() => collect(process.stdout));
      let stderr = yield* spawn(() => collect(process.stderr));

      let status = yield* process.join();

      return { ...status, stdout: yield* stdout, stderr: yield* stderr };
    },
  };
}
