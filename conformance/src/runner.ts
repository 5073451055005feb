import * as path from "node:path";
import process from "node:process";
import * as shellwords from "shellwords";
import { call, type Operation, race, sleep, spawn } from "effection";
import {
  type ExecOptions,
  type ExitStatus,
  exec,
  forward,
} from "@runtime-conformance/process";

import { readTextFile, useFileSink } from "./fs.ts";
import { log } from "./logger.ts";
import { executablePath, inherited } from "./materialize.ts";
import { failureMarkers, parseTap } from "./tap.ts";
import type { ExecutedCase, ExecutionContext, TestCase } from "./types.ts";

/**
 * The variable through which a validation case finds the runtime under test.
 */
export const RUNTIME_VARIABLE = "RUNTIME";

/**
 * Set when diagnostics are enabled, so that a panicking runtime prints a
 * backtrace into the case log.
 */
export const DEBUG_VARIABLES: Readonly<Record<string, string>> = {
  RUST_BACKTRACE: "1",
};

export interface Invocation {
  command: string;
  options: ExecOptions;
}

export function caseLogPath(
  context: ExecutionContext,
  testCase: TestCase,
): string {
  return path.join(context.logDirectory, `${testCase.id}.log`);
}

/**
 * The variables injected into every case process.
 */
export function caseEnvironment(
  context: ExecutionContext,
): Record<string, string> {
  return {
    [RUNTIME_VARIABLE]: context.runtime.path,
    ...(context.debugFlagsEnabled ? DEBUG_VARIABLES : {}),
  };
}

/**
 * How a case is started. Under `sudo` the case variables are passed as
 * `NAME=value` arguments, since sudo resets the environment it was given.
 */
export function caseInvocation(
  testCase: TestCase,
  context: ExecutionContext,
  base: Record<string, string | undefined> = process.env,
): Invocation {
  let executable = executablePath(context, testCase);
  let variables = caseEnvironment(context);
  let cwd = context.suiteDirectory;

  if (context.privilege === "sudo") {
    return {
      command: "sudo",
      options: {
        cwd,
        env: inherited(base),
        arguments: [
          ...Object.entries(variables).map(([name, value]) =>
            `${name}=${value}`
          ),
          executable,
        ],
      },
    };
  }

  return {
    command: shellwords.escape(executable),
    options: { cwd, env: { ...inherited(base), ...variables } },
  };
}

/**
 * Pass unless the case exited non-zero or printed a failure marker.
 */
export function classify(
  exitCode: number | null,
  output: string,
): ExecutedCase["verdict"] {
  if (exitCode !== 0) {
    return "fail";
  }
  return failureMarkers(output).length > 0 ? "fail" : "pass";
}

type Completion =
  | { type: "exited"; status: ExitStatus }
  | { type: "timed-out" }
  | { type: "not-started"; error: Error };

/**
 * Run one validation case against the runtime. Standard output and standard
 * error both go to the case's log file, which is kept whatever the outcome.
 * The settle delay is applied before returning.
 */
export function* runCase(
  testCase: TestCase,
  context: ExecutionContext,
): Operation<ExecutedCase> {
  let logPath = caseLogPath(context, testCase);
  let { command, options } = caseInvocation(testCase, context);
  let startedAt = Date.now();

  yield* log.debug(
    `$ ${command} ${options.arguments?.join(" ") ?? ""} > ${logPath} 2>&1`,
  );

  let completion = yield* call(function* (): Operation<Completion> {
    let sink = yield* useFileSink(logPath);
    let write = (chunk: Uint8Array) => sink.write(chunk);

    let proc = yield* exec(command, options);
    let stdout = yield* spawn(() => forward(proc.stdout, write));
    let stderr = yield* spawn(() => forward(proc.stderr, write));
    yield* log.debug(`${testCase.id} started as pid ${proc.pid}`);

    let outcome = yield* waitFor(proc.join(), context.caseTimeoutMs);
    if (outcome.type === "exited") {
      yield* stdout;
      yield* stderr;
    } else if (outcome.type === "timed-out") {
      sink.write(
        `\n${testCase.id} killed after ${context.caseTimeoutMs}ms\n`,
      );
    } else {
      sink.write(`\ncould not start ${testCase.id}: ${outcome.error.message}\n`);
    }
    return outcome;
  });

  let durationMs = Date.now() - startedAt;

  yield* sleep(context.settleDelayMs);

  let output = yield* readTextFile(logPath);
  let exitCode = completion.type === "exited"
    ? completion.status.code ?? null
    : null;
  let markers = failureMarkers(output);

  return {
    caseId: testCase.id,
    verdict: classify(exitCode, output),
    exitCode,
    signal: completion.type === "exited" ? completion.status.signal : undefined,
    timedOut: completion.type === "timed-out",
    logPath,
    durationMs,
    markers,
    failures: parseTap(output).filter((point) => point.status === "not ok"),
  };
}

function* waitFor(
  join: Operation<ExitStatus>,
  timeoutMs: number | undefined,
): Operation<Completion> {
  function* exited(): Operation<Completion> {
    try {
      return { type: "exited", status: yield* join };
    } catch (error) {
      if (error instanceof Error) {
        return { type: "not-started", error };
      }
      throw error;
    }
  }

  if (timeoutMs === undefined) {
    return yield* exited();
  }

  return yield* race([
    exited(),
    (function* (): Operation<Completion> {
      yield* sleep(timeoutMs);
      return { type: "timed-out" };
    })(),
  ]);
}
