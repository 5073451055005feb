import * as path from "node:path";
import process from "node:process";
import { type Operation } from "effection";
import {
  exec,
  ExecError,
  type ProcessResult,
} from "@runtime-conformance/process";

import { BuildError } from "./errors.ts";
import { isExecutable, writeTextFile } from "./fs.ts";
import { log } from "./logger.ts";
import type { ExecutionContext, TestCase } from "./types.ts";

export type MaterializeOutcome = "present" | "built";

export function executablePath(
  context: ExecutionContext,
  testCase: TestCase,
): string {
  return path.join(context.validationDirectory, testCase.id);
}

export function buildLogPath(context: ExecutionContext): string {
  return path.join(context.logDirectory, "build.log");
}

/**
 * The environment the suite's build runs with: the inherited one, plus the
 * GOPATH-mode settings the runtime-tools makefile expects.
 */
export function buildEnvironment(
  context: ExecutionContext,
  base: Record<string, string | undefined> = process.env,
): Record<string, string> {
  return {
    ...inherited(base),
    GO111MODULE: "auto",
    GOPATH: context.goPath,
  };
}

export function inherited(
  base: Record<string, string | undefined>,
): Record<string, string> {
  let env: Record<string, string> = {};
  for (let [name, value] of Object.entries(base)) {
    if (value !== undefined) {
      env[name] = value;
    }
  }
  return env;
}

export function* missingExecutables(
  cases: readonly TestCase[],
  context: ExecutionContext,
): Operation<TestCase[]> {
  let missing: TestCase[] = [];
  for (let testCase of cases) {
    if (!(yield* isExecutable(executablePath(context, testCase)))) {
      missing.push(testCase);
    }
  }
  return missing;
}

/**
 * Make sure every case in `cases` has its executable. A single missing one
 * means the generated set is stale, so the whole suite is rebuilt, once.
 * Fails with a `BuildError` when the build fails or leaves executables
 * missing.
 */
export function* ensureBuilt(
  cases: readonly TestCase[],
  context: ExecutionContext,
): Operation<MaterializeOutcome> {
  let missing = yield* missingExecutables(cases, context);
  if (missing.length === 0) {
    return "present";
  }

  let ids = missing.map((testCase) => testCase.id);
  let logPath = buildLogPath(context);

  yield* log.info(
    `${missing.length} validation executable(s) missing, building with: ${context.buildCommand}`,
  );
  yield* log.debug(`missing: ${ids.join(", ")}`);

  let options = {
    cwd: context.suiteDirectory,
    env: buildEnvironment(context),
  };

  let result: ProcessResult;
  try {
    result = yield* exec(context.buildCommand, options).join();
  } catch (error) {
    let reason = error instanceof Error ? error.message : String(error);
    throw new BuildError(
      `could not start build command "${context.buildCommand}": ${reason}`,
      { missing: ids, cause: error },
    );
  }

  yield* writeTextFile(logPath, result.stdout + result.stderr);

  if (result.code !== 0) {
    throw new BuildError(
      `build command "${context.buildCommand}" failed, see ${logPath}`,
      {
        missing: ids,
        logPath,
        cause: new ExecError(result, result.command, result.options),
      },
    );
  }

  let remaining = yield* missingExecutables(cases, context);
  if (remaining.length > 0) {
    throw new BuildError(
      `build finished but ${remaining.length} validation executable(s) are still missing: ${
        remaining.map((testCase) => testCase.id).join(", ")
      }`,
      { missing: remaining.map((testCase) => testCase.id), logPath },
    );
  }

  yield* log.info(`built ${missing.length} validation executable(s)`);
  return "built";
}
