import * as path from "node:path";
import process from "node:process";
import { type Operation } from "effection";
import { z } from "zod";

import { defaultCatalogPath } from "./catalog.ts";
import { ConfigError } from "./errors.ts";
import { exists, isExecutable } from "./fs.ts";
import { createSelector, MATCH_ALL } from "./select.ts";
import type { ExecutionContext } from "./types.ts";

export const DEFAULT_SUITE_DIRECTORY =
  "integration_test/runtime-tools/src/github.com/opencontainers/runtime-tools";
export const DEFAULT_GOPATH = "integration_test/runtime-tools";
export const DEFAULT_BUILD_COMMAND = "make runtimetest validation-executables";

/**
 * Pause after every case so that the kernel can release the cgroups and
 * namespaces it used before the next case starts. Back-to-back cases are
 * known to fail on resource contention without it.
 */
export const DEFAULT_SETTLE_DELAY_MS = 1000;

export const HarnessOptionsSchema = z.object({
  pattern: z.string().default(MATCH_ALL),
  runtime: z.string().min(1).optional(),
  root: z.string().optional(),
  suite: z.string().default(DEFAULT_SUITE_DIRECTORY),
  gopath: z.string().default(DEFAULT_GOPATH),
  build: z.string().min(1).default(DEFAULT_BUILD_COMMAND),
  logs: z.string().default("log"),
  catalog: z.string().optional(),
  settle: z.number().int().nonnegative().default(DEFAULT_SETTLE_DELAY_MS),
  timeout: z.number().int().positive().optional(),
  privilege: z.enum(["sudo", "none"]).default("sudo"),
  diagnostics: z.enum(["on", "off"]).default("on"),
  list: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type HarnessOptions = z.infer<typeof HarnessOptionsSchema>;
export type HarnessInput = z.input<typeof HarnessOptionsSchema>;

export interface Environment {
  cwd: string;
  env: Record<string, string | undefined>;
}

/**
 * Turn invocation options into the immutable context every component of a
 * run shares. The runtime comes from `--runtime`, falling back to the
 * `RUNTIME` environment variable; relative paths resolve against `--root`,
 * which itself defaults to the working directory.
 */
export function* createExecutionContext(
  input: HarnessInput,
  environment: Environment = { cwd: process.cwd(), env: process.env },
): Operation<ExecutionContext> {
  let parsed = HarnessOptionsSchema.safeParse(input);
  if (!parsed.success) {
    let issues = parsed.error.issues.map((issue) =>
      `--${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(issues.join("; "));
  }
  let options = parsed.data;

  let root = path.resolve(environment.cwd, options.root ?? ".");
  let resolve = (target: string) => path.resolve(root, target);

  let runtime = options.runtime ?? environment.env.RUNTIME;
  if (!runtime) {
    throw new ConfigError(
      "no runtime under test: pass --runtime <path> or set RUNTIME",
    );
  }
  let runtimePath = resolve(runtime);
  if (!(yield* isExecutable(runtimePath))) {
    throw new ConfigError(
      `runtime ${runtimePath} does not exist or is not executable`,
    );
  }

  createSelector(options.pattern);

  let catalogPath = options.catalog
    ? resolve(options.catalog)
    : defaultCatalogPath;
  if (!(yield* exists(catalogPath))) {
    throw new ConfigError(`catalog ${catalogPath} does not exist`);
  }

  let suiteDirectory = resolve(options.suite);

  return Object.freeze({
    root,
    runtime: Object.freeze({ path: runtimePath }),
    selectionPattern: options.pattern,
    logDirectory: resolve(options.logs),
    debugFlagsEnabled: options.diagnostics === "on",
    catalogPath,
    suiteDirectory,
    validationDirectory: path.join(suiteDirectory, "validation"),
    goPath: resolve(options.gopath),
    buildCommand: options.build,
    privilege: options.privilege,
    settleDelayMs: options.settle,
    caseTimeoutMs: options.timeout,
  });
}
