#!/usr/bin/env -S node --import tsx
import { Err, exit, main, Ok, type Operation, type Result } from "effection";
import { parser } from "zod-opts";

import { loadCatalog } from "./src/catalog.ts";
import {
  createExecutionContext,
  type HarnessOptions,
  HarnessOptionsSchema,
} from "./src/config.ts";
import { CatalogError, ConfigError } from "./src/errors.ts";
import { log, verboseLogging } from "./src/logger.ts";
import { formatPlan, summarize } from "./src/report.ts";
import { planRun, runConformance } from "./src/run.ts";
import type { Catalog, ExecutionContext } from "./src/types.ts";

const shape = HarnessOptionsSchema.shape;

function parseArgs(argv: string[]): HarnessOptions {
  return parser()
    .name("runtime-conformance")
    .description(
      "run the OCI runtime-tools validation cases against a container runtime",
    )
    .options({
      runtime: {
        type: shape.runtime,
        description: "runtime executable under test (default: $RUNTIME)",
      },
      root: {
        type: shape.root,
        description: "directory relative paths resolve against (default: cwd)",
      },
      suite: {
        type: shape.suite,
        description: "runtime-tools checkout holding validation/",
      },
      gopath: { type: shape.gopath, description: "GOPATH for the build" },
      build: {
        type: shape.build,
        description: "command that builds missing validation executables",
      },
      logs: { type: shape.logs, description: "directory for case logs" },
      catalog: {
        type: shape.catalog,
        description: "case catalog to use instead of the bundled one",
      },
      settle: {
        type: shape.settle,
        description: "pause after each case, in milliseconds",
      },
      timeout: {
        type: shape.timeout,
        description: "kill a case after this many milliseconds (default: never)",
      },
      privilege: {
        type: shape.privilege,
        description: "how cases get root: through sudo, or not at all",
      },
      diagnostics: {
        type: shape.diagnostics,
        description: "pass RUST_BACKTRACE=1 to every case",
      },
      list: {
        type: shape.list,
        description: "print what would run, and why the rest would not",
      },
      verbose: { type: shape.verbose, description: "debug output" },
    })
    .args([
      {
        name: "pattern",
        type: shape.pattern,
        description: "regular expression selecting cases by id (default: all)",
      },
    ])
    .parse(argv);
}

interface Prepared {
  context: ExecutionContext;
  catalog: Catalog;
}

function* prepare(options: HarnessOptions): Operation<Result<Prepared>> {
  try {
    let context = yield* createExecutionContext(options);
    let catalog = yield* loadCatalog(context.catalogPath);
    return Ok({ context, catalog });
  } catch (error) {
    if (error instanceof ConfigError || error instanceof CatalogError) {
      return Err(error);
    }
    throw error;
  }
}

await main(function* (argv) {
  let options = parseArgs(argv);

  yield* verboseLogging(options.verbose);

  let prepared = yield* prepare(options);
  if (!prepared.ok) {
    yield* exit(2, prepared.error.message);
    return;
  }
  let { context, catalog } = prepared.value;

  yield* log.debug(`runtime under test: ${context.runtime.path}`);

  if (options.list) {
    let plan = yield* planRun(catalog, context);
    yield* log.write(formatPlan(plan));
    return;
  }

  let report = yield* runConformance(catalog, context);

  if (report.state.status === "failed") {
    yield* exit(1, summarize(report));
  } else {
    yield* log.info(summarize(report));
  }
});
