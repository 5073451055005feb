import { type Operation } from "effection";

import {
  initialState,
  type RunEvent,
  type RunState,
  type TerminalState,
  transition,
} from "./aggregate.ts";
import {
  type CapabilityRule,
  defaultCapabilityRules,
  eligible,
  type HostCapabilities,
  probeHost,
} from "./capability.ts";
import { activeCases, excludedCases } from "./catalog.ts";
import { BuildError, CaseFailure } from "./errors.ts";
import { readTextFile } from "./fs.ts";
import { log } from "./logger.ts";
import {
  ensureBuilt,
  type MaterializeOutcome,
  missingExecutables,
} from "./materialize.ts";
import { runCase } from "./runner.ts";
import { createSelector } from "./select.ts";
import type {
  Catalog,
  ExecutedCase,
  ExecutionContext,
  SkippedCase,
  TestCase,
} from "./types.ts";

export interface RunOptions {
  rules?: readonly CapabilityRule[];
  /** use this snapshot instead of probing the host */
  host?: HostCapabilities;
  /** called with every state the run passes through */
  onTransition?: (state: RunState, event: RunEvent) => void;
}

export interface RunPlan {
  /** eligible, selected cases in catalog order */
  scheduled: TestCase[];
  /** active cases this host cannot run */
  skipped: SkippedCase[];
  /** cases the catalog excludes permanently */
  excluded: TestCase[];
}

export interface RunReport {
  state: TerminalState;
  plan: RunPlan;
  materialized: MaterializeOutcome;
  results: ExecutedCase[];
}

/**
 * Decide what a run would do: drop the cases the host cannot support, then
 * narrow what remains to the selection pattern. Catalog order is kept.
 */
export function* planRun(
  catalog: Catalog,
  context: ExecutionContext,
  options: RunOptions = {},
): Operation<RunPlan> {
  let rules = options.rules ?? defaultCapabilityRules;
  let host = options.host ?? (yield* probeHost(rules));
  let selected = createSelector(context.selectionPattern);

  let skipped: SkippedCase[] = [];
  let scheduled: TestCase[] = [];
  for (let testCase of activeCases(catalog)) {
    let eligibility = eligible(testCase, host, rules);
    if (!eligibility.eligible) {
      skipped.push({
        caseId: testCase.id,
        verdict: "skipped",
        cause: eligibility.cause,
      });
    } else if (selected(testCase)) {
      scheduled.push(testCase);
    }
  }

  return { scheduled, skipped, excluded: excludedCases(catalog) };
}

/**
 * Run the catalog against the runtime, one case at a time, stopping at the
 * first failure. The failing case's log is written out in full before this
 * returns. The report carries every result gathered up to that point.
 */
export function* runConformance(
  catalog: Catalog,
  context: ExecutionContext,
  options: RunOptions = {},
): Operation<RunReport> {
  let state: RunState = initialState;
  let dispatch = (event: RunEvent): RunState => {
    state = transition(state, event);
    options.onTransition?.(state, event);
    return state;
  };

  let plan = yield* planRun(catalog, context, options);
  let results: ExecutedCase[] = [];

  for (let skip of plan.skipped) {
    yield* log.info(`Skip ${skip.caseId} because ${skip.cause}`);
  }

  let required = activeCases(catalog);
  let materialized: MaterializeOutcome = "present";
  if ((yield* missingExecutables(required, context)).length > 0) {
    dispatch({ type: "build-started" });
    try {
      materialized = yield* ensureBuilt(required, context);
    } catch (error) {
      if (!(error instanceof BuildError)) {
        throw error;
      }
      yield* log.error(error.message);
      return report(dispatch({ type: "build-failed", error }));
    }
  }

  for (let [index, testCase] of plan.scheduled.entries()) {
    dispatch({ type: "case-started", index, caseId: testCase.id });
    yield* log.info(`Running ${testCase.id}`);

    let result = yield* runCase(testCase, context);
    results.push(result);

    let next = dispatch({ type: "case-finished", result });
    if (next.status === "failed") {
      yield* reportFailure(result);
      return report(next);
    }
  }

  return report(dispatch({ type: "run-finished" }));

  function report(final: RunState): RunReport {
    if (final.status !== "passed" && final.status !== "failed") {
      throw new Error(`run ended in non-terminal state ${final.status}`);
    }
    return { state: final, plan, materialized, results };
  }
}

function* reportFailure(result: ExecutedCase): Operation<void> {
  yield* log.error(new CaseFailure(result).message);
  for (let failure of result.failures) {
    yield* log.error(`  not ok ${failure.number} - ${failure.name}`);
  }
  let output = yield* readTextFile(result.logPath);
  if (output !== "" && !output.endsWith("\n")) {
    output += "\n";
  }
  yield* log.write(output);
}

/**
 * Throw the error that ended a failed run: the `BuildError`, or a
 * `CaseFailure` for the first failing case.
 */
export function assertPassed(report: RunReport): void {
  let { state } = report;
  if (state.status === "failed") {
    if (state.failure.kind === "build") {
      throw state.failure.error;
    }
    throw new CaseFailure(state.failure.result);
  }
}
