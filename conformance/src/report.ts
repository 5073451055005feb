import type { RunPlan, RunReport } from "./run.ts";

export function summarize(report: RunReport): string {
  let passed = report.results.filter((result) => result.verdict === "pass");
  let failed = report.results.length - passed.length;
  let counts = [
    `${passed.length} passed`,
    `${failed} failed`,
    `${report.plan.skipped.length} skipped`,
    `${report.plan.excluded.length} excluded`,
  ].join(", ");

  if (report.state.status === "passed") {
    return `conformance run passed: ${counts}`;
  }
  let { failure } = report.state;
  let culprit = failure.kind === "build" ? "the build" : failure.caseId;
  return `conformance run failed at ${culprit}: ${counts}`;
}

/**
 * Human-readable listing of a plan: what would run, what this host skips
 * and what the catalog excludes, with the reasons.
 */
export function formatPlan(plan: RunPlan): string {
  let lines = [`scheduled (${plan.scheduled.length}):`];
  for (let testCase of plan.scheduled) {
    lines.push(`  ${testCase.id}`);
  }
  lines.push(`skipped on this host (${plan.skipped.length}):`);
  for (let skip of plan.skipped) {
    lines.push(`  ${skip.caseId}: ${skip.cause}`);
  }
  lines.push(`excluded (${plan.excluded.length}):`);
  for (let testCase of plan.excluded) {
    let reference = testCase.reference ? ` (${testCase.reference})` : "";
    lines.push(
      `  ${testCase.id} [${testCase.status}]: ${testCase.rationale}${reference}`,
    );
  }
  return lines.join("\n") + "\n";
}
