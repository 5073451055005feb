import { expect } from "expect";

import { describe, it } from "@runtime-conformance/bdd";
import { BuildError } from "../src/errors.ts";
import { formatPlan, summarize } from "../src/report.ts";
import type { RunPlan, RunReport } from "../src/run.ts";
import type { ExecutedCase, TestCase } from "../src/types.ts";
import { active } from "./helpers.ts";

const flaky: TestCase = {
  id: "c/c.t",
  status: "excluded-flaky",
  rationale: "hangs on cleanup",
  reference: "https://example.com/issues/1",
};

const plan: RunPlan = {
  scheduled: [active("a/a.t"), active("b/b.t")],
  skipped: [{ caseId: "m/memory.t", verdict: "skipped", cause: "no swap" }],
  excluded: [flaky],
};

function executed(
  caseId: string,
  verdict: ExecutedCase["verdict"],
): ExecutedCase {
  return {
    caseId,
    verdict,
    exitCode: verdict === "pass" ? 0 : 1,
    timedOut: false,
    logPath: `/tmp/log/${caseId}.log`,
    durationMs: 1,
    markers: [],
    failures: [],
  };
}

describe("report", () => {
  describe("summarize", () => {
    it("counts a passing run", function* () {
      let report: RunReport = {
        state: { status: "passed" },
        plan,
        materialized: "present",
        results: [executed("a/a.t", "pass"), executed("b/b.t", "pass")],
      };

      expect(summarize(report)).toEqual(
        "conformance run passed: 2 passed, 0 failed, 1 skipped, 1 excluded",
      );
    });

    it("names the failing case", function* () {
      let failing = executed("b/b.t", "fail");
      let report: RunReport = {
        state: {
          status: "failed",
          failure: {
            kind: "case",
            caseId: "b/b.t",
            logPath: failing.logPath,
            result: failing,
          },
        },
        plan,
        materialized: "built",
        results: [executed("a/a.t", "pass"), failing],
      };

      expect(summarize(report)).toEqual(
        "conformance run failed at b/b.t: 1 passed, 1 failed, 1 skipped, 1 excluded",
      );
    });

    it("names the build when it failed", function* () {
      let report: RunReport = {
        state: {
          status: "failed",
          failure: {
            kind: "build",
            error: new BuildError("make failed", { missing: ["a/a.t"] }),
          },
        },
        plan: { scheduled: [], skipped: [], excluded: [] },
        materialized: "present",
        results: [],
      };

      expect(summarize(report)).toEqual(
        "conformance run failed at the build: 0 passed, 0 failed, 0 skipped, 0 excluded",
      );
    });
  });

  describe("formatPlan", () => {
    it("lists what runs, what is skipped and what is excluded", function* () {
      expect(formatPlan(plan)).toEqual(
        [
          "scheduled (2):",
          "  a/a.t",
          "  b/b.t",
          "skipped on this host (1):",
          "  m/memory.t: no swap",
          "excluded (1):",
          "  c/c.t [excluded-flaky]: hangs on cleanup (https://example.com/issues/1)",
          "",
        ].join("\n"),
      );
    });
  });
});
