import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { until } from "effection";
import { expect } from "expect";

import { beforeEach, describe, it } from "@runtime-conformance/bdd";
import { executablePath } from "../src/materialize.ts";
import {
  caseEnvironment,
  caseInvocation,
  caseLogPath,
  classify,
  runCase,
} from "../src/runner.ts";
import { active, type FakeSuite, useCapturedLog, useFakeSuite } from "./helpers.ts";

describe("runner", () => {
  let suite: FakeSuite;

  beforeEach(function* () {
    suite = yield* useFakeSuite();
    yield* useCapturedLog();
  });

  function* readLog(id: string) {
    return yield* until(
      fsp.readFile(caseLogPath(suite.context(), active(id)), "utf-8"),
    );
  }

  describe("invocation", () => {
    it("writes each case log under the log directory", function* () {
      expect(caseLogPath(suite.context(), active("kill/kill.t"))).toEqual(
        path.join(suite.logDirectory, "kill/kill.t.log"),
      );
    });

    it("hands the runtime and diagnostics flags to the case", function* () {
      expect(caseEnvironment(suite.context())).toEqual({
        RUNTIME: suite.runtime,
        RUST_BACKTRACE: "1",
      });
      expect(caseEnvironment(suite.context({ debugFlagsEnabled: false })))
        .toEqual({ RUNTIME: suite.runtime });
    });

    it("passes variables as arguments under sudo", function* () {
      let context = suite.context({ privilege: "sudo" });
      let testCase = active("kill/kill.t");

      expect(caseInvocation(testCase, context, { PATH: "/usr/bin" })).toEqual({
        command: "sudo",
        options: {
          cwd: suite.suiteDirectory,
          env: { PATH: "/usr/bin" },
          arguments: [
            `RUNTIME=${suite.runtime}`,
            "RUST_BACKTRACE=1",
            executablePath(context, testCase),
          ],
        },
      });
    });

    it("passes variables through the environment without sudo", function* () {
      let context = suite.context();
      let testCase = active("kill/kill.t");

      expect(caseInvocation(testCase, context, { PATH: "/usr/bin" })).toEqual({
        command: executablePath(context, testCase),
        options: {
          cwd: suite.suiteDirectory,
          env: {
            PATH: "/usr/bin",
            RUNTIME: suite.runtime,
            RUST_BACKTRACE: "1",
          },
        },
      });
    });
  });

  describe("classify", () => {
    it("passes a clean zero exit", function* () {
      expect(classify(0, "1..1\nok 1 - create\n")).toEqual("pass");
    });

    it("fails a non-zero exit", function* () {
      expect(classify(1, "ok 1 - create\n")).toEqual("fail");
    });

    it("fails a process that never exited normally", function* () {
      expect(classify(null, "")).toEqual("fail");
    });

    it("fails a zero exit that reported a failure", function* () {
      expect(classify(0, "ok 1 - create\nnot ok 2 - kill\n")).toEqual("fail");
    });
  });

  describe("runCase", () => {
    it("runs a passing case and keeps its output", function* () {
      yield* suite.addCase(
        "create/create.t",
        'echo "1..1"\necho "ok 1 - runtime is $RUNTIME"',
      );

      let result = yield* runCase(active("create/create.t"), suite.context());

      expect(result).toMatchObject({
        caseId: "create/create.t",
        verdict: "pass",
        exitCode: 0,
        timedOut: false,
        logPath: caseLogPath(suite.context(), active("create/create.t")),
        markers: [],
        failures: [],
      });
      expect(result.signal).toBeUndefined();
      expect(yield* readLog("create/create.t")).toEqual(
        `1..1\nok 1 - runtime is ${suite.runtime}\n`,
      );
    });

    it("captures standard error in the same log", function* () {
      yield* suite.addCase(
        "state/state.t",
        'echo "backtrace: $RUST_BACKTRACE" >&2\nexit 3',
      );

      let result = yield* runCase(active("state/state.t"), suite.context());

      expect(result.verdict).toEqual("fail");
      expect(result.exitCode).toEqual(3);
      expect(yield* readLog("state/state.t")).toEqual("backtrace: 1\n");
    });

    it("fails a case that exits zero but prints a failure", function* () {
      yield* suite.addCase("kill/kill.t", 'echo "not ok 1 - kill"');

      let result = yield* runCase(active("kill/kill.t"), suite.context());

      expect(result).toMatchObject({
        verdict: "fail",
        exitCode: 0,
        markers: ["not ok 1 - kill"],
        failures: [{ status: "not ok", number: 1, name: "kill" }],
      });
    });

    it("runs the case from the suite directory", function* () {
      yield* suite.addCase("mounts/mounts.t", "pwd");

      yield* runCase(active("mounts/mounts.t"), suite.context());

      expect(yield* readLog("mounts/mounts.t")).toEqual(
        `${suite.suiteDirectory}\n`,
      );
    });

    it("replaces the log of an earlier run", function* () {
      yield* suite.addCase("hooks/hooks.t", "echo first");
      yield* runCase(active("hooks/hooks.t"), suite.context());

      yield* suite.addCase("hooks/hooks.t", "echo second");
      yield* runCase(active("hooks/hooks.t"), suite.context());

      expect(yield* readLog("hooks/hooks.t")).toEqual("second\n");
    });

    it("kills a case that outlives its timeout", function* () {
      yield* suite.addCase("poststop/poststop.t", "sleep 5");

      let result = yield* runCase(
        active("poststop/poststop.t"),
        suite.context({ caseTimeoutMs: 200 }),
      );

      expect(result).toMatchObject({
        verdict: "fail",
        exitCode: null,
        timedOut: true,
      });
      expect(result.durationMs).toBeLessThan(5000);
      expect(yield* readLog("poststop/poststop.t")).toEqual(
        "\npoststop/poststop.t killed after 200ms\n",
      );
    });

    it("waits for the settle delay before returning", function* () {
      yield* suite.addCase("default/default.t", "exit 0");

      let startedAt = Date.now();
      yield* runCase(
        active("default/default.t"),
        suite.context({ settleDelayMs: 100 }),
      );

      expect(Date.now() - startedAt).toBeGreaterThanOrEqual(95);
    });
  });
});
