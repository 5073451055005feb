import { expect } from "expect";

import { describe, it } from "@runtime-conformance/bdd";
import { log, verboseLogging } from "../src/logger.ts";
import { useCapturedLog } from "./helpers.ts";

describe("logger", () => {
  it("routes every level to the installed logger", function* () {
    let captured = yield* useCapturedLog();

    yield* log.info("starting");
    yield* log.debug("details");
    yield* log.warn("careful");
    yield* log.error("broken");
    yield* log.write("raw\n");

    expect(captured.entries).toEqual([
      { level: "info", message: "starting" },
      { level: "debug", message: "details" },
      { level: "warn", message: "careful" },
      { level: "error", message: "broken" },
    ]);
    expect(captured.written).toEqual("raw\n");
  });

  it("drops debug and warnings unless verbose", function* () {
    let captured = yield* useCapturedLog();
    yield* verboseLogging(false);

    yield* log.debug("details");
    yield* log.warn("careful");
    yield* log.info("starting");

    expect(captured.entries).toEqual([{ level: "info", message: "starting" }]);
  });

  it("keeps debug and warnings when verbose", function* () {
    let captured = yield* useCapturedLog();
    yield* verboseLogging(true);

    yield* log.debug("details");
    yield* log.warn("careful");

    expect(captured.messages("debug")).toEqual(["details"]);
    expect(captured.messages("warn")).toEqual(["careful"]);
  });
});
