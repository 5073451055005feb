import type { ExecutedCase } from "./types.ts";

/**
 * The invocation cannot be turned into a runnable execution context: a
 * missing runtime, an unparseable selection pattern, a bad option value.
 */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/**
 * The case catalog could not be read or does not describe a valid catalog.
 */
export class CatalogError extends Error {
  override name = "CatalogError";

  constructor(
    message: string,
    readonly source: string,
    options?: ErrorOptions,
  ) {
    super(`${source}: ${message}`, options);
  }
}

export interface BuildErrorOptions extends ErrorOptions {
  /** ids of the cases whose executables are missing */
  missing: string[];
  /** where the output of the build command was written, if it ran */
  logPath?: string;
}

/**
 * The validation executables are missing and could not be built. Fatal: no
 * case runs against a partially built suite.
 */
export class BuildError extends Error {
  override name = "BuildError";

  readonly missing: string[];
  readonly logPath?: string;

  constructor(message: string, options: BuildErrorOptions) {
    super(message, options);
    this.missing = options.missing;
    this.logPath = options.logPath;
  }
}

/**
 * A case exited non-zero, or exited zero but reported a failing assertion.
 */
export class CaseFailure extends Error {
  override name = "CaseFailure";

  constructor(readonly result: ExecutedCase) {
    super();
  }

  override get message(): string {
    let { caseId, exitCode, signal, timedOut, logPath, markers } =
      this.result;
    let cause = timedOut
      ? "timed out"
      : exitCode !== 0
      ? signal ? `killed by ${signal}` : `exit code ${exitCode}`
      : `${markers.length} "not ok" line(s)`;
    return `${caseId} failed (${cause}), see ${logPath}`;
  }
}
