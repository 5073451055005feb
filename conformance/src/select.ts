import { ConfigError } from "./errors.ts";
import type { TestCase } from "./types.ts";

/**
 * The default selection pattern, which schedules every case.
 */
export const MATCH_ALL = ".";

export type Selector = (testCase: TestCase) => boolean;

/**
 * Compile a selection pattern. Anything other than `.` is a regular
 * expression searched for anywhere in the case id, so a plain substring
 * such as `kill` works too.
 */
export function createSelector(pattern: string): Selector {
  if (pattern === MATCH_ALL || pattern === "") {
    return () => true;
  }

  let expression: RegExp;
  try {
    expression = new RegExp(pattern);
  } catch (error) {
    let reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `invalid selection pattern ${JSON.stringify(pattern)}: ${reason}`,
      { cause: error },
    );
  }

  return (testCase) => expression.test(testCase.id);
}

/**
 * The cases matching `pattern`, in their original order.
 */
export function select(
  cases: readonly TestCase[],
  pattern: string = MATCH_ALL,
): TestCase[] {
  return cases.filter(createSelector(pattern));
}
