import type { BuildError } from "./errors.ts";
import type { ExecutedCase } from "./types.ts";

export type RunFailure =
  | { kind: "build"; error: BuildError }
  | { kind: "case"; caseId: string; logPath: string; result: ExecutedCase };

/**
 * Lifecycle of one harness run:
 *
 * ```
 * not-started -> building -> running(index) -> passed | failed
 * ```
 *
 * `building` is skipped when every executable is already present, and the
 * first failing case moves the run straight to `failed`.
 */
export type RunState =
  | { status: "not-started" }
  | { status: "building" }
  | { status: "running"; index: number; caseId: string; pending: boolean }
  | { status: "passed" }
  | { status: "failed"; failure: RunFailure };

export type TerminalState = Extract<RunState, { status: "passed" | "failed" }>;

export type RunEvent =
  | { type: "build-started" }
  | { type: "build-failed"; error: BuildError }
  | { type: "case-started"; index: number; caseId: string }
  | { type: "case-finished"; result: ExecutedCase }
  | { type: "run-finished" };

export class InvalidTransition extends Error {
  override name = "InvalidTransition";

  constructor(readonly state: RunState, readonly event: RunEvent) {
    super(`cannot handle ${event.type} while ${state.status}`);
  }
}

export const initialState: RunState = { status: "not-started" };

export function isTerminal(state: RunState): state is TerminalState {
  return state.status === "passed" || state.status === "failed";
}

export function transition(state: RunState, event: RunEvent): RunState {
  switch (state.status) {
    case "not-started":
      if (event.type === "build-started") {
        return { status: "building" };
      }
      return start(state, event);
    case "building":
      if (event.type === "build-failed") {
        return {
          status: "failed",
          failure: { kind: "build", error: event.error },
        };
      }
      return start(state, event);
    case "running":
      if (event.type === "case-finished") {
        if (!state.pending || event.result.caseId !== state.caseId) {
          throw new InvalidTransition(state, event);
        }
        if (event.result.verdict === "fail") {
          return {
            status: "failed",
            failure: {
              kind: "case",
              caseId: event.result.caseId,
              logPath: event.result.logPath,
              result: event.result,
            },
          };
        }
        return { ...state, pending: false };
      }
      if (state.pending) {
        throw new InvalidTransition(state, event);
      }
      if (event.type === "case-started" && event.index > state.index) {
        return running(event);
      }
      if (event.type === "run-finished") {
        return { status: "passed" };
      }
      throw new InvalidTransition(state, event);
    case "passed":
    case "failed":
      throw new InvalidTransition(state, event);
  }
}

function start(state: RunState, event: RunEvent): RunState {
  switch (event.type) {
    case "case-started":
      return running(event);
    case "run-finished":
      return { status: "passed" };
    default:
      throw new InvalidTransition(state, event);
  }
}

function running(
  event: Extract<RunEvent, { type: "case-started" }>,
): RunState {
  return {
    status: "running",
    index: event.index,
    caseId: event.caseId,
    pending: true,
  };
}
