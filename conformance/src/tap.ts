import { parse as parseYaml } from "yaml";

import type { TapResult } from "./types.ts";

const STATUS_LINE_REGEX = /^(\s*)(ok|not ok)\b\s*(\d+)?\s*(?:-\s*)?(.*)$/;
const DIRECTIVE_REGEX = /^(.*?)\s*#\s*((?:skip|todo)\b.*)$/i;
const YAML_START_REGEX = /^(\s*)---\s*$/;
const YAML_END_REGEX = /^(\s*)\.\.\.\s*$/;

/**
 * The marker a validation case prints for a failed assertion. A case is
 * failed by any line containing it, TAP-formed or not.
 */
export const FAILURE_MARKER = "not ok";

type ParserState =
  | { type: "idle" }
  | { type: "pending_yaml"; result: TapResult; indent: number }
  | {
    type: "in_yaml";
    result: TapResult;
    yamlLines: string[];
    baseIndent: number;
  };

/**
 * Every line of `text` that carries the failure marker.
 */
export function failureMarkers(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.includes(FAILURE_MARKER));
}

/**
 * Read the TAP test points out of a case log, along with the YAML
 * diagnostics block that may follow each of them. Lines that are not part of
 * the protocol (runtime chatter, stack traces) are ignored.
 */
export function parseTap(text: string): TapResult[] {
  let results: TapResult[] = [];
  let state: ParserState = { type: "idle" };
  let counter = 0;

  let statusLine = (line: string): [TapResult, number] | undefined => {
    let match = STATUS_LINE_REGEX.exec(line);
    if (!match) {
      return undefined;
    }
    let [, indent = "", status, num, rest = ""] = match;
    counter = num ? Number.parseInt(num, 10) : counter + 1;
    let result: TapResult = {
      status: status === "ok" ? "ok" : "not ok",
      number: counter,
      name: rest.trim(),
    };
    let directive = DIRECTIVE_REGEX.exec(rest);
    if (directive) {
      result.name = (directive[1] ?? "").trim();
      result.directive = directive[2];
    }
    return [result, indent.length];
  };

  for (let line of text.split(/\r?\n/)) {
    if (state.type === "in_yaml") {
      if (YAML_END_REGEX.test(line)) {
        state.result.metadata = parseYamlBlock(
          state.yamlLines,
          state.baseIndent,
        );
        results.push(state.result);
        state = { type: "idle" };
      } else {
        state.yamlLines.push(line);
      }
      continue;
    }

    if (state.type === "pending_yaml") {
      let start = YAML_START_REGEX.exec(line);
      if (start && (start[1] ?? "").length > state.indent) {
        state = {
          type: "in_yaml",
          result: state.result,
          yamlLines: [],
          baseIndent: (start[1] ?? "").length,
        };
        continue;
      }
      if (line.trim().startsWith("#") || line.trim() === "") {
        continue;
      }
      results.push(state.result);
      state = { type: "idle" };
    }

    let status = statusLine(line);
    if (status) {
      let [result, indent] = status;
      state = { type: "pending_yaml", result, indent };
    }
  }

  if (state.type === "pending_yaml") {
    results.push(state.result);
  } else if (state.type === "in_yaml") {
    state.result.metadata = parseYamlBlock(state.yamlLines, state.baseIndent);
    results.push(state.result);
  }

  return results;
}

function parseYamlBlock(
  lines: string[],
  baseIndent: number,
): Record<string, unknown> | undefined {
  if (lines.length === 0) {
    return undefined;
  }

  let yamlText = lines
    .map((line) =>
      line.length >= baseIndent ? line.slice(baseIndent) : line.trimStart()
    )
    .join("\n");

  try {
    let parsed: unknown = parseYaml(yamlText);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return undefined;
  } catch {
    // diagnostics are best effort; a malformed block is ignored
    return undefined;
  }
}
