import { type Operation } from "effection";

import { exists } from "./fs.ts";
import type { TestCase } from "./types.ts";

/**
 * A host requirement for every case whose id matches `pattern`: the file
 * `requires` must be present, otherwise the case is skipped with `cause`.
 */
export interface CapabilityRule {
  name: string;
  pattern: RegExp;
  requires: string;
  cause: string;
}

/**
 * Snapshot of the host files the capability rules asked about.
 */
export interface HostCapabilities {
  readonly present: ReadonlySet<string>;
}

export type Eligibility =
  | { eligible: true }
  | { eligible: false; rule: string; cause: string };

export const MEMSW_LIMIT_FILE =
  "/sys/fs/cgroup/memory/memory.memsw.limit_in_bytes";

export const defaultCapabilityRules: readonly CapabilityRule[] = [
  {
    name: "memory-swap-accounting",
    pattern: /(memory|hugetlb)\.t$/,
    requires: MEMSW_LIMIT_FILE,
    cause: `the host has no cgroup v1 memory-swap accounting (${MEMSW_LIMIT_FILE})`,
  },
];

/**
 * Look up every file the rules require, once per run.
 */
export function* probeHost(
  rules: readonly CapabilityRule[] = defaultCapabilityRules,
): Operation<HostCapabilities> {
  let present = new Set<string>();
  for (let requirement of new Set(rules.map((rule) => rule.requires))) {
    if (yield* exists(requirement)) {
      present.add(requirement);
    }
  }
  return { present };
}

export function eligible(
  testCase: TestCase,
  host: HostCapabilities,
  rules: readonly CapabilityRule[] = defaultCapabilityRules,
): Eligibility {
  for (let rule of rules) {
    if (rule.pattern.test(testCase.id) && !host.present.has(rule.requires)) {
      return { eligible: false, rule: rule.name, cause: rule.cause };
    }
  }
  return { eligible: true };
}
