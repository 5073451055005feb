import { z } from "zod";

export const CaseStatusSchema = z.enum([
  "active",
  "excluded-known-failure",
  "excluded-environment-limitation",
  "excluded-flaky",
]);

export const TestCaseSchema = z.object({
  id: z.string().min(1),
  status: CaseStatusSchema.default("active"),
  rationale: z.string().min(1).optional(),
  reference: z.string().url().optional(),
}).strict().refine(
  (entry) => entry.status === "active" || entry.rationale !== undefined,
  (entry) => ({
    message: `excluded case ${entry.id} needs a rationale`,
    path: ["rationale"],
  }),
);

export const CatalogSchema = z.object({
  cases: z.array(TestCaseSchema),
}).superRefine(({ cases }, ctx) => {
  let seen = new Set<string>();
  cases.forEach(({ id }, index) => {
    if (seen.has(id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate case id ${id}`,
        path: ["cases", index, "id"],
      });
    }
    seen.add(id);
  });
});

export type CaseStatus = z.infer<typeof CaseStatusSchema>;
export type TestCase = z.infer<typeof TestCaseSchema>;

/**
 * The hand-curated, ordered list of conformance cases. Order is execution
 * order; the catalog is only ever filtered, never reordered or mutated.
 */
export interface Catalog {
  readonly source: string;
  readonly cases: readonly TestCase[];
}

export type Privilege = "sudo" | "none";

export interface RuntimeTarget {
  /** absolute path of the runtime executable under test */
  readonly path: string;
}

/**
 * Everything a run needs, resolved once at start-up and shared read-only by
 * every component.
 */
export interface ExecutionContext {
  readonly root: string;
  readonly runtime: RuntimeTarget;
  readonly selectionPattern: string;
  readonly logDirectory: string;
  readonly debugFlagsEnabled: boolean;
  readonly catalogPath: string;
  /** checkout of the validation suite; cases run with this as cwd */
  readonly suiteDirectory: string;
  /** where case ids resolve to executables */
  readonly validationDirectory: string;
  readonly goPath: string;
  readonly buildCommand: string;
  readonly privilege: Privilege;
  readonly settleDelayMs: number;
  /** unset means a case may run for as long as it likes */
  readonly caseTimeoutMs?: number;
}

export interface TapResult {
  status: "ok" | "not ok";
  number: number;
  name: string;
  directive?: string;
  metadata?: Record<string, unknown>;
}

export interface ExecutedCase {
  caseId: string;
  verdict: "pass" | "fail";
  /** null when the process was killed by a signal or never started */
  exitCode: number | null;
  signal?: string;
  timedOut: boolean;
  logPath: string;
  durationMs: number;
  /** every log line carrying the "not ok" failure marker */
  markers: string[];
  /** the failing TAP points read back from the log */
  failures: TapResult[];
}

export interface SkippedCase {
  caseId: string;
  verdict: "skipped";
  cause: string;
}

export type CaseResult = ExecutedCase | SkippedCase;
