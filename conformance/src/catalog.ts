import { fileURLToPath } from "node:url";
import { type Operation } from "effection";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { CatalogError } from "./errors.ts";
import { readTextFile } from "./fs.ts";
import { type Catalog, CatalogSchema, type TestCase } from "./types.ts";

export const defaultCatalogPath: string = fileURLToPath(
  new URL("../catalog.yaml", import.meta.url),
);

/**
 * Parse and validate the YAML text of a catalog. `source` names the text in
 * error messages.
 */
export function parseCatalog(text: string, source: string): Catalog {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new CatalogError(error.message, source, { cause: error });
    }
    throw error;
  }

  let parsed = CatalogSchema.safeParse(document);
  if (!parsed.success) {
    let issues = parsed.error.issues.map((issue) =>
      `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new CatalogError(issues.join("; "), source);
  }

  return {
    source,
    cases: Object.freeze(parsed.data.cases.map((entry) => Object.freeze(entry))),
  };
}

export function* loadCatalog(
  catalogPath: string = defaultCatalogPath,
): Operation<Catalog> {
  let text: string;
  try {
    text = yield* readTextFile(catalogPath);
  } catch (error) {
    let message = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`cannot read catalog: ${message}`, catalogPath, {
      cause: error,
    });
  }
  return parseCatalog(text, catalogPath);
}

export function isActive(testCase: TestCase): boolean {
  return testCase.status === "active";
}

export function activeCases(catalog: Catalog): TestCase[] {
  return catalog.cases.filter(isActive);
}

export function excludedCases(catalog: Catalog): TestCase[] {
  return catalog.cases.filter((testCase) => !isActive(testCase));
}
