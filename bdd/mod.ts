import { after, describe as $describe, it as $it } from "node:test";
import { createBDD } from "./bdd.ts";

export type { BDD, TestPrimitives } from "./bdd.ts";
export { createBDD } from "./bdd.ts";

export const { describe, it, beforeAll, beforeEach } = createBDD({
  describe: $describe,
  it: $it,
  afterAll: after,
});

export { captureError } from "./capture-error.ts";
