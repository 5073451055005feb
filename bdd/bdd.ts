import { createTestAdapter, type TestAdapter } from "@effectionx/test-adapter";
import type { Operation } from "effection";

/**
 * The subset of a host test runner that the BDD wrapper drives.
 */
export interface TestPrimitives {
  describe: {
    (name: string, fn: () => void): void;
    skip: (name: string, fn: () => void) => void;
    only: (name: string, fn: () => void) => void;
  };
  it: {
    (name: string, fn: () => void | Promise<void>): void;
    skip: (name: string, fn: () => void) => void;
    only: (name: string, fn: () => void | Promise<void>) => void;
  };
  afterAll: (fn: () => void | Promise<void>) => void;
}

/**
 * BDD interface for Effection-based tests. Test bodies are generator
 * functions; each one runs in its own scope, torn down together with every
 * resource it created when the test finishes.
 */
export interface BDD {
  describe: {
    (name: string, body: () => void): void;
    skip: (name: string, body: () => void) => void;
    only: (name: string, body: () => void) => void;
  };
  it: {
    (desc: string, body?: () => Operation<void>): void;
    skip: (desc: string, body?: () => Operation<void>) => void;
    only: (desc: string, body: () => Operation<void>) => void;
  };
  beforeAll: (body: () => Operation<void>) => void;
  beforeEach: (body: () => Operation<void>) => void;
}

export function createBDD(primitives: TestPrimitives): BDD {
  const { describe: $describe, it: $it, afterAll: $afterAll } = primitives;

  let current: TestAdapter | undefined;

  function enter(
    name: string,
    body: () => void,
    register: (name: string, fn: () => void) => void,
  ) {
    const original = current;
    try {
      const child = current = createTestAdapter({ name, parent: original });

      register(name, () => {
        $afterAll(() => child.destroy());
        body();
      });
    } finally {
      current = original;
    }
  }

  function describe(name: string, body: () => void) {
    enter(name, body, $describe);
  }

  describe.skip = $describe.skip;
  describe.only = (name: string, body: () => void) => {
    enter(name, body, $describe.only);
  };

  function beforeAll(body: () => Operation<void>) {
    current?.addOnetimeSetup(body);
  }

  function beforeEach(body: () => Operation<void>) {
    current?.addSetup(body);
  }

  function runner(desc: string, body: () => Operation<void>) {
    const adapter = current;
    if (!adapter) {
      throw new Error(`it("${desc}") must be declared inside describe()`);
    }
    return async () => {
      const result = await adapter.runTest(body);
      if (!result.ok) {
        throw result.error;
      }
    };
  }

  function it(desc: string, body?: () => Operation<void>): void {
    if (!body) {
      $it.skip(desc, () => {});
      return;
    }
    $it(desc, runner(desc, body));
  }

  it.skip = (desc: string, _body?: () => Operation<void>) => {
    $it.skip(desc, () => {});
  };

  it.only = (desc: string, body: () => Operation<void>) => {
    $it.only(desc, runner(desc, body));
  };

  return { describe, it, beforeAll, beforeEach };
}
