/**
 * Vitest integration for rpc-cassette
 *
 * Provides a fixture that runs each test inside a cassette named after it.
 */

import type { CassetteEngine, SessionOptions } from "../engine.js";
import type { SessionMode } from "../core/session.js";

export interface CassetteFixtureOptions {
  /** Derive the cassette name from the test name. */
  nameFor?: (testName: string) => string;
  session?: SessionOptions;
}

/**
 * Turn a test name into a file-safe cassette name.
 */
export function cassetteNameFor(testName: string): string {
  return testName
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Create a Vitest fixture for cassettes. The fixture value is the mode the
 * test runs in: "playing" when the cassette was recorded before,
 * "recording" otherwise.
 */
export function createCassetteFixture(
  engine: CassetteEngine,
  options: CassetteFixtureOptions = {}
) {
  const nameFor = options.nameFor ?? cassetteNameFor;

  return {
    cassette: async (
      { task }: { task: { name: string } },
      use: (mode: SessionMode) => Promise<void>
    ) => {
      const mode = await engine.insert(nameFor(task.name), options.session);
      try {
        await use(mode);
      } finally {
        await engine.eject();
      }
    },
  };
}

// Example usage in a Vitest test:
//
// import { test as base, expect } from 'vitest';
// import { createCassetteFixture } from 'rpc-cassette/vitest';
//
// const engine = new CassetteEngine({ cassetteDir: 'tests/cassettes', stubs: [stub] });
// const test = base.extend(createCassetteFixture(engine));
//
// test('fetches user 1', async ({ cassette }) => {
//   const user = await stub.requestResponse('GetUser', { id: 1 });
//   expect(user).toEqual({ id: 1, name: 'Ada' });
// });
