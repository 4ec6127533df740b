/**
 * Request matching for replaying recorded calls.
 *
 * Two requests match when they name the same method and their argument
 * mappings are structurally equal once every ignored field name has been
 * skipped, at any depth. Key order never matters. Ignored names apply to
 * the fields of the arguments only: encoded dates, bytes, maps, sets and
 * wrapped non-object messages are compared whole.
 */

import { JsonObject, JsonValue, isJsonObject, isTagged } from "./normalize.js";
import type { CallRequest } from "./request.js";
import type { CallResponse } from "./response.js";

const NOTHING_IGNORED: ReadonlySet<string> = new Set();

export type RecordingEntry = readonly [request: CallRequest, response: CallResponse];

/**
 * Structural equality of two canonical values, skipping ignored keys.
 */
export function valuesEqual(
  a: JsonValue,
  b: JsonValue,
  ignored: ReadonlySet<string> = new Set()
): boolean {
  if (a === b) return true;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => valuesEqual(item, b[i], ignored));
  }

  if (!isJsonObject(a) || !isJsonObject(b)) {
    return false;
  }

  if (isTagged(a) || isTagged(b)) {
    if (!isTagged(a) || !isTagged(b) || a.$type !== b.$type) return false;
    if (a.$type === "object" && isJsonObject(a.value) && isJsonObject(b.value)) {
      // An escaped object holds argument fields of its own.
      return fieldsEqual(a.value, b.value, ignored);
    }
    return valuesEqual(a.value, b.value, NOTHING_IGNORED);
  }

  return fieldsEqual(a, b, ignored);
}

function fieldsEqual(a: JsonObject, b: JsonObject, ignored: ReadonlySet<string>): boolean {
  const keysA = Object.keys(a).filter((key) => !ignored.has(key));
  const keysB = Object.keys(b).filter((key) => !ignored.has(key));
  if (keysA.length !== keysB.length) return false;

  for (const key of keysA) {
    if (!Object.hasOwn(b, key)) return false;
    if (!valuesEqual(a[key], b[key], ignored)) return false;
  }
  return true;
}

export function requestsEqual(
  a: CallRequest,
  b: CallRequest,
  ignored: ReadonlySet<string> = new Set()
): boolean {
  return a.method === b.method && valuesEqual(a.args, b.args, ignored);
}

/**
 * Matches incoming requests against recorded entries under a fixed set of
 * ignored field names (the global list plus the session's own).
 */
export class RequestMatcher {
  readonly ignored: ReadonlySet<string>;

  constructor(ignored: Iterable<string> = []) {
    this.ignored = new Set(ignored);
  }

  matches(a: CallRequest, b: CallRequest): boolean {
    return requestsEqual(a, b, this.ignored);
  }

  /**
   * First entry, in stored order, whose request matches. Later duplicates are
   * never reached.
   */
  match(
    request: CallRequest,
    entries: readonly RecordingEntry[]
  ): RecordingEntry | undefined {
    return entries.find(([recorded]) => this.matches(recorded, request));
  }
}
