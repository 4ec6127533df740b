/**
 * Cassette diff: compare two recordings of the same suite.
 *
 * Identifies added, removed, and modified entries between cassettes. Entries
 * are paired by request equality; a baseline entry with no counterpart would
 * make playback fail, so removals are breaking.
 */

import type { Cassette } from "./core/cassette.js";
import type { RecordingEntry } from "./core/matcher.js";
import type { JsonValue } from "./core/normalize.js";
import type { CassetteStore } from "./store.js";

export interface DiffChange {
  type: "added" | "removed" | "modified";
  method: string;
  baseline?: RecordingEntry;
  current?: RecordingEntry;
  details?: string;
  breaking: boolean;
}

export interface DiffResult {
  added: DiffChange[];
  removed: DiffChange[];
  modified: DiffChange[];
  breaking_changes: DiffChange[];
  summary: {
    total_changes: number;
    breaking_count: number;
    added_count: number;
    removed_count: number;
    modified_count: number;
  };
}

/**
 * Compare two cassettes and identify changes.
 */
export class CassetteDiff {
  /**
   * Compare two cassettes. Requests are paired with the baseline's ignore
   * rules.
   */
  static compare(baseline: Cassette, current: Cassette): DiffResult {
    const added: DiffChange[] = [];
    const removed: DiffChange[] = [];
    const modified: DiffChange[] = [];
    const breaking: DiffChange[] = [];
    const matcher = baseline.matcher;

    for (const entry of current.entries) {
      const [request, response] = entry;
      const counterpart = matcher.match(request, baseline.entries);

      if (!counterpart) {
        added.push({ type: "added", method: request.method, current: entry, breaking: false });
        continue;
      }

      const responseDiff = this.deepDiff(counterpart[1].result, response.result);
      if (responseDiff.length > 0) {
        const change: DiffChange = {
          type: "modified",
          method: request.method,
          baseline: counterpart,
          current: entry,
          details: responseDiff.join(", "),
          breaking: this.isBreakingChange(counterpart[1].result, response.result),
        };
        modified.push(change);
        if (change.breaking) {
          breaking.push(change);
        }
      }
    }

    for (const entry of baseline.entries) {
      if (!matcher.match(entry[0], current.entries)) {
        const change: DiffChange = {
          type: "removed",
          method: entry[0].method,
          baseline: entry,
          breaking: true,
        };
        removed.push(change);
        breaking.push(change);
      }
    }

    return {
      added,
      removed,
      modified,
      breaking_changes: breaking,
      summary: {
        total_changes: added.length + removed.length + modified.length,
        breaking_count: breaking.length,
        added_count: added.length,
        removed_count: removed.length,
        modified_count: modified.length,
      },
    };
  }

  /**
   * Load two stored cassettes and compare them.
   */
  static async compareStored(
    store: CassetteStore,
    baselineName: string,
    currentName: string,
    ignoredFields?: Iterable<string>
  ): Promise<DiffResult> {
    const [baseline, current] = await Promise.all([
      store.load(baselineName, { ignoredFields }),
      store.load(currentName, { ignoredFields }),
    ]);

    return this.compare(baseline, current);
  }

  private static deepDiff(a: JsonValue, b: JsonValue): string[] {
    const diffs: string[] = [];

    if (typeof a !== typeof b) {
      diffs.push(`Type changed: ${typeof a} → ${typeof b}`);
      return diffs;
    }

    if (a === null || b === null) {
      if (a !== b) {
        diffs.push(`Value changed: ${JSON.stringify(a)} → ${JSON.stringify(b)}`);
      }
      return diffs;
    }

    if (typeof a === "object" && typeof b === "object") {
      const aFields = new Map<string, JsonValue>(Object.entries(a));
      const bFields = new Map<string, JsonValue>(Object.entries(b));

      for (const key of aFields.keys()) {
        if (!bFields.has(key)) {
          diffs.push(`Key removed: ${key}`);
        }
      }

      for (const [key, bValue] of bFields) {
        const aValue = aFields.get(key);
        if (aValue === undefined) {
          diffs.push(`Key added: ${key}`);
        } else {
          for (const diff of this.deepDiff(aValue, bValue)) {
            diffs.push(`${key}.${diff}`);
          }
        }
      }
    } else if (a !== b) {
      diffs.push(`Value changed: ${JSON.stringify(a)} → ${JSON.stringify(b)}`);
    }

    return diffs;
  }

  /**
   * A result that lost top-level fields or changed shape breaks callers that
   * read them.
   */
  private static isBreakingChange(baseline: JsonValue, current: JsonValue): boolean {
    if (typeof baseline !== typeof current) {
      return true;
    }
    if (
      typeof baseline === "object" &&
      baseline !== null &&
      typeof current === "object" &&
      current !== null
    ) {
      const currentKeys = new Set(Object.keys(current));
      return Object.keys(baseline).some((key) => !currentKeys.has(key));
    }
    return false;
  }
}
