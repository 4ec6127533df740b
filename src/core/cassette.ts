/**
 * In-memory cassette: the ordered (request, response) pairs of one named
 * recording.
 */

import { CallRequest } from "./request.js";
import { CallResponse } from "./response.js";
import { RecordingEntry, RequestMatcher } from "./matcher.js";
import { CassetteFile, SerializedEntry, createCassetteFile } from "./format.js";

export interface CassetteOptions {
  /** Field names skipped when matching: the global list plus the session's. */
  ignoredFields?: Iterable<string>;
  entries?: readonly RecordingEntry[];
  recordedAt?: string;
}

export class Cassette {
  readonly name: string;
  readonly matcher: RequestMatcher;
  readonly recordedAt: string | null;
  private readonly reqs: RecordingEntry[];

  constructor(name: string, options: CassetteOptions = {}) {
    this.name = name;
    this.matcher = new RequestMatcher(options.ignoredFields);
    this.recordedAt = options.recordedAt ?? null;
    this.reqs = [...(options.entries ?? [])];
  }

  /**
   * Rebuild a cassette from a validated document. Throws on the first entry
   * that cannot be deserialized, leaving nothing half-loaded.
   */
  static fromFile(
    name: string,
    file: CassetteFile,
    ignoredFields?: Iterable<string>
  ): Cassette {
    const entries = file.reqs.map(
      ([req, resp]): RecordingEntry => [CallRequest.fromJSON(req), CallResponse.fromJSON(resp)]
    );
    return new Cassette(name, { ignoredFields, entries, recordedAt: file.recorded_at });
  }

  get entries(): readonly RecordingEntry[] {
    return this.reqs;
  }

  get size(): number {
    return this.reqs.length;
  }

  find(request: CallRequest): RecordingEntry | undefined {
    return this.matcher.match(request, this.reqs);
  }

  has(request: CallRequest): boolean {
    return this.find(request) !== undefined;
  }

  append(request: CallRequest, response: CallResponse): void {
    this.reqs.push([request, response]);
  }

  /**
   * Append the pair unless an equal request is already recorded. The first
   * recorded pairing wins. Returns whether the pair was appended.
   */
  record(request: CallRequest, response: CallResponse): boolean {
    if (this.has(request)) {
      return false;
    }
    this.append(request, response);
    return true;
  }

  toFile(recordedAt: Date = new Date()): CassetteFile {
    return createCassetteFile(
      this.reqs.map(([req, resp]): SerializedEntry => [req.toJSON(), resp.toJSON()]),
      recordedAt
    );
  }
}
