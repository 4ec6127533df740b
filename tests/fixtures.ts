/**
 * Shared test fixtures: in-process transports, operations and cassettes.
 */
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { CallRequest } from "../src/core/request.js";
import { CallResponse } from "../src/core/response.js";
import type { RecordingEntry } from "../src/core/matcher.js";
import type { CassetteLogger } from "../src/config.js";
import type { CallOptions, UnaryCall, UnaryTransport } from "../src/transport/stub.js";
import type { Operation } from "../src/transport/operation.js";

export const ISO_DATE = "2024-01-15T10:30:00.000Z";

export const silentLogger: CassetteLogger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Transport stand-in that answers every call through `handler` and keeps the
 * calls it received.
 */
export class FakeTransport implements UnaryTransport {
  readonly calls: UnaryCall[] = [];

  constructor(private readonly handler: (call: UnaryCall) => unknown) {}

  async requestResponse(
    method: string,
    request: unknown,
    options: CallOptions = {}
  ): Promise<unknown> {
    const call = { method, request, options };
    this.calls.push(call);
    return this.handler(call);
  }
}

export class FakeOperation<T> implements Operation<T> {
  executions = 0;

  constructor(private readonly value: T) {}

  async execute(): Promise<T> {
    this.executions++;
    return this.value;
  }
}

function idOf(request: unknown): number {
  if (typeof request === "object" && request !== null && "id" in request) {
    return typeof request.id === "number" ? request.id : 0;
  }
  return 0;
}

/**
 * A user service: `Get` answers `{ id, name: "user-<id>" }`, and any call
 * made with `returnOp` answers an operation resolving to the same value.
 */
export function userService(): FakeTransport {
  return new FakeTransport((call) => {
    const id = idOf(call.request);
    const result = { id, name: `user-${id}` };
    return call.options.returnOp ? new FakeOperation(result) : result;
  });
}

export function entry(method: string, args: unknown, result: unknown): RecordingEntry {
  return [CallRequest.fromCallArgs(method, args), CallResponse.fromCallResult(method, result)];
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), "rpc-cassette-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
