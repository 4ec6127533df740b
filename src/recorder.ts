/**
 * Recording interceptor: forwards calls and records them.
 *
 * Recording is transparent: the caller always receives the real result. Each
 * logical request is recorded once; repeats still reach the live service but
 * leave the cassette unchanged.
 */

import { CallRequest } from "./core/request.js";
import { CallResponse } from "./core/response.js";
import type { Cassette } from "./core/cassette.js";
import type { CassetteLogger } from "./config.js";
import { CassetteError, NoActiveCassetteError } from "./errors.js";
import type { CallHandler, ClientStub, Interceptor, UnaryCall } from "./transport/stub.js";
import { DeferredOperation, isOperation } from "./transport/operation.js";

export interface InterceptorConfig {
  /** Returns the cassette bound to the current session, if any. */
  cassette: () => Cassette | null;
  logger?: CassetteLogger;
}

export class RecordingInterceptor implements Interceptor {
  readonly behavior = "record";
  private readonly config: InterceptorConfig;

  constructor(config: InterceptorConfig) {
    this.config = config;
  }

  async intercept(call: UnaryCall, stub: ClientStub, next: CallHandler): Promise<unknown> {
    if (!this.config.cassette()) {
      throw new NoActiveCassetteError();
    }

    const result = await next(call);
    const request = CallRequest.fromCallArgs(call.method, call.request);

    if (call.options.returnOp === true) {
      return this.recordOperation(request, result, stub);
    }

    this.store(request, CallResponse.fromCallResult(call.method, result, stub.codec));
    return result;
  }

  /**
   * Resolve a deferred call while recording so the cassette holds its final
   * value. The caller still gets a handle; its `execute()` returns the value
   * that was recorded.
   */
  private async recordOperation(
    request: CallRequest,
    result: unknown,
    stub: ClientStub
  ): Promise<DeferredOperation> {
    if (!isOperation(result)) {
      throw new CassetteError(
        `Expected an operation handle from ${request.method} called with returnOp`
      );
    }

    if (this.isRecorded(request)) {
      return DeferredOperation.pending(result);
    }

    const value = await result.execute();
    this.store(request, CallResponse.fromCallResult(request.method, value, stub.codec));
    return DeferredOperation.resolved(value, result);
  }

  private isRecorded(request: CallRequest): boolean {
    return this.activeCassette().has(request);
  }

  private store(request: CallRequest, response: CallResponse): void {
    if (!this.activeCassette().record(request, response)) {
      this.config.logger?.debug(`already recorded ${request.method}, keeping first response`);
    }
  }

  private activeCassette(): Cassette {
    const cassette = this.config.cassette();
    if (!cassette) {
      throw new NoActiveCassetteError();
    }
    return cassette;
  }
}
