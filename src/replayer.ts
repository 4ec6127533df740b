/**
 * Playback interceptor: answers calls from a recorded cassette.
 *
 * No call reaches the transport. A request with no recorded match is a hard
 * failure.
 */

import { CallRequest } from "./core/request.js";
import type { Cassette } from "./core/cassette.js";
import { NoActiveCassetteError, NoRecordingFoundError } from "./errors.js";
import type { InterceptorConfig } from "./recorder.js";
import type { ClientStub, Interceptor, UnaryCall } from "./transport/stub.js";
import { DeferredOperation } from "./transport/operation.js";

export class PlaybackInterceptor implements Interceptor {
  readonly behavior = "play";
  private readonly config: InterceptorConfig;

  constructor(config: InterceptorConfig) {
    this.config = config;
  }

  async intercept(call: UnaryCall, stub: ClientStub): Promise<unknown> {
    const cassette: Cassette | null = this.config.cassette();
    if (!cassette) {
      throw new NoActiveCassetteError();
    }

    const request = CallRequest.fromCallArgs(call.method, call.request);
    const entry = cassette.find(request);
    if (!entry) {
      throw new NoRecordingFoundError(request);
    }

    const [, response] = entry;
    const value = response.toCallResult(call.method, stub.codec);

    if (call.options.returnOp === true) {
      return DeferredOperation.resolved(value);
    }
    return value;
  }
}
