/**
 * Normalized successful result of a call, and the codec that maps it to and
 * from the transport's own result type.
 */

import { JsonValue, decodeValue, encodeValue } from "./normalize.js";
import type { SerializedResponse } from "./format.js";

/**
 * Converts between a transport's native results and their stored form.
 *
 * Stubs whose results are class instances (generated message types, say)
 * supply a codec that rebuilds them in `decode`.
 */
export interface ResultCodec {
  encode(method: string, result: unknown): JsonValue;
  decode(method: string, value: JsonValue): unknown;
}

export const jsonCodec: ResultCodec = {
  encode: (_method, result) => encodeValue(result),
  decode: (_method, value) => decodeValue(value),
};

export class CallResponse {
  readonly result: JsonValue;

  private constructor(result: JsonValue) {
    this.result = result;
    Object.freeze(this);
  }

  static fromCallResult(
    method: string,
    result: unknown,
    codec: ResultCodec = jsonCodec
  ): CallResponse {
    return new CallResponse(codec.encode(method, result));
  }

  static fromJSON(data: SerializedResponse): CallResponse {
    return new CallResponse(data.result);
  }

  toCallResult(method: string, codec: ResultCodec = jsonCodec): unknown {
    return codec.decode(method, this.result);
  }

  toJSON(): SerializedResponse {
    return { result: this.result };
  }
}
