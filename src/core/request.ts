/**
 * Normalized, immutable representation of one outbound call.
 */

import { JsonObject, JsonValue, encodeValue, isJsonObject, tagged } from "./normalize.js";
import { requestsEqual } from "./matcher.js";
import type { SerializedRequest } from "./format.js";

function freezeDeep<T extends JsonValue>(value: T): T {
  if (Array.isArray(value)) {
    value.forEach((item) => freezeDeep(item));
  } else if (isJsonObject(value)) {
    Object.values(value).forEach((item) => freezeDeep(item));
  }
  Object.freeze(value);
  return value;
}

export class CallRequest {
  readonly method: string;
  readonly args: JsonObject;

  private constructor(method: string, args: JsonObject) {
    this.method = method;
    this.args = freezeDeep(args);
    Object.freeze(this);
  }

  /**
   * Build a request from what the interception point saw.
   *
   * Only the request message takes part in identity; call options such as
   * deadlines and metadata differ from run to run. A message that is not an
   * object is kept in a `message` tag.
   */
  static fromCallArgs(method: string, message: unknown): CallRequest {
    const encoded = encodeValue(message);
    return new CallRequest(method, isJsonObject(encoded) ? encoded : tagged("message", encoded));
  }

  /**
   * Rebuild a stored request. The arguments are already canonical.
   */
  static fromJSON(data: SerializedRequest): CallRequest {
    return new CallRequest(data.method, data.args);
  }

  equals(other: CallRequest, ignored?: ReadonlySet<string>): boolean {
    return requestsEqual(this, other, ignored);
  }

  toJSON(): SerializedRequest {
    return { method: this.method, args: this.args };
  }

  toString(): string {
    return `${this.method}(${JSON.stringify(this.args)})`;
  }
}
