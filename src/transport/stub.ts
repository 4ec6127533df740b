/**
 * Client stub abstraction for intercepted RPC calls.
 *
 * A `ClientStub` wraps the transport that actually performs calls. Calling
 * code goes through the stub; an interceptor can be installed in front of the
 * transport and removed again, leaving the original call path untouched.
 */

import { ResultCodec, jsonCodec } from "../core/response.js";

export interface CallOptions {
  /** Ask for an operation handle instead of the final result. */
  returnOp?: boolean;
  deadline?: Date | number;
  metadata?: Record<string, string>;
}

export interface UnaryCall {
  method: string;
  request: unknown;
  options: CallOptions;
}

/**
 * The outbound-call surface of a transport.
 */
export interface UnaryTransport {
  requestResponse(method: string, request: unknown, options?: CallOptions): Promise<unknown>;
}

export type CallHandler = (call: UnaryCall) => Promise<unknown>;

export interface Interceptor {
  readonly behavior: "record" | "play";
  intercept(call: UnaryCall, stub: ClientStub, next: CallHandler): Promise<unknown>;
}

export interface ClientStubConfig {
  name?: string;
  codec?: ResultCodec;
}

let stubCounter = 0;

export class ClientStub implements UnaryTransport {
  readonly name: string;
  readonly codec: ResultCodec;
  readonly original: UnaryTransport;
  private interceptor: Interceptor | null = null;

  constructor(transport: UnaryTransport, config: ClientStubConfig = {}) {
    this.original = transport;
    this.name = config.name ?? `stub-${++stubCounter}`;
    this.codec = config.codec ?? jsonCodec;
  }

  requestResponse(method: string, request: unknown, options: CallOptions = {}): Promise<unknown> {
    const call: UnaryCall = { method, request, options };
    const next: CallHandler = (c) =>
      this.original.requestResponse(c.method, c.request, c.options);

    return this.interceptor ? this.interceptor.intercept(call, this, next) : next(call);
  }

  /**
   * Put an interceptor in front of the transport. Returns false, changing
   * nothing, when one is already installed.
   */
  install(interceptor: Interceptor): boolean {
    if (this.interceptor) {
      return false;
    }
    this.interceptor = interceptor;
    return true;
  }

  /**
   * Restore the original call path. Returns false when nothing was installed.
   */
  uninstall(): boolean {
    if (!this.interceptor) {
      return false;
    }
    this.interceptor = null;
    return true;
  }

  isIntercepted(): boolean {
    return this.interceptor !== null;
  }

  get installed(): Interceptor | null {
    return this.interceptor;
  }
}
