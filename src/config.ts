/**
 * Engine configuration: where cassettes live, which stubs to intercept and
 * which request fields never take part in matching.
 *
 * Configuration is locked while a session is bound.
 */

import { z } from "zod";
import { ConfigError, RunningError } from "./errors.js";
import { describeIssues } from "./core/format.js";
import type { ClientStub } from "./transport/stub.js";

export interface CassetteLogger {
  debug(message: string): void;
  warn(message: string): void;
}

export function createConsoleLogger(debug = false): CassetteLogger {
  return {
    debug: (message) => {
      if (debug) console.debug(`[rpc-cassette] ${message}`);
    },
    warn: (message) => console.warn(`[rpc-cassette] ${message}`),
  };
}

export const CassetteConfigOptionsSchema = z.object({
  cassetteDir: z.string().min(1).optional(),
  ignore: z.array(z.string().min(1)).default([]),
  debug: z.boolean().default(false),
});

export interface CassetteConfigOptions {
  cassetteDir?: string;
  stubs?: ClientStub[];
  ignore?: string[];
  debug?: boolean;
  logger?: CassetteLogger;
}

export class CassetteConfig {
  readonly logger: CassetteLogger;
  private dir: string | undefined;
  private readonly stubSet = new Set<ClientStub>();
  private readonly ignored = new Set<string>();
  private running = false;

  constructor(options: CassetteConfigOptions = {}) {
    const parsed = CassetteConfigOptionsSchema.safeParse({
      cassetteDir: options.cassetteDir,
      ignore: options.ignore,
      debug: options.debug,
    });
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
    }

    this.dir = parsed.data.cassetteDir;
    this.logger = options.logger ?? createConsoleLogger(parsed.data.debug);
    for (const field of parsed.data.ignore) this.ignored.add(field);
    for (const stub of options.stubs ?? []) this.stubSet.add(stub);
  }

  /**
   * Build a configuration from `RPC_CASSETTE_DIR`, `RPC_CASSETTE_IGNORE`
   * (comma-separated) and `RPC_CASSETTE_DEBUG`, with explicit options on top.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: CassetteConfigOptions = {}
  ): CassetteConfig {
    const ignore = (env.RPC_CASSETTE_IGNORE ?? "")
      .split(",")
      .map((field) => field.trim())
      .filter((field) => field.length > 0);

    return new CassetteConfig({
      cassetteDir: env.RPC_CASSETTE_DIR || undefined,
      ignore,
      debug: env.RPC_CASSETTE_DEBUG === "1" || env.RPC_CASSETTE_DEBUG === "true",
      ...overrides,
    });
  }

  get cassetteDir(): string {
    if (!this.dir) {
      throw new ConfigError("no cassette dir configured");
    }
    return this.dir;
  }

  set cassetteDir(path: string) {
    this.assertNotRunning();
    if (!path) {
      throw new ConfigError("cassette dir must not be empty");
    }
    this.dir = path;
  }

  get stubs(): ClientStub[] {
    if (this.stubSet.size === 0) {
      throw new ConfigError("no stubs configured");
    }
    return [...this.stubSet];
  }

  addStub(stub: ClientStub): void {
    this.assertNotRunning();
    this.stubSet.add(stub);
  }

  resetStubs(): void {
    this.assertNotRunning();
    this.stubSet.clear();
  }

  /**
   * Skip these field names when matching requests.
   */
  ignore(...fields: string[]): void {
    this.assertNotRunning();
    for (const field of fields) this.ignored.add(field);
  }

  get ignoredFields(): ReadonlySet<string> {
    return this.ignored;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Lock or unlock the configuration; the engine calls this when binding and
   * unbinding a session.
   */
  setRunning(running: boolean): void {
    this.running = running;
  }

  private assertNotRunning(): void {
    if (this.running) {
      throw new RunningError("cannot configure while a cassette session is active");
    }
  }
}
