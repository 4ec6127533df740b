/**
 * Cassette engine: session control over the configured client stubs.
 *
 * Entering a session binds one cassette and installs the matching interceptor
 * on every configured stub; leaving it removes exactly what was installed and,
 * for recordings, persists the cassette.
 */

import { Cassette } from "./core/cassette.js";
import { SessionManager, SessionMode } from "./core/session.js";
import { CassetteConfig, CassetteConfigOptions } from "./config.js";
import { CassetteStore } from "./store.js";
import { RecordingInterceptor } from "./recorder.js";
import { PlaybackInterceptor } from "./replayer.js";
import { RunningError, SessionCleanupError } from "./errors.js";
import type { ClientStub, Interceptor } from "./transport/stub.js";

export interface SessionOptions {
  /** Extra field names to skip when matching, for this session only. */
  ignore?: string[];
}

type ActiveMode = Exclude<SessionMode, "idle">;

export class CassetteEngine {
  readonly config: CassetteConfig;
  readonly store: CassetteStore;
  private readonly session = new SessionManager();
  private readonly recorder: RecordingInterceptor;
  private readonly replayer: PlaybackInterceptor;
  private installed: ClientStub[] = [];
  private transition: string | null = null;

  constructor(config: CassetteConfig | CassetteConfigOptions = {}) {
    this.config = config instanceof CassetteConfig ? config : new CassetteConfig(config);
    this.store = new CassetteStore(() => this.config.cassetteDir);

    const interceptorConfig = {
      cassette: () => this.session.getCurrentCassette(),
      logger: this.config.logger,
    };
    this.recorder = new RecordingInterceptor(interceptorConfig);
    this.replayer = new PlaybackInterceptor(interceptorConfig);
  }

  get mode(): SessionMode {
    return this.session.mode;
  }

  get cassette(): Cassette | null {
    return this.session.getCurrentCassette();
  }

  /**
   * Start recording into a new cassette named `name`. Entering the recording
   * that is already active is a no-op. Resolves to whether a session started.
   */
  async enterRecording(name: string, options: SessionOptions = {}): Promise<boolean> {
    if (this.isActive("recording", name)) return false;

    await this.guarded(`enter recording ${name}`, async () => {
      this.assertIdle("recording", name);
      const stubs = this.config.stubs;
      const cassette = new Cassette(name, { ignoredFields: this.ignoredFor(options) });
      this.bind("recording", cassette, stubs, this.recorder);
    });
    return true;
  }

  /**
   * Stop recording and persist the cassette. The session ends even when the
   * save fails; the save error is re-thrown.
   */
  async exitRecording(): Promise<void> {
    if (this.session.isIdle()) return;

    await this.guarded("exit recording", async () => {
      const cassette = this.unbind("recording");
      const path = await this.store.save(cassette);
      this.config.logger.debug(`saved ${cassette.size} recorded call(s) to ${path}`);
    });
  }

  /**
   * Load the cassette named `name` and start answering calls from it. A load
   * failure leaves the engine idle.
   */
  async enterPlaying(name: string, options: SessionOptions = {}): Promise<boolean> {
    if (this.isActive("playing", name)) return false;

    await this.guarded(`enter playing ${name}`, async () => {
      this.assertIdle("playing", name);
      const stubs = this.config.stubs;
      const cassette = await this.store.load(name, { ignoredFields: this.ignoredFor(options) });
      this.bind("playing", cassette, stubs, this.replayer);
    });
    return true;
  }

  async exitPlaying(): Promise<void> {
    if (this.session.isIdle()) return;

    await this.guarded("exit playing", async () => {
      this.unbind("playing");
    });
  }

  /**
   * Play `name` if it was recorded before, otherwise record it.
   */
  async insert(name: string, options: SessionOptions = {}): Promise<SessionMode> {
    await this.start(name, options);
    return this.mode;
  }

  /**
   * Leave whichever session is active.
   */
  async eject(): Promise<void> {
    switch (this.session.mode) {
      case "recording":
        return this.exitRecording();
      case "playing":
        return this.exitPlaying();
      case "idle":
        return;
    }
  }

  /**
   * Run `body` inside the cassette named `name`: playing when it exists,
   * recording otherwise. The session always ends, even when `body` throws;
   * if ending it then fails too, a `SessionCleanupError` carries both errors.
   */
  async withCassette<T>(
    name: string,
    body: () => T | Promise<T>,
    options: SessionOptions = {}
  ): Promise<T> {
    const started = await this.start(name, options);
    let result: T;
    try {
      result = await body();
    } catch (error) {
      if (started) await this.ejectAfter(error);
      throw error;
    }
    if (started) await this.eject();
    return result;
  }

  /**
   * Remove every persisted cassette. Resolves to the number removed.
   */
  async deleteAllCassettes(): Promise<number> {
    const removed = await this.store.deleteAll();
    this.config.logger.debug(`deleted ${removed} cassette(s) from ${this.store.dir}`);
    return removed;
  }

  private async ejectAfter(bodyError: unknown): Promise<void> {
    try {
      await this.eject();
    } catch (error) {
      throw new SessionCleanupError(error, bodyError);
    }
  }

  private async start(name: string, options: SessionOptions): Promise<boolean> {
    if (await this.store.exists(name)) {
      return this.enterPlaying(name, options);
    }
    return this.enterRecording(name, options);
  }

  private isActive(mode: ActiveMode, name: string): boolean {
    return this.session.mode === mode && this.session.getCurrentCassette()?.name === name;
  }

  private assertIdle(mode: ActiveMode, name: string): void {
    if (!this.session.isIdle()) {
      const current = this.session.getCurrentCassette()?.name ?? "";
      throw new RunningError(
        `cannot start ${mode} ${name}: ${this.session.mode} ${current} is active`
      );
    }
  }

  private ignoredFor(options: SessionOptions): string[] {
    return [...this.config.ignoredFields, ...(options.ignore ?? [])];
  }

  private bind(
    mode: ActiveMode,
    cassette: Cassette,
    stubs: ClientStub[],
    interceptor: Interceptor
  ): void {
    if (mode === "recording") {
      this.session.startRecording(cassette);
    } else {
      this.session.startPlaying(cassette);
    }
    this.config.setRunning(true);

    for (const stub of stubs) {
      if (stub.install(interceptor)) {
        this.installed.push(stub);
      } else {
        this.config.logger.debug(`${stub.name} is already intercepted, leaving it as is`);
      }
    }
    this.config.logger.debug(`${mode} ${cassette.name} on ${this.installed.length} stub(s)`);
  }

  private unbind(mode: ActiveMode): Cassette {
    if (this.session.mode !== mode) {
      throw new RunningError(`cannot exit ${mode}: ${this.session.mode} is active`);
    }

    for (const stub of this.installed) {
      stub.uninstall();
    }
    this.installed = [];
    this.config.setRunning(false);
    return this.session.stop(mode);
  }

  /**
   * Run one session transition at a time.
   */
  private async guarded(label: string, transition: () => Promise<void>): Promise<void> {
    if (this.transition) {
      throw new RunningError(`cannot ${label} while ${this.transition} is in progress`);
    }

    this.transition = label;
    try {
      await transition();
    } finally {
      this.transition = null;
    }
  }
}
