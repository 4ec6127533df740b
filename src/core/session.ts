/**
 * Session management for the cassette lifecycle.
 *
 * Manages state transitions: idle → recording → idle, idle → playing → idle
 */

import type { Cassette } from "./cassette.js";
import { RunningError } from "../errors.js";

export type SessionMode = "idle" | "recording" | "playing";

/**
 * Tracks the current mode and the cassette bound to it.
 */
export class SessionManager {
  private state: SessionMode = "idle";
  private cassette: Cassette | null = null;

  /**
   * Bind a cassette for recording.
   */
  startRecording(cassette: Cassette): void {
    this.start("recording", cassette);
  }

  /**
   * Bind a loaded cassette for playback.
   */
  startPlaying(cassette: Cassette): void {
    this.start("playing", cassette);
  }

  /**
   * Unbind the cassette and return to idle.
   */
  stop(expected: Exclude<SessionMode, "idle">): Cassette {
    if (this.state !== expected || !this.cassette) {
      throw new RunningError(`No ${expected} session in progress`);
    }

    const completed = this.cassette;
    this.cassette = null;
    this.state = "idle";
    return completed;
  }

  get mode(): SessionMode {
    return this.state;
  }

  isIdle(): boolean {
    return this.state === "idle";
  }

  /**
   * Get the bound cassette (if any).
   */
  getCurrentCassette(): Cassette | null {
    return this.cassette;
  }

  private start(mode: Exclude<SessionMode, "idle">, cassette: Cassette): void {
    if (this.state !== "idle") {
      throw new RunningError(`Cannot start ${mode}: ${this.state} already in progress`);
    }

    this.cassette = cassette;
    this.state = mode;
  }
}
