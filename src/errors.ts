/**
 * Error types raised by the cassette engine.
 *
 * Every failure is fatal to the current call or session; nothing here is
 * retried.
 */

import type { CallRequest } from "./core/request.js";

export class CassetteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required configuration (cassette directory, stubs) is missing or invalid. */
export class ConfigError extends CassetteError {}

/** Configuration or session change attempted while a session is bound. */
export class RunningError extends CassetteError {}

export class VersionMismatchError extends CassetteError {
  constructor(
    readonly path: string,
    readonly found: unknown,
    readonly expected: number
  ) {
    super(
      `Cassette version ${JSON.stringify(found)} not supported (expected ${expected}): ${path}`
    );
  }
}

export class NoActiveCassetteError extends CassetteError {
  constructor() {
    super("No cassette is bound to the current session");
  }
}

export class NoRecordingFoundError extends CassetteError {
  constructor(readonly request: CallRequest) {
    super(`No recording found for ${request.toString()}`);
  }
}

export class CassetteNotFoundError extends CassetteError {
  constructor(readonly path: string) {
    super(`Cassette not found: ${path}`);
  }
}

export class CorruptCassetteError extends CassetteError {
  constructor(readonly path: string, detail: string, options?: { cause?: unknown }) {
    super(`Cassette ${path} is corrupt: ${detail}`, options);
  }
}

export class CassetteIOError extends CassetteError {
  constructor(readonly path: string, action: "read" | "write" | "delete", cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${action} cassette ${path}: ${reason}`, { cause });
  }
}

/**
 * Leaving a session failed after the code run inside it had already thrown.
 * `cause` is the error from that code; `cleanupError` is the one from leaving.
 */
export class SessionCleanupError extends CassetteError {
  constructor(readonly cleanupError: unknown, bodyError: unknown) {
    const reason = cleanupError instanceof Error ? cleanupError.message : String(cleanupError);
    super(`Failed to end the cassette session after an error: ${reason}`, { cause: bodyError });
  }
}
