/**
 * File-backed cassette storage.
 *
 * Each cassette lives at `<cassetteDir>/<name>.json`. Saving rewrites the
 * whole file; loading either yields the complete cassette or throws.
 */

import { promises as fs } from "fs";
import { dirname, join } from "path";
import { Cassette } from "./core/cassette.js";
import {
  CASSETTE_EXTENSION,
  CASSETTE_VERSION,
  CassetteFileSchema,
  CassetteHeaderSchema,
  describeIssues,
} from "./core/format.js";
import {
  CassetteIOError,
  ConfigError,
  CassetteNotFoundError,
  CorruptCassetteError,
  VersionMismatchError,
} from "./errors.js";

export interface LoadOptions {
  ignoredFields?: Iterable<string>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export class CassetteStore {
  /**
   * @param cassetteDir directory provider, read on every operation so the
   * store follows configuration changes
   */
  constructor(private readonly cassetteDir: () => string) {}

  static at(dir: string): CassetteStore {
    return new CassetteStore(() => dir);
  }

  get dir(): string {
    return this.cassetteDir();
  }

  /**
   * Names are plain file names: an empty name or one with a path separator
   * throws `ConfigError`.
   */
  pathFor(name: string): string {
    if (name === "" || /[\\/]/.test(name)) {
      throw new ConfigError(`invalid cassette name ${JSON.stringify(name)}`);
    }
    return join(this.dir, `${name}${CASSETTE_EXTENSION}`);
  }

  async exists(name: string): Promise<boolean> {
    const path = this.pathFor(name);
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async load(name: string, options: LoadOptions = {}): Promise<Cassette> {
    const path = this.pathFor(name);

    let content: string;
    try {
      content = await fs.readFile(path, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new CassetteNotFoundError(path);
      }
      throw new CassetteIOError(path, "read", error);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new CorruptCassetteError(path, "invalid JSON", { cause: error });
    }

    const header = CassetteHeaderSchema.safeParse(json);
    if (!header.success) {
      throw new CorruptCassetteError(path, describeIssues(header.error));
    }
    if (header.data.version !== CASSETTE_VERSION) {
      throw new VersionMismatchError(path, header.data.version, CASSETTE_VERSION);
    }

    const parsed = CassetteFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CorruptCassetteError(path, describeIssues(parsed.error));
    }

    return Cassette.fromFile(name, parsed.data, options.ignoredFields);
  }

  async save(cassette: Cassette, recordedAt: Date = new Date()): Promise<string> {
    const path = this.pathFor(cassette.name);
    const json = JSON.stringify(cassette.toFile(recordedAt), null, 2);

    try {
      await fs.mkdir(dirname(path), { recursive: true });
      await fs.writeFile(path, json + "\n", "utf-8");
    } catch (error) {
      throw new CassetteIOError(path, "write", error);
    }
    return path;
  }

  /**
   * Names of every stored cassette, sorted.
   */
  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw new CassetteIOError(this.dir, "read", error);
    }

    return files
      .filter((file) => file.endsWith(CASSETTE_EXTENSION))
      .map((file) => file.slice(0, -CASSETTE_EXTENSION.length))
      .sort();
  }

  /**
   * Delete every cassette in the directory. Returns how many were removed.
   */
  async deleteAll(): Promise<number> {
    const names = await this.list();
    for (const name of names) {
      const path = this.pathFor(name);
      try {
        await fs.unlink(path);
      } catch (error) {
        throw new CassetteIOError(path, "delete", error);
      }
    }
    return names.length;
  }
}
