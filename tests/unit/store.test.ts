/**
 * Tests for CassetteStore: file-backed persistence.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import { join } from "path";
import { CassetteStore } from "../../src/store.js";
import { Cassette } from "../../src/core/cassette.js";
import { CassetteConfig } from "../../src/config.js";
import {
  CassetteNotFoundError,
  ConfigError,
  CorruptCassetteError,
  VersionMismatchError,
} from "../../src/errors.js";
import { ISO_DATE, entry, makeTempDir, removeDir } from "../fixtures.js";

let dir: string;
let store: CassetteStore;

beforeEach(async () => {
  dir = await makeTempDir();
  store = CassetteStore.at(dir);
});

afterEach(async () => {
  await removeDir(dir);
});

function sampleCassette(name = "users"): Cassette {
  return new Cassette(name, { entries: [entry("Get", { id: 1 }, { id: 1, name: "user-1" })] });
}

async function writeRaw(name: string, content: unknown): Promise<void> {
  const text = typeof content === "string" ? content : JSON.stringify(content);
  await fs.writeFile(join(dir, `${name}.json`), text, "utf-8");
}

describe("CassetteStore", () => {
  it("derives the path from the name", () => {
    expect(store.pathFor("users")).toBe(join(dir, "users.json"));
  });

  it("rejects names that are not plain file names", async () => {
    expect(() => store.pathFor("suite/case")).toThrow(ConfigError);
    expect(() => store.pathFor("suite\\case")).toThrow('invalid cassette name "suite\\\\case"');
    expect(() => store.pathFor("")).toThrow(ConfigError);
    await expect(store.save(sampleCassette("suite/case"))).rejects.toBeInstanceOf(ConfigError);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("reports existence", async () => {
    expect(await store.exists("users")).toBe(false);
    await store.save(sampleCassette());
    expect(await store.exists("users")).toBe(true);
  });

  it("writes the whole document", async () => {
    await store.save(sampleCassette(), new Date(ISO_DATE));

    const written = JSON.parse(await fs.readFile(join(dir, "users.json"), "utf-8"));
    expect(written).toEqual({
      version: 2,
      recorded_at: ISO_DATE,
      reqs: [[{ method: "Get", args: { id: 1 } }, { result: { id: 1, name: "user-1" } }]],
    });
  });

  it("rewrites instead of appending", async () => {
    await store.save(sampleCassette());
    await store.save(new Cassette("users"));

    const loaded = await store.load("users");
    expect(loaded.size).toBe(0);
  });

  it("creates missing directories", async () => {
    const nested = CassetteStore.at(join(dir, "a", "b"));
    await nested.save(sampleCassette());
    expect(await nested.exists("users")).toBe(true);
  });

  it("loads what it saved", async () => {
    await store.save(sampleCassette(), new Date(ISO_DATE));

    const loaded = await store.load("users");
    expect(loaded.name).toBe("users");
    expect(loaded.recordedAt).toBe(ISO_DATE);
    expect(loaded.entries.map(([req, resp]) => [req.toJSON(), resp.toJSON()])).toEqual([
      [{ method: "Get", args: { id: 1 } }, { result: { id: 1, name: "user-1" } }],
    ]);
  });

  it("rejects other versions", async () => {
    await writeRaw("old", {
      version: 1,
      recorded_at: ISO_DATE,
      reqs: [[{ method: "Get", args: { id: 1 } }, { result: {} }]],
    });

    const error = await store.load("old").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(VersionMismatchError);
    if (error instanceof VersionMismatchError) {
      expect(error.found).toBe(1);
      expect(error.expected).toBe(2);
    }
  });

  it("rejects a document without a version", async () => {
    await writeRaw("unversioned", { reqs: [] });
    await expect(store.load("unversioned")).rejects.toBeInstanceOf(VersionMismatchError);
  });

  it("fails for a missing cassette", async () => {
    await expect(store.load("missing")).rejects.toBeInstanceOf(CassetteNotFoundError);
  });

  it("fails for invalid JSON", async () => {
    await writeRaw("broken", "{ not json");
    await expect(store.load("broken")).rejects.toBeInstanceOf(CorruptCassetteError);
  });

  it("fails for a malformed entry", async () => {
    await writeRaw("malformed", { version: 2, recorded_at: ISO_DATE, reqs: [["nope"]] });
    await expect(store.load("malformed")).rejects.toBeInstanceOf(CorruptCassetteError);
  });

  it("lists cassettes by name", async () => {
    await store.save(sampleCassette("b"));
    await store.save(sampleCassette("a"));
    await fs.writeFile(join(dir, "notes.txt"), "", "utf-8");

    expect(await store.list()).toEqual(["a", "b"]);
  });

  it("lists nothing for a missing directory", async () => {
    expect(await CassetteStore.at(join(dir, "none")).list()).toEqual([]);
  });

  it("deletes every cassette and nothing else", async () => {
    await store.save(sampleCassette("a"));
    await store.save(sampleCassette("b"));
    await fs.writeFile(join(dir, "notes.txt"), "", "utf-8");

    expect(await store.deleteAll()).toBe(2);
    expect(await fs.readdir(dir)).toEqual(["notes.txt"]);
  });

  it("surfaces a missing directory configuration", async () => {
    const config = new CassetteConfig();
    const unconfigured = new CassetteStore(() => config.cassetteDir);
    await expect(unconfigured.exists("users")).rejects.toBeInstanceOf(ConfigError);
  });
});
