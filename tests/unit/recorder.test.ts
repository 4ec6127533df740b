/**
 * Tests for RecordingInterceptor: forwarding, recording, dedup and deferred
 * operations.
 */
import { describe, it, expect } from "vitest";
import { RecordingInterceptor } from "../../src/recorder.js";
import { Cassette } from "../../src/core/cassette.js";
import { ClientStub } from "../../src/transport/stub.js";
import { DeferredOperation } from "../../src/transport/operation.js";
import { CassetteError, NoActiveCassetteError } from "../../src/errors.js";
import { FakeOperation, FakeTransport, silentLogger, userService } from "../fixtures.js";

function recordingStub(cassette: Cassette | null, transport = userService()) {
  const stub = new ClientStub(transport);
  stub.install(new RecordingInterceptor({ cassette: () => cassette, logger: silentLogger }));
  return { stub, transport };
}

function storedEntries(cassette: Cassette) {
  return cassette.entries.map(([req, resp]) => [req.toJSON(), resp.toJSON()]);
}

describe("RecordingInterceptor", () => {
  it("fails without an active cassette and makes no call", async () => {
    const { stub, transport } = recordingStub(null);

    await expect(stub.requestResponse("Get", { id: 1 })).rejects.toBeInstanceOf(
      NoActiveCassetteError
    );
    expect(transport.calls).toHaveLength(0);
  });

  it("forwards the call and records the pair", async () => {
    const cassette = new Cassette("users");
    const { stub, transport } = recordingStub(cassette);

    const result = await stub.requestResponse("Get", { id: 1 });

    expect(result).toEqual({ id: 1, name: "user-1" });
    expect(transport.calls).toHaveLength(1);
    expect(storedEntries(cassette)).toEqual([
      [{ method: "Get", args: { id: 1 } }, { result: { id: 1, name: "user-1" } }],
    ]);
  });

  it("returns the real result object unchanged", async () => {
    const real = { id: 7, createdAt: new Date("2024-01-15T10:30:00.000Z") };
    const cassette = new Cassette("users");
    const { stub } = recordingStub(cassette, new FakeTransport(() => real));

    expect(await stub.requestResponse("Get", { id: 7 })).toBe(real);
  });

  it("records a repeated call once but makes every live call", async () => {
    let counter = 0;
    const cassette = new Cassette("users");
    const { stub, transport } = recordingStub(
      cassette,
      new FakeTransport(() => ({ count: ++counter }))
    );

    const results: unknown[] = [];
    for (let i = 0; i < 3; i++) {
      results.push(await stub.requestResponse("Count", { id: 1 }));
    }

    expect(results).toEqual([{ count: 1 }, { count: 2 }, { count: 3 }]);
    expect(transport.calls).toHaveLength(3);
    expect(cassette.size).toBe(1);
    expect(cassette.entries[0][1].result).toEqual({ count: 1 });
  });

  it("records concurrent identical calls once", async () => {
    const cassette = new Cassette("users");
    const { stub, transport } = recordingStub(cassette);

    await Promise.all([
      stub.requestResponse("Get", { id: 1 }),
      stub.requestResponse("Get", { id: 1 }),
      stub.requestResponse("Get", { id: 1 }),
    ]);

    expect(transport.calls).toHaveLength(3);
    expect(cassette.size).toBe(1);
  });

  it("dedups calls that differ only in ignored fields", async () => {
    const cassette = new Cassette("users", { ignoredFields: ["requestId"] });
    const { stub } = recordingStub(cassette);

    await stub.requestResponse("Get", { id: 1, requestId: "a" });
    await stub.requestResponse("Get", { id: 1, requestId: "b" });

    expect(cassette.size).toBe(1);
    expect(cassette.entries[0][0].args).toEqual({ id: 1, requestId: "a" });
  });

  it("keeps calls with different dates apart when value is ignored", async () => {
    const cassette = new Cassette("users", { ignoredFields: ["value"] });
    const { stub } = recordingStub(cassette);

    await stub.requestResponse("At", { at: new Date("2020-01-01T00:00:00.000Z") });
    await stub.requestResponse("At", { at: new Date("2030-01-01T00:00:00.000Z") });

    expect(cassette.size).toBe(2);
  });

  it("propagates transport errors and records nothing", async () => {
    const cassette = new Cassette("users");
    const { stub } = recordingStub(
      cassette,
      new FakeTransport(() => {
        throw new Error("unavailable");
      })
    );

    await expect(stub.requestResponse("Get", { id: 1 })).rejects.toThrow("unavailable");
    expect(cassette.size).toBe(0);
  });

  describe("deferred operations", () => {
    it("resolves the operation eagerly and records its value", async () => {
      const operation = new FakeOperation({ id: 1, state: "done" });
      const cassette = new Cassette("ops");
      const { stub } = recordingStub(cassette, new FakeTransport(() => operation));

      const handle = await stub.requestResponse("Export", { id: 1 }, { returnOp: true });

      expect(handle).toBeInstanceOf(DeferredOperation);
      expect(operation.executions).toBe(1);
      expect(storedEntries(cassette)).toEqual([
        [{ method: "Export", args: { id: 1 } }, { result: { id: 1, state: "done" } }],
      ]);

      if (!(handle instanceof DeferredOperation)) throw new Error("expected a handle");
      expect(handle.kind).toBe("resolved");
      expect(handle.original).toBe(operation);
      expect(await handle.execute()).toEqual({ id: 1, state: "done" });
      expect(operation.executions).toBe(1);
    });

    it("hands back a pending handle when the call is already recorded", async () => {
      const cassette = new Cassette("ops");
      const first = new FakeOperation("first");
      const second = new FakeOperation("second");
      const operations = [first, second];
      const { stub } = recordingStub(cassette, new FakeTransport(() => operations.shift()));

      await stub.requestResponse("Export", { id: 1 }, { returnOp: true });
      const handle = await stub.requestResponse("Export", { id: 1 }, { returnOp: true });

      if (!(handle instanceof DeferredOperation)) throw new Error("expected a handle");
      expect(handle.kind).toBe("pending");
      expect(second.executions).toBe(0);
      expect(await handle.execute()).toBe("second");
      expect(cassette.size).toBe(1);
      expect(cassette.entries[0][1].result).toBe("first");
    });

    it("rejects a returnOp call that yields no operation", async () => {
      const cassette = new Cassette("ops");
      const { stub } = recordingStub(cassette);

      await expect(
        stub.requestResponse("Get", { id: 1 }, { returnOp: false })
      ).resolves.toEqual({ id: 1, name: "user-1" });

      const plain = recordingStub(cassette, new FakeTransport(() => ({ id: 1 })));
      await expect(
        plain.stub.requestResponse("Export", { id: 1 }, { returnOp: true })
      ).rejects.toBeInstanceOf(CassetteError);
    });
  });
});
