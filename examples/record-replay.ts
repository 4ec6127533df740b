/**
 * Example: record calls against a service once, then replay them offline
 *
 * This example demonstrates:
 * 1. Wrapping a transport in a ClientStub
 * 2. Recording a cassette with CassetteEngine
 * 3. Replaying it with the transport unreachable
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CassetteEngine, ClientStub } from "../src/index.js";
import type { UnaryTransport } from "../src/index.js";

// An in-process stand-in for a generated client's transport.
class InventoryTransport implements UnaryTransport {
  online = true;

  async requestResponse(method: string, request: unknown): Promise<unknown> {
    if (!this.online) {
      throw new Error("inventory service unreachable");
    }
    return { method, request, stock: 42, checkedAt: new Date() };
  }
}

async function recordReplayExample() {
  const dir = await mkdtemp(join(tmpdir(), "rpc-cassette-example-"));
  const transport = new InventoryTransport();
  const stub = new ClientStub(transport, { name: "inventory" });
  const engine = new CassetteEngine({ cassetteDir: dir, stubs: [stub], ignore: ["traceId"] });

  try {
    const live = await engine.withCassette("stock-levels", () =>
      stub.requestResponse("GetStock", { sku: "A-100", traceId: "first" })
    );
    console.log("Recorded:", live);

    transport.online = false;
    const replayed = await engine.withCassette("stock-levels", () =>
      stub.requestResponse("GetStock", { sku: "A-100", traceId: "second" })
    );
    console.log("Replayed:", replayed);
    console.log(`Cassettes in ${dir}:`, await engine.store.list());
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

recordReplayExample().catch((error) => {
  console.error("Error:", error);
  process.exit(1);
});
