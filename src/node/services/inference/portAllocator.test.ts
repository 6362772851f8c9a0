import { describe, expect, it } from "@jest/globals";
import * as net from "net";
import { PortAllocator, bindTestPort } from "./portAllocator";

describe("PortAllocator", () => {
  it("returns the first port whose availability check passes", async () => {
    const probed: number[] = [];
    const ports = new PortAllocator({
      rangeStart: 9000,
      rangeEnd: 9010,
      probe: (port) => {
        probed.push(port);
        return Promise.resolve(port >= 9002);
      },
    });

    const result = await ports.allocate("127.0.0.1");
    expect(result).toEqual({ success: true, data: 9002 });
    expect(probed).toEqual([9000, 9001, 9002]);
    expect(ports.usedPorts()).toEqual([9002]);
  });

  it("never hands out the same port twice, even concurrently", async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9010, probe: () => Promise.resolve(true) });
    const results = await Promise.all(Array.from({ length: 5 }, () => ports.allocate("127.0.0.1")));
    const allocated = results.map((r) => (r.success ? r.data : -1));
    expect(allocated).toEqual([9000, 9001, 9002, 9003, 9004]);
  });

  it("reuses a released port", async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9002, probe: () => Promise.resolve(true) });
    await ports.allocate("127.0.0.1");
    await ports.allocate("127.0.0.1");
    ports.release(9000);
    expect(ports.isUsed(9000)).toBe(false);
    expect(await ports.allocate("127.0.0.1")).toEqual({ success: true, data: 9000 });
  });

  it("skips reserved ports", async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9005, probe: () => Promise.resolve(true) });
    ports.reserve(9000);
    expect(await ports.allocate("127.0.0.1")).toEqual({ success: true, data: 9001 });
  });

  it("reports exhaustion with the range", async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9003, probe: () => Promise.resolve(false) });
    expect(await ports.allocate("127.0.0.1")).toEqual({
      success: false,
      error: {
        kind: "port_exhausted",
        message: "No free port in range 9000-9002",
        rangeStart: 9000,
        rangeEnd: 9003,
      },
    });
  });
});

describe("bindTestPort", () => {
  it("fails for a port that is already bound", async () => {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("no port");
    try {
      expect(await bindTestPort(address.port, "127.0.0.1")).toBe(false);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    expect(await bindTestPort(address.port, "127.0.0.1")).toBe(true);
  });
});
