import { describe, expect, it } from "@jest/globals";
import { LineTail, forceKillPid, isPidAlive, spawnServerProcess, type SpawnedServer } from "./processControl";

function spawnNode(script: string): SpawnedServer {
  const result = spawnServerProcess(process.execPath, ["-e", script], { env: process.env });
  if (!result.success) throw new Error(result.error);
  return result.data;
}

async function waitForTail(server: SpawnedServer, expected: string): Promise<string> {
  // exit can be reported before the last stderr chunk is read
  for (let i = 0; i < 50 && server.stderrTail() !== expected; i++) {
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
  return server.stderrTail();
}

describe("LineTail", () => {
  it("keeps only the last lines", () => {
    const tail = new LineTail(2);
    expect(tail.push("one\ntwo\r\nthr")).toEqual(["one", "two"]);
    expect(tail.push("ee\nfour\n")).toEqual(["three", "four"]);
    expect(tail.toString()).toBe("three\nfour");
  });

  it("includes an unfinished last line", () => {
    const tail = new LineTail();
    tail.push("fatal: out of memory");
    expect(tail.toString()).toBe("fatal: out of memory");
  });
});

describe("spawnServerProcess", () => {
  it("captures the exit code and stderr tail", async () => {
    const server = spawnNode('process.stderr.write("loading\\nerror: bad model\\n"); process.exit(3)');
    expect(await server.waitForExit(10_000)).toBe(true);
    expect(server.hasExited()).toBe(true);
    expect(server.exitCode).toBe(3);
    expect(await waitForTail(server, "loading\nerror: bad model")).toBe("loading\nerror: bad model");
  });

  it("stops on SIGTERM", async () => {
    const server = spawnNode("setInterval(() => {}, 1000)");
    const exits: Array<NodeJS.Signals | null> = [];
    server.onExit((_code, signal) => exits.push(signal));
    expect(await server.waitForExit(50)).toBe(false);

    server.kill("SIGTERM");
    expect(await server.waitForExit(10_000)).toBe(true);
    expect(exits).toEqual(["SIGTERM"]);
    expect(isPidAlive(server.pid)).toBe(false);
  });

  it("fails for a missing executable", () => {
    const result = spawnServerProcess("/nonexistent/llama-server", [], { env: process.env });
    expect(result.success).toBe(false);
  });
});

describe("forceKillPid", () => {
  it("ignores a pid that is already gone", async () => {
    const server = spawnNode("process.exit(0)");
    await server.waitForExit(10_000);
    await expect(forceKillPid(server.pid)).resolves.toBeUndefined();
  });
});
