import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { PortAllocator } from "./portAllocator";
import { ServerOrchestrator, type ServerOrchestratorOptions } from "./serverOrchestrator";
import { ServerStateStore } from "./serverStateStore";
import { createFakeSpawner, stubBackendResolver, type FakeSpawner } from "./testUtils";
import type { ServerInstance } from "./types";

const PORT_START = 38_100;
const PORT_END = 38_200;

function orphan(modelId: string, pid: number): ServerInstance {
  return {
    modelId,
    modelPath: `/models/${modelId}.gguf`,
    host: "127.0.0.1",
    port: 8080,
    pid,
    status: "running",
    backendId: "cpu",
    startedAt: "2026-01-01T00:00:00.000Z",
    contextSize: 4096,
    gpuLayers: 0,
    lastHealthyAt: 0,
  };
}

describe("ServerOrchestrator", () => {
  let tempDir: string;
  let modelPath: string;
  let executable: string;
  let stateStore: ServerStateStore;
  let ports: PortAllocator;
  let fake: FakeSpawner;
  let killPid: jest.Mock<(pid: number) => Promise<void>>;
  let orchestrator: ServerOrchestrator;

  const create = (overrides: Partial<ServerOrchestratorOptions> = {}) =>
    new ServerOrchestrator({
      backends: stubBackendResolver(executable),
      stateStore,
      ports,
      spawner: fake.spawner,
      killPid,
      startupTimeoutMs: 3_000,
      healthPollIntervalMs: 20,
      probeTimeoutMs: 500,
      stopGraceMs: 200,
      ...overrides,
    });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "orchestrator-test-"));
    modelPath = path.join(tempDir, "m1.gguf");
    await fs.writeFile(modelPath, "GGUF");
    executable = path.join(tempDir, "bin", "llama-server");
    stateStore = new ServerStateStore(path.join(tempDir, "server_state.json"));
    ports = new PortAllocator({ rangeStart: PORT_START, rangeEnd: PORT_END });
    fake = createFakeSpawner();
    killPid = jest.fn((_pid: number) => Promise.resolve());
    orchestrator = create();
    await orchestrator.initialize();
  });

  afterEach(async () => {
    await orchestrator.stopAll();
    await fake.closeAll();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("initialize", () => {
    it("kills every persisted pid once and clears the table", async () => {
      await stateStore.write({ servers: { a: orphan("a", 101), b: orphan("b", 102), c: orphan("c", 103) } });
      const fresh = create();

      expect(await fresh.initialize()).toBe(3);
      expect(killPid.mock.calls.map(([pid]) => pid)).toEqual([101, 102, 103]);
      expect(await stateStore.read()).toEqual({ servers: {} });
      expect(await fresh.initialize()).toBe(0);
      expect(killPid).toHaveBeenCalledTimes(3);
    });

    it("keeps going when a kill fails", async () => {
      await stateStore.write({ servers: { a: orphan("a", 101), b: orphan("b", 102) } });
      killPid.mockImplementationOnce(() => Promise.reject(new Error("EPERM")));
      expect(await create().initialize()).toBe(2);
      expect(await stateStore.read()).toEqual({ servers: {} });
    });

    it("must run before start", () => {
      expect(() => create().start("m1", modelPath)).toThrow("initialize() must run before start()");
    });
  });

  describe("start", () => {
    it("spawns, waits for health, registers and persists", async () => {
      const started: ServerInstance[] = [];
      orchestrator.on("server-started", (instance: ServerInstance) => started.push(instance));

      const result = await orchestrator.start("m1", modelPath, { contextSize: 2048, gpuLayers: 0 });

      expect(result.success).toBe(true);
      if (!result.success) return;
      const instance = result.data;
      expect(instance).toMatchObject({
        modelId: "m1",
        modelPath,
        host: "127.0.0.1",
        status: "running",
        backendId: "cpu",
        contextSize: 2048,
        gpuLayers: 0,
        pid: fake.processes[0].pid,
      });
      expect(instance.port).toBeGreaterThanOrEqual(PORT_START);
      expect(instance.port).toBeLessThan(PORT_END);

      expect(fake.calls).toHaveLength(1);
      const call = fake.calls[0];
      expect(call.command).toBe(executable);
      expect(call.cwd).toBe(path.dirname(executable));
      expect(call.env.TEST_BACKEND).toBe("cpu");
      expect(call.args.slice(0, 10)).toEqual([
        "--model",
        modelPath,
        "--host",
        "127.0.0.1",
        "--port",
        String(instance.port),
        "--ctx-size",
        "2048",
        "--n-gpu-layers",
        "0",
      ]);

      expect((await stateStore.read()).servers).toEqual({ m1: instance });
      expect(started).toEqual([instance]);
      expect(orchestrator.isRunning("m1")).toBe(true);
    });

    it("returns the existing server on a second start", async () => {
      const first = await orchestrator.start("m1", modelPath);
      const second = await orchestrator.start("m1", modelPath);
      expect(fake.calls).toHaveLength(1);
      expect(second).toEqual(first);
    });

    it("spawns once for concurrent starts of the same model", async () => {
      const results = await Promise.all([
        orchestrator.start("m1", modelPath),
        orchestrator.start("m1", modelPath),
        orchestrator.start("m1", modelPath),
      ]);
      expect(fake.calls).toHaveLength(1);
      const pids = results.map((r) => (r.success ? r.data.pid : -1));
      expect(new Set(pids).size).toBe(1);
      expect(pids[0]).toBe(fake.processes[0].pid);
    });

    it("gives different models different ports", async () => {
      const a = await orchestrator.start("a", modelPath);
      const b = await orchestrator.start("b", modelPath);
      if (!a.success || !b.success) throw new Error("start failed");
      expect(a.data.port).not.toBe(b.data.port);
      expect(ports.usedPorts()).toEqual([a.data.port, b.data.port].sort((x, y) => x - y));
      expect((await orchestrator.listRunning()).map((s) => s.modelId).sort()).toEqual(["a", "b"]);
    });

    it("fails with a configuration error when no backend is installed", async () => {
      const bare = create({ backends: stubBackendResolver(null) });
      await bare.initialize();
      const result = await bare.start("m1", modelPath);
      expect(result).toEqual({
        success: false,
        error: {
          kind: "configuration",
          message: "No llama-server executable for the active backend; install a backend first",
        },
      });
      expect(fake.calls).toHaveLength(0);
    });

    it("fails with a configuration error when the model file is missing", async () => {
      const missing = path.join(tempDir, "missing.gguf");
      const result = await orchestrator.start("m1", missing);
      expect(result).toEqual({
        success: false,
        error: { kind: "configuration", message: `Model file not found: ${missing}` },
      });
    });

    it("rejects an invalid config before spawning", async () => {
      const result = await orchestrator.start("m1", modelPath, { batchSize: 0 });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("configuration");
      expect(fake.calls).toHaveLength(0);
      expect(ports.usedPorts()).toEqual([]);
    });

    it("reports a process that exits during startup with its stderr", async () => {
      fake.nextBehavior = "exit-immediately";
      const result = await orchestrator.start("m1", modelPath);
      expect(result).toEqual({
        success: false,
        error: {
          kind: "spawn",
          message: "Server for m1 exited with code 1 before becoming healthy",
          exitCode: 1,
          stderrTail: "error: model load failed",
        },
      });
      expect(ports.usedPorts()).toEqual([]);
      expect(orchestrator.isRunning("m1")).toBe(false);
    });

    it("kills a server that never becomes healthy", async () => {
      const impatient = create({ startupTimeoutMs: 300 });
      await impatient.initialize();
      fake.nextBehavior = "never-healthy";

      const result = await impatient.start("m1", modelPath);

      expect(result).toEqual({
        success: false,
        error: {
          kind: "startup_timeout",
          message: "Server for m1 did not become healthy within 300ms",
          timeoutMs: 300,
          stderrTail: "",
        },
      });
      expect(fake.processes[0].signals).toEqual(["SIGKILL"]);
      expect(ports.usedPorts()).toEqual([]);
    });
  });

  describe("stop", () => {
    it("terminates, frees the port and drops the entry", async () => {
      const started = await orchestrator.start("m1", modelPath);
      if (!started.success) throw new Error(started.error.message);
      const stopped: string[] = [];
      orchestrator.on("server-stopped", (modelId: string) => stopped.push(modelId));

      expect(await orchestrator.stop("m1")).toEqual({ success: true, data: undefined });

      expect(fake.processes[0].signals).toEqual(["SIGTERM"]);
      expect(ports.isUsed(started.data.port)).toBe(false);
      expect(orchestrator.isRunning("m1")).toBe(false);
      expect(await stateStore.read()).toEqual({ servers: {} });
      expect(stopped).toEqual(["m1"]);
    });

    it("escalates to SIGKILL when SIGTERM is ignored", async () => {
      fake.nextBehavior = "ignore-sigterm";
      await orchestrator.start("m1", modelPath);
      await orchestrator.stop("m1");
      expect(fake.processes[0].signals).toEqual(["SIGTERM", "SIGKILL"]);
      expect(orchestrator.isRunning("m1")).toBe(false);
    });

    it("reports not_running for an unknown model", async () => {
      expect(await orchestrator.stop("nope")).toEqual({
        success: false,
        error: { kind: "not_running", message: "No server running for model nope", modelId: "nope" },
      });
    });

    it("stopAll stops every server", async () => {
      await orchestrator.start("a", modelPath);
      await orchestrator.start("b", modelPath);
      await orchestrator.stopAll();
      expect(orchestrator.isRunning("a")).toBe(false);
      expect(orchestrator.isRunning("b")).toBe(false);
      expect(ports.usedPorts()).toEqual([]);
    });
  });

  describe("health", () => {
    it("evicts a server that crashes", async () => {
      const started = await orchestrator.start("m1", modelPath);
      if (!started.success) throw new Error(started.error.message);
      const crashed: Array<number | null> = [];
      orchestrator.on("server-crashed", (_modelId: string, code: number | null) => crashed.push(code));
      const evicted = new Promise<string>((resolve) =>
        orchestrator.once("server-evicted", (_modelId: string, reason: string) => resolve(reason))
      );

      fake.processes[0].crash(139);

      expect(await evicted).toBe("process exited with code 139");
      expect(crashed).toEqual([139]);
      expect(orchestrator.isRunning("m1")).toBe(false);
      expect(ports.isUsed(started.data.port)).toBe(false);
      expect(await stateStore.read()).toEqual({ servers: {} });
      expect(await orchestrator.getServer("m1")).toBeNull();
    });

    it("trusts a fresh entry and rechecks health on a stale one", async () => {
      let clock = 1_000_000;
      const clocked = create({ stalenessMs: 5_000, now: () => clock });
      await clocked.initialize();
      await clocked.start("m1", modelPath);
      fake.processes[0].server?.setHealthStatus(503);

      clock += 4_999;
      expect((await clocked.getServer("m1"))?.modelId).toBe("m1");

      clock += 1;
      expect(await clocked.getServer("m1")).toBeNull();
      expect(clocked.isRunning("m1")).toBe(false);
    });

    it("checks health on every use with zero staleness", async () => {
      const eager = create({ stalenessMs: 0, now: () => 42 });
      await eager.initialize();
      await eager.start("m1", modelPath);
      expect((await eager.getServer("m1"))?.modelId).toBe("m1");

      fake.processes[0].server?.setHealthStatus(503);
      expect(await eager.getServer("m1")).toBeNull();
      expect(eager.isRunning("m1")).toBe(false);
    });

    it("does not release the port twice when a server is evicted while stopping", async () => {
      let clock = 0;
      const clocked = create({ stalenessMs: 1_000, now: () => clock });
      await clocked.initialize();
      fake.nextBehavior = "ignore-sigterm";
      const started = await clocked.start("m1", modelPath);
      if (!started.success) throw new Error(started.error.message);
      const release = jest.spyOn(ports, "release");

      fake.processes[0].server?.setHealthStatus(503);
      clock = 5_000;
      const stopping = clocked.stop("m1");
      await new Promise<void>((resolve) => setTimeout(resolve, 20));
      expect(await clocked.getServer("m1")).toBeNull();

      expect((await stopping).success).toBe(true);
      expect(release).toHaveBeenCalledTimes(1);
      expect(release).toHaveBeenCalledWith(started.data.port);
      expect(fake.processes[0].signals).toEqual(["SIGTERM", "SIGKILL"]);
    });

    it("replaces an unhealthy server on start", async () => {
      await orchestrator.start("m1", modelPath);
      fake.processes[0].server?.setHealthStatus(503);

      const restarted = await orchestrator.start("m1", modelPath);

      expect(restarted.success).toBe(true);
      expect(fake.calls).toHaveLength(2);
      expect(fake.processes[0].signals).toEqual(["SIGKILL"]);
      expect(restarted.success && restarted.data.pid).toBe(fake.processes[1].pid);
    });
  });

  describe("HTTP surface", () => {
    it("proxies requests to the model's server", async () => {
      await orchestrator.start("m1", modelPath);

      const chat = await orchestrator.chatCompletion("m1", { messages: [{ role: "user", content: "hi" }] });
      expect(chat.success && chat.data.choices[0].message.content).toBe("reply to hi");

      const stream = await orchestrator.completionStream("m1", { prompt: "x y" });
      if (!stream.success) throw new Error(stream.error.message);
      let text = "";
      for await (const chunk of stream.data) text += chunk.choices[0]?.text ?? "";
      expect(text).toBe("echo x y");

      expect(await orchestrator.tokenizeCount("m1", "a b c d")).toEqual({
        success: true,
        data: { count: 4, estimated: false },
      });
      expect(await orchestrator.health("m1")).toEqual({ success: true, data: { status: "ok" } });
      expect(await orchestrator.info("m1")).toEqual({ success: true, data: { build: "fake" } });
      const metrics = await orchestrator.metrics("m1");
      expect(metrics.success && metrics.data).toBe("llamacpp:requests_processing 0\n");
      const models = await orchestrator.listModels("m1");
      expect(models.success && models.data.object).toBe("list");
      const embeddings = await orchestrator.embeddings("m1", "hello");
      expect(embeddings.success && embeddings.data.data[0].embedding).toEqual([0.25, 0.5, 0.75]);
    });

    it("returns not_running for a model without a server", async () => {
      const result = await orchestrator.completion("ghost", { prompt: "hi" });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("not_running");
    });
  });
});
