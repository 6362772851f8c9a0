/**
 * ServerOrchestrator: one native inference server per model.
 *
 * Per model the lifecycle is NONE → STARTING → RUNNING, then either
 * STOPPING → NONE (stop) or DEAD → NONE (crash / failed probe, i.e. eviction).
 * Start and stop of the same model are serialized end to end by a per-model
 * lock, so two concurrent starts yield one process.
 *
 * The table of live servers is persisted after every change. On the next
 * launch `initialize()` force-kills whatever the table still lists, since a
 * server whose owner died is an orphan holding GPU memory and a port.
 */

import { EventEmitter } from "events";
import * as fsp from "fs/promises";
import * as path from "path";
import { log } from "@/node/services/log";
import { MutexMap } from "@/node/utils/concurrency/mutexMap";
import { assert, getErrorMessage } from "@/common/utils/errors";
import { Err, Ok, type Result } from "@/common/types/result";
import type { BackendCatalog } from "./backendCatalog";
import { configurationFailure, notRunningFailure, type InferenceFailure } from "./errors";
import { LlamaServerClient, REQUEST_TIMEOUTS } from "./llamaServerClient";
import { PortAllocator } from "./portAllocator";
import {
  forceKillPid,
  spawnServerProcess,
  type PidKiller,
  type ProcessSpawner,
  type SpawnedServer,
} from "./processControl";
import {
  DEFAULT_HOST,
  buildServerArgs,
  redactServerArgs,
  resolveServerConfig,
  type ServerConfigInput,
} from "./serverArgs";
import type { ServerStateStore } from "./serverStateStore";
import type {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
  CompletionChunk,
  CompletionRequest,
  CompletionResponse,
  EmbeddingResponse,
  ModelListResponse,
  ServerHealthResponse,
  ServerInfoResponse,
  ServerInstance,
  TokenCount,
  TokenizeResponse,
} from "./types";

export const DEFAULT_STARTUP_TIMEOUT_MS = 60_000;
export const DEFAULT_HEALTH_POLL_INTERVAL_MS = 500;
export const DEFAULT_STOP_GRACE_MS = 10_000;
export const DEFAULT_STALENESS_MS = 30_000;
/** Wait after SIGKILL before falling back to kill-by-pid. */
const FORCE_KILL_WAIT_MS = 5_000;

/** Server settings a caller may choose; model path and port are the orchestrator's. */
export type ServerLaunchOptions = Omit<ServerConfigInput, "modelPath" | "port">;

/** The parts of BackendCatalog the orchestrator needs. */
export type ServerBackendResolver = Pick<
  BackendCatalog,
  "getActive" | "getBackend" | "getServerExecutable" | "buildLaunchEnv"
>;

export interface ServerOrchestratorEvents {
  "server-started": [instance: ServerInstance];
  "server-stopped": [modelId: string];
  "server-evicted": [modelId: string, reason: string];
  "server-crashed": [modelId: string, exitCode: number | null];
}

export interface ServerOrchestratorOptions {
  backends: ServerBackendResolver;
  stateStore: ServerStateStore;
  ports?: PortAllocator;
  spawner?: ProcessSpawner;
  killPid?: PidKiller;
  host?: string;
  startupTimeoutMs?: number;
  healthPollIntervalMs?: number;
  probeTimeoutMs?: number;
  stopGraceMs?: number;
  /** An entry whose last success is this old gets re-probed before use. */
  stalenessMs?: number;
  /** Clock for health bookkeeping. */
  now?: () => number;
}

interface ManagedServer {
  instance: ServerInstance;
  process: SpawnedServer;
  client: LlamaServerClient;
  /** Set once stop or eviction began, so the exit handler stays quiet. */
  stopping: boolean;
}

type OrchestratorResult<T> = Result<T, InferenceFailure>;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function pathExists(p: string): Promise<boolean> {
  try {
    await fsp.access(p);
    return true;
  } catch {
    return false;
  }
}

export class ServerOrchestrator extends EventEmitter {
  private readonly servers = new Map<string, ManagedServer>();
  private readonly lifecycleLocks = new MutexMap<string>();
  private readonly backends: ServerBackendResolver;
  private readonly stateStore: ServerStateStore;
  private readonly ports: PortAllocator;
  private readonly spawner: ProcessSpawner;
  private readonly killPid: PidKiller;
  private readonly host: string;
  private readonly startupTimeoutMs: number;
  private readonly healthPollIntervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly stopGraceMs: number;
  private readonly stalenessMs: number;
  private readonly now: () => number;
  private initialized = false;

  constructor(options: ServerOrchestratorOptions) {
    super();
    this.setMaxListeners(100);
    this.backends = options.backends;
    this.stateStore = options.stateStore;
    this.ports = options.ports ?? new PortAllocator();
    this.spawner = options.spawner ?? spawnServerProcess;
    this.killPid = options.killPid ?? forceKillPid;
    this.host = options.host ?? DEFAULT_HOST;
    this.startupTimeoutMs = options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.healthPollIntervalMs = options.healthPollIntervalMs ?? DEFAULT_HEALTH_POLL_INTERVAL_MS;
    this.probeTimeoutMs = options.probeTimeoutMs ?? REQUEST_TIMEOUTS.probe;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.stalenessMs = options.stalenessMs ?? DEFAULT_STALENESS_MS;
    this.now = options.now ?? (() => Date.now());
  }

  // ─── Recovery ────────────────────────────────────────────────────────

  /**
   * Kill every server the persisted table still lists, then clear it.
   * Returns the number of kill attempts (one per entry).
   */
  async initialize(): Promise<number> {
    if (this.initialized) return 0;

    const state = await this.stateStore.read();
    const orphans = Object.values(state.servers);
    let attempts = 0;
    for (const orphan of orphans) {
      attempts++;
      log.info(`[inference/servers] killing orphaned server for ${orphan.modelId} (pid ${orphan.pid})`);
      try {
        await this.killPid(orphan.pid);
      } catch (error) {
        log.warn(`[inference/servers] could not kill pid ${orphan.pid}: ${getErrorMessage(error)}`);
      }
    }

    await this.stateStore.clear();
    this.initialized = true;
    if (attempts > 0) {
      log.info(`[inference/servers] cleaned up ${attempts} orphaned server(s)`);
    }
    return attempts;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  /**
   * Start (or return) the server for a model.
   */
  start(
    modelId: string,
    modelPath: string,
    options: ServerLaunchOptions = {},
    backendId?: string
  ): Promise<OrchestratorResult<ServerInstance>> {
    assert(this.initialized, "ServerOrchestrator.initialize() must run before start()");
    return this.lifecycleLocks.withLock(modelId, () =>
      this.startLocked(modelId, modelPath, options, backendId)
    );
  }

  private async startLocked(
    modelId: string,
    modelPath: string,
    options: ServerLaunchOptions,
    backendId?: string
  ): Promise<OrchestratorResult<ServerInstance>> {
    const existing = this.servers.get(modelId);
    if (existing) {
      if (!existing.process.hasExited() && (await existing.client.probe(this.probeTimeoutMs))) {
        this.markHealthy(existing);
        return Ok(existing.instance);
      }
      await this.evict(modelId, existing, "failed health probe on start");
    }

    const backend = backendId
      ? await this.backends.getBackend(backendId)
      : await this.backends.getActive();
    const executable = await this.backends.getServerExecutable(backendId);
    if (!backend || !executable) {
      const which = backendId ?? "active";
      return Err(
        configurationFailure(`No llama-server executable for the ${which} backend; install a backend first`)
      );
    }

    if (!(await pathExists(modelPath))) {
      return Err(configurationFailure(`Model file not found: ${modelPath}`));
    }

    const host = options.host ?? this.host;
    const config = resolveServerConfig({ ...options, host, modelPath });
    if (!config.success) {
      return Err(configurationFailure(config.error));
    }

    const port = await this.ports.allocate(host);
    if (!port.success) return port;

    const args = buildServerArgs({ ...config.data, port: port.data });
    log.info(
      `[inference/servers] starting ${modelId} on ${host}:${port.data}: ${executable} ${redactServerArgs(args).join(" ")}`
    );

    const spawned = this.spawner(executable, args, {
      env: this.backends.buildLaunchEnv(backend),
      cwd: path.dirname(executable),
    });
    if (!spawned.success) {
      this.ports.release(port.data);
      return Err({ kind: "spawn", message: spawned.error, exitCode: null, stderrTail: "" });
    }

    const proc = spawned.data;
    const client = new LlamaServerClient(`http://${host}:${port.data}`, config.data.apiKey);
    const ready = await this.waitForHealthy(modelId, proc, client);
    if (!ready.success) {
      this.ports.release(port.data);
      return ready;
    }

    const now = this.now();
    const managed: ManagedServer = {
      instance: {
        modelId,
        modelPath,
        host,
        port: port.data,
        pid: proc.pid,
        status: "running",
        backendId: backend.id,
        startedAt: new Date(now).toISOString(),
        contextSize: config.data.contextSize,
        gpuLayers: config.data.gpuLayers,
        lastHealthyAt: now,
      },
      process: proc,
      client,
      stopping: false,
    };
    this.servers.set(modelId, managed);
    proc.onExit((code) => this.handleExit(modelId, managed, code));

    await this.persist();
    log.info(`[inference/servers] ${modelId} ready at ${client.baseUrl} (pid ${proc.pid})`);
    this.emit("server-started", managed.instance);
    return Ok(managed.instance);
  }

  private async waitForHealthy(
    modelId: string,
    proc: SpawnedServer,
    client: LlamaServerClient
  ): Promise<OrchestratorResult<void>> {
    const deadline = Date.now() + this.startupTimeoutMs;

    while (Date.now() < deadline) {
      if (proc.hasExited()) {
        return Err({
          kind: "spawn",
          message: `Server for ${modelId} exited with code ${proc.exitCode ?? "null"} before becoming healthy`,
          exitCode: proc.exitCode,
          stderrTail: proc.stderrTail(),
        });
      }
      if (await client.probe(this.probeTimeoutMs)) {
        return Ok(undefined);
      }
      await sleep(this.healthPollIntervalMs);
    }

    log.warn(`[inference/servers] ${modelId} not healthy after ${this.startupTimeoutMs}ms, killing`);
    proc.kill("SIGKILL");
    await proc.waitForExit(FORCE_KILL_WAIT_MS);
    return Err({
      kind: "startup_timeout",
      message: `Server for ${modelId} did not become healthy within ${this.startupTimeoutMs}ms`,
      timeoutMs: this.startupTimeoutMs,
      stderrTail: proc.stderrTail(),
    });
  }

  /**
   * Stop a model's server. The port and table entry are released even when
   * the process had already gone.
   */
  stop(modelId: string): Promise<OrchestratorResult<void>> {
    return this.lifecycleLocks.withLock(modelId, async () => {
      const managed = this.servers.get(modelId);
      if (!managed) {
        return Err(notRunningFailure(modelId));
      }

      managed.stopping = true;
      managed.instance.status = "stopped";
      await this.terminate(managed);

      // An eviction while terminating has already released the entry, and
      // its port may belong to another server by now
      if (this.servers.get(modelId) === managed) {
        this.ports.release(managed.instance.port);
        this.servers.delete(modelId);
        await this.persist();
      }
      log.info(`[inference/servers] stopped ${modelId}`);
      this.emit("server-stopped", modelId);
      return Ok(undefined);
    });
  }

  private async terminate(managed: ManagedServer): Promise<void> {
    const proc = managed.process;
    if (proc.hasExited()) return;

    proc.kill("SIGTERM");
    if (await proc.waitForExit(this.stopGraceMs)) return;

    log.warn(`[inference/servers] ${managed.instance.modelId} ignored SIGTERM, sending SIGKILL`);
    proc.kill("SIGKILL");
    if (await proc.waitForExit(FORCE_KILL_WAIT_MS)) return;

    try {
      await this.killPid(proc.pid);
    } catch (error) {
      log.warn(`[inference/servers] kill-by-pid ${proc.pid} failed: ${getErrorMessage(error)}`);
    }
  }

  async stopAll(): Promise<void> {
    const results = await Promise.all([...this.servers.keys()].map((modelId) => this.stop(modelId)));
    for (const result of results) {
      if (!result.success) {
        log.debug(`[inference/servers] stopAll: ${result.error.message}`);
      }
    }
  }

  // ─── Health ──────────────────────────────────────────────────────────

  private markHealthy(managed: ManagedServer): void {
    managed.instance.status = "running";
    managed.instance.lastHealthyAt = this.now();
  }

  private handleExit(modelId: string, managed: ManagedServer, code: number | null): void {
    if (managed.stopping || this.servers.get(modelId) !== managed) return;

    log.warn(`[inference/servers] server for ${modelId} exited unexpectedly (code ${code ?? "null"})`);
    managed.instance.status = "unhealthy";
    this.emit("server-crashed", modelId, code);
    this.evict(modelId, managed, `process exited with code ${code ?? "null"}`).catch((error: unknown) => {
      log.error(`[inference/servers] evicting ${modelId} failed:`, error);
    });
  }

  /**
   * Drop a dead or unresponsive server: force kill, free the port, persist.
   * No-op when the entry was already replaced or removed.
   */
  private async evict(modelId: string, managed: ManagedServer, reason: string): Promise<void> {
    if (this.servers.get(modelId) !== managed) return;

    managed.stopping = true;
    managed.instance.status = "stopped";
    this.servers.delete(modelId);
    managed.process.kill("SIGKILL");
    this.ports.release(managed.instance.port);
    await this.persist();

    log.warn(`[inference/servers] evicted ${modelId}: ${reason}`);
    this.emit("server-evicted", modelId, reason);
  }

  private async liveEntry(modelId: string): Promise<ManagedServer | null> {
    const managed = this.servers.get(modelId);
    if (!managed) return null;

    if (managed.process.hasExited()) {
      await this.evict(modelId, managed, "process is no longer running");
      return null;
    }
    if (this.now() - managed.instance.lastHealthyAt < this.stalenessMs) {
      return managed;
    }

    if (await managed.client.probe(this.probeTimeoutMs)) {
      this.markHealthy(managed);
      return managed;
    }
    await this.evict(modelId, managed, "failed health probe");
    return null;
  }

  /**
   * The model's server, re-probed first when its last success is stale.
   * Null when none is running (an unhealthy one is evicted on the way).
   */
  async getServer(modelId: string): Promise<ServerInstance | null> {
    return (await this.liveEntry(modelId))?.instance ?? null;
  }

  /** Probe every server now; the ones that fail are evicted silently. */
  async listRunning(): Promise<ServerInstance[]> {
    const entries = [...this.servers.entries()];
    const alive = await Promise.all(
      entries.map(async ([modelId, managed]) => {
        if (!managed.process.hasExited() && (await managed.client.probe(this.probeTimeoutMs))) {
          this.markHealthy(managed);
          return managed.instance;
        }
        await this.evict(modelId, managed, "failed health probe");
        return null;
      })
    );
    return alive.filter((instance): instance is ServerInstance => instance !== null);
  }

  isRunning(modelId: string): boolean {
    return this.servers.has(modelId);
  }

  private async persist(): Promise<void> {
    const servers: Record<string, ServerInstance> = {};
    for (const [modelId, managed] of this.servers) {
      servers[modelId] = managed.instance;
    }
    try {
      await this.stateStore.write({ servers });
    } catch (error) {
      log.error("[inference/servers] failed to persist server table:", error);
    }
  }

  // ─── Per-instance HTTP surface ───────────────────────────────────────

  private async withClient<T>(
    modelId: string,
    call: (client: LlamaServerClient) => Promise<OrchestratorResult<T>>
  ): Promise<OrchestratorResult<T>> {
    const managed = await this.liveEntry(modelId);
    if (!managed) return Err(notRunningFailure(modelId));

    const result = await call(managed.client);
    if (result.success) {
      this.markHealthy(managed);
    }
    return result;
  }

  completion(
    modelId: string,
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<OrchestratorResult<CompletionResponse>> {
    return this.withClient(modelId, (c) => c.completion(request, signal));
  }

  completionStream(
    modelId: string,
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<OrchestratorResult<AsyncGenerator<CompletionChunk>>> {
    return this.withClient(modelId, (c) => c.completionStream(request, signal));
  }

  chatCompletion(
    modelId: string,
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<OrchestratorResult<ChatCompletionResponse>> {
    return this.withClient(modelId, (c) => c.chatCompletion(request, signal));
  }

  chatCompletionStream(
    modelId: string,
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<OrchestratorResult<AsyncGenerator<ChatCompletionChunk>>> {
    return this.withClient(modelId, (c) => c.chatCompletionStream(request, signal));
  }

  embeddings(modelId: string, input: string | string[]): Promise<OrchestratorResult<EmbeddingResponse>> {
    return this.withClient(modelId, (c) => c.embeddings(input, modelId));
  }

  tokenize(modelId: string, content: string): Promise<OrchestratorResult<TokenizeResponse>> {
    return this.withClient(modelId, (c) => c.tokenize(content));
  }

  tokenizeCount(modelId: string, content: string): Promise<OrchestratorResult<TokenCount>> {
    return this.withClient(modelId, async (c) => Ok(await c.tokenizeCount(content)));
  }

  health(modelId: string): Promise<OrchestratorResult<ServerHealthResponse>> {
    return this.withClient(modelId, (c) => c.health());
  }

  info(modelId: string): Promise<OrchestratorResult<ServerInfoResponse>> {
    return this.withClient(modelId, (c) => c.info());
  }

  metrics(modelId: string): Promise<OrchestratorResult<string>> {
    return this.withClient(modelId, (c) => c.metrics());
  }

  listModels(modelId: string): Promise<OrchestratorResult<ModelListResponse>> {
    return this.withClient(modelId, (c) => c.listModels());
  }
}
