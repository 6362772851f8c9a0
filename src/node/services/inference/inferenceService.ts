/**
 * InferenceService: the facade the host application talks to.
 *
 * "Load a model, then complete or chat with it." Behind that sits one of
 * three runtimes (spawned llama-server, legacy worker process, in-process
 * engine), picked once per model at load time. Each loaded model has a FIFO
 * mutex so requests to it never interleave, plus request and token counters.
 *
 * Expected failures (no runtime, server did not start, HTTP errors) come back
 * as Result values. Talking to a model that was never loaded, or to a session
 * that does not exist, is a programming error and throws.
 */

import { EventEmitter } from "events";
import { log } from "@/node/services/log";
import { MutexMap } from "@/node/utils/concurrency/mutexMap";
import { getErrorMessage } from "@/common/utils/errors";
import { Err, Ok, type Result } from "@/common/types/result";
import type { BackendCatalog } from "./backendCatalog";
import { ChatSessionStore } from "./chatSessions";
import {
  ModelNotLoadedError,
  SessionNotFoundError,
  configurationFailure,
  notRunningFailure,
  type InferenceFailure,
} from "./errors";
import {
  BASE_INFERENCE_CONFIG,
  deriveInferenceConfig,
  type HardwareProfile,
  type HardwareProfileProvider,
} from "./hardwareProfile";
import { estimateTokenCount } from "./llamaServerClient";
import { LoadedModel } from "./loadedModel";
import type { LocalModelRegistry } from "./modelRegistry";
import {
  LibraryBackedRuntime,
  ProcessBackedRuntime,
  ServerBackedRuntime,
  type Generation,
  type GenerationDelta,
  type InProcessEngineLoader,
  type ModelRuntime,
} from "./modelRuntime";
import type { ServerLaunchOptions, ServerOrchestrator } from "./serverOrchestrator";
import { WorkerProcess, type WorkerSpawner } from "./workerProcess";
import type {
  Backend,
  ChatMessage,
  ChatSession,
  EmbeddingResponse,
  InferenceConfig,
  LoadedModelStats,
  RuntimeMode,
  SamplingParams,
  TimestampedChatMessage,
  TokenCount,
} from "./types";

export interface LoadOptions extends Partial<InferenceConfig> {
  /** Force a runtime instead of picking the first available one. */
  mode?: RuntimeMode;
  /** Backend for server mode; defaults to the active backend. */
  backendId?: string;
  /** Extra llama-server flags for server mode. */
  server?: ServerLaunchOptions;
}

export interface InferenceServiceOptions {
  orchestrator: ServerOrchestrator;
  backends: Pick<BackendCatalog, "getActive" | "getServerExecutable">;
  models: LocalModelRegistry;
  hardware: HardwareProfileProvider;
  /** Command for the legacy worker, e.g. ["python3", "/opt/worker.py"]. */
  workerCommand?: string[];
  workerSpawner?: WorkerSpawner;
  engineLoader?: InProcessEngineLoader;
  sessions?: ChatSessionStore;
}

export interface InferenceServiceEvents {
  "model-loaded": [stats: LoadedModelStats];
  "model-unloaded": [modelId: string];
  "model-evicted": [modelId: string, reason: string];
}

export interface InferenceStatus {
  hardware: HardwareProfile | null;
  /** What the hardware provider suggests installing or using. */
  recommendedBackend: string | null;
  activeBackend: Backend | null;
  defaultConfig: InferenceConfig;
  loadedModels: LoadedModelStats[];
  runningServers: number;
}

type ServiceResult<T> = Result<T, InferenceFailure>;

function unloadedFailure(modelId: string): InferenceFailure {
  return notRunningFailure(modelId, `Model ${modelId} was unloaded`);
}

/**
 * return() on a generator that never started skips its finally blocks, so
 * run `cleanup` after it as well. `cleanup` must be idempotent.
 */
function closeWith<T>(stream: AsyncGenerator<T>, cleanup: () => Promise<void>): AsyncGenerator<T> {
  const close = stream.return.bind(stream);
  stream.return = async (value) => {
    try {
      return await close(value);
    } finally {
      await cleanup();
    }
  };
  return stream;
}

const CONFIG_KEYS = [
  "contextSize",
  "batchSize",
  "threads",
  "gpuLayers",
  "temperature",
  "topP",
  "topK",
  "repeatPenalty",
  "maxTokens",
  "stop",
] as const satisfies ReadonlyArray<keyof InferenceConfig>;

function pickConfig(source: Partial<InferenceConfig>): Partial<InferenceConfig> {
  const picked: Partial<InferenceConfig> = {};
  for (const key of CONFIG_KEYS) {
    if (source[key] !== undefined) {
      Object.assign(picked, { [key]: source[key] });
    }
  }
  return picked;
}

export class InferenceService extends EventEmitter {
  private readonly loaded = new Map<string, LoadedModel>();
  private readonly loadLocks = new MutexMap<string>();
  private readonly sessionLocks = new MutexMap<string>();
  private readonly sessions: ChatSessionStore;
  private hardwareProfile: HardwareProfile | null = null;
  private recommendedBackend: string | null = null;
  private derivedConfig: InferenceConfig = { ...BASE_INFERENCE_CONFIG, stop: [] };
  private configOverrides: Partial<InferenceConfig> = {};
  private initialized = false;
  private readonly onServerEvicted = (modelId: string, reason: string) => {
    this.dropModel(modelId, "server", reason);
  };

  constructor(private readonly options: InferenceServiceOptions) {
    super();
    this.setMaxListeners(100);
    this.sessions = options.sessions ?? new ChatSessionStore();
  }

  /**
   * Clean up orphaned servers from a previous run and compute hardware defaults.
   * Returns the number of orphans that were killed.
   */
  async initialize(): Promise<number> {
    if (this.initialized) return 0;
    const orphans = await this.options.orchestrator.initialize();
    this.options.orchestrator.on("server-evicted", this.onServerEvicted);
    await this.reloadHardwareConfig();
    this.initialized = true;
    log.info(`[inference] initialized (${orphans} orphaned server(s) cleaned up)`);
    return orphans;
  }

  // ─── Default config ──────────────────────────────────────────────────

  getDefaultConfig(): InferenceConfig {
    const merged = { ...this.derivedConfig, ...this.configOverrides };
    return { ...merged, stop: [...merged.stop] };
  }

  /** Override defaults for models loaded from now on. */
  setDefaultConfig(overrides: Partial<InferenceConfig>): InferenceConfig {
    this.configOverrides = { ...this.configOverrides, ...pickConfig(overrides) };
    return this.getDefaultConfig();
  }

  /** Re-read hardware and active backend, e.g. after installing a backend. */
  async reloadHardwareConfig(): Promise<InferenceConfig> {
    const { hardware } = this.options;
    this.hardwareProfile = await hardware.getProfile();
    this.recommendedBackend = await hardware.getRecommendedBackend();
    const active = await this.options.backends.getActive();
    this.derivedConfig = deriveInferenceConfig(active ? await hardware.getTuningHints(active.id) : null);
    log.debug(
      `[inference] defaults for ${active?.id ?? "no backend"}: gpuLayers=${this.derivedConfig.gpuLayers} threads=${this.derivedConfig.threads} batch=${this.derivedConfig.batchSize}`
    );
    return this.getDefaultConfig();
  }

  // ─── Load / unload ───────────────────────────────────────────────────

  /**
   * Load a model. Loading one that is already loaded returns its stats.
   */
  load(modelId: string, options: LoadOptions = {}): Promise<ServiceResult<LoadedModelStats>> {
    return this.loadLocks.withLock(modelId, async () => {
      const existing = this.loaded.get(modelId);
      if (existing) return Ok(existing.getStats());

      const modelPath = await this.options.models.resolvePath(modelId);
      if (!modelPath) {
        return Err(configurationFailure(`Unknown model: ${modelId}`));
      }

      const config: InferenceConfig = { ...this.getDefaultConfig(), ...pickConfig(options) };
      const mode = await this.selectMode(modelId, options);
      if (!mode.success) return mode;

      const runtime = await this.createRuntime(mode.data, modelId, modelPath, config, options);
      if (!runtime.success) return runtime;

      const model = new LoadedModel(modelId, modelPath, config, runtime.data);
      this.loaded.set(modelId, model);
      const stats = model.getStats();
      log.info(`[inference] loaded ${modelId} (${mode.data} mode)`);
      this.emit("model-loaded", stats);
      return Ok(stats);
    });
  }

  private async selectMode(modelId: string, options: LoadOptions): Promise<ServiceResult<RuntimeMode>> {
    if (options.mode) return Ok(options.mode);

    if (await this.options.backends.getServerExecutable(options.backendId)) return Ok("server");
    if (this.options.workerCommand && this.options.workerCommand.length > 0) return Ok("process");
    if (this.options.engineLoader) return Ok("library");

    return Err(
      configurationFailure(
        `No runtime available for ${modelId}: install a llama-server backend or configure a worker command`
      )
    );
  }

  private async createRuntime(
    mode: RuntimeMode,
    modelId: string,
    modelPath: string,
    config: InferenceConfig,
    options: LoadOptions
  ): Promise<ServiceResult<ModelRuntime>> {
    switch (mode) {
      case "server": {
        const started = await this.options.orchestrator.start(
          modelId,
          modelPath,
          {
            contextSize: config.contextSize,
            gpuLayers: config.gpuLayers,
            threads: config.threads,
            batchSize: config.batchSize,
            ...options.server,
          },
          options.backendId
        );
        if (!started.success) return started;
        return Ok(new ServerBackedRuntime(this.options.orchestrator, modelId, started.data.port));
      }

      case "process": {
        const command = this.options.workerCommand;
        if (!command || command.length === 0) {
          return Err(configurationFailure("Process mode needs a worker command"));
        }
        const worker = new WorkerProcess({
          command,
          modelPath,
          config,
          spawner: this.options.workerSpawner,
          onUnexpectedExit: (code) =>
            this.dropModel(modelId, "process", `worker exited with code ${code ?? "null"}`),
        });
        const started = await worker.start();
        if (!started.success) return started;
        return Ok(new ProcessBackedRuntime(worker, modelId));
      }

      case "library": {
        const loader = this.options.engineLoader;
        if (!loader) {
          return Err(configurationFailure("Library mode needs an in-process engine loader"));
        }
        try {
          return Ok(new LibraryBackedRuntime(await loader(modelPath, config), modelId));
        } catch (error) {
          return Err(configurationFailure(`Engine failed to load ${modelId}: ${getErrorMessage(error)}`));
        }
      }
    }
  }

  /**
   * Forget a model whose runtime died underneath it.
   */
  private dropModel(modelId: string, mode: RuntimeMode, reason: string): void {
    const model = this.loaded.get(modelId);
    if (model?.mode !== mode) return;
    this.loaded.delete(modelId);
    log.warn(`[inference] dropped ${modelId}: ${reason}`);
    this.emit("model-evicted", modelId, reason);
  }

  /**
   * Unload a model. Waits for the request in progress, if any.
   * Returns false when the model was not loaded.
   */
  unload(modelId: string): Promise<boolean> {
    return this.loadLocks.withLock(modelId, async () => {
      const model = this.loaded.get(modelId);
      if (!model) return false;

      const lock = await model.mutex.acquire();
      try {
        if (this.loaded.get(modelId) === model) {
          this.loaded.delete(modelId);
        }
        await model.runtime.shutdown();
      } finally {
        lock.release();
      }

      log.info(`[inference] unloaded ${modelId}`);
      this.emit("model-unloaded", modelId);
      return true;
    });
  }

  private requireModel(modelId: string): LoadedModel {
    const model = this.loaded.get(modelId);
    if (!model) throw new ModelNotLoadedError(modelId);
    return model;
  }

  /**
   * Run `operation` holding the model's mutex. A request that was queued
   * behind unload (or behind the runtime dying) gets not_running instead of
   * touching a runtime that is gone.
   */
  private withModel<T>(
    modelId: string,
    operation: (model: LoadedModel) => Promise<ServiceResult<T>>
  ): Promise<ServiceResult<T>> {
    const model = this.requireModel(modelId);
    return model.mutex.runExclusive(() =>
      this.loaded.get(modelId) === model ? operation(model) : Promise.resolve(Err(unloadedFailure(modelId)))
    );
  }

  // ─── Generation ──────────────────────────────────────────────────────

  complete(
    modelId: string,
    prompt: string,
    params?: SamplingParams,
    signal?: AbortSignal
  ): Promise<ServiceResult<Generation>> {
    return this.withModel(modelId, async (model) => {
      const result = await model.runtime.complete(prompt, model.resolveSampling(params), signal);
      if (result.success) {
        model.recordRequest(result.data.usage?.completion_tokens ?? 0);
      }
      return result;
    });
  }

  chat(
    modelId: string,
    messages: ChatMessage[],
    params?: SamplingParams,
    signal?: AbortSignal
  ): Promise<ServiceResult<Generation>> {
    return this.withModel(modelId, async (model) => {
      const result = await model.runtime.chat(messages, model.resolveSampling(params), signal);
      if (result.success) {
        model.recordRequest(result.data.usage?.completion_tokens ?? 0);
      }
      return result;
    });
  }

  /**
   * Stream completion text. Failing to open the stream is a Result; errors
   * mid-stream are thrown from the iterator. The model stays locked until
   * the stream is exhausted or closed with return() (which `break` in a
   * for-await loop does), so a stream that is never consumed must be closed.
   */
  completeStream(
    modelId: string,
    prompt: string,
    params?: SamplingParams,
    signal?: AbortSignal
  ): Promise<ServiceResult<AsyncGenerator<string>>> {
    const model = this.requireModel(modelId);
    return this.openLocked(model, () =>
      model.runtime.completeStream(prompt, model.resolveSampling(params), signal)
    );
  }

  chatStream(
    modelId: string,
    messages: ChatMessage[],
    params?: SamplingParams,
    signal?: AbortSignal
  ): Promise<ServiceResult<AsyncGenerator<string>>> {
    const model = this.requireModel(modelId);
    return this.openLocked(model, () =>
      model.runtime.chatStream(messages, model.resolveSampling(params), signal)
    );
  }

  private async openLocked(
    model: LoadedModel,
    open: () => Promise<ServiceResult<AsyncGenerator<GenerationDelta>>>
  ): Promise<ServiceResult<AsyncGenerator<string>>> {
    const lock = await model.mutex.acquire();
    let opened: ServiceResult<AsyncGenerator<GenerationDelta>>;
    try {
      opened = this.loaded.get(model.modelId) === model ? await open() : Err(unloadedFailure(model.modelId));
    } catch (error) {
      lock.release();
      throw error;
    }
    if (!opened.success) {
      lock.release();
      return opened;
    }

    const deltas = opened.data;
    async function* pieces(): AsyncGenerator<string> {
      let deltaCount = 0;
      let reportedTokens: number | null = null;
      try {
        for await (const delta of deltas) {
          if (delta.usage) reportedTokens = delta.usage.completion_tokens;
          if (delta.text) {
            deltaCount++;
            yield delta.text;
          }
        }
      } finally {
        model.recordRequest(reportedTokens ?? deltaCount);
        lock.release();
      }
    }
    return Ok(
      closeWith(pieces(), async () => {
        await deltas.return(undefined);
        lock.release();
      })
    );
  }

  // ─── Server-only passthroughs ────────────────────────────────────────

  embeddings(modelId: string, input: string | string[]): Promise<ServiceResult<EmbeddingResponse>> {
    const model = this.requireModel(modelId);
    if (model.runtime.mode !== "server") {
      return Promise.resolve(
        Err(configurationFailure(`Embeddings need a server-backed model; ${modelId} runs in ${model.mode} mode`))
      );
    }
    return this.options.orchestrator.embeddings(modelId, input);
  }

  /**
   * Token count from the model's tokenizer when it has one, else an estimate.
   */
  async tokenizeCount(modelId: string, text: string): Promise<TokenCount> {
    const model = this.requireModel(modelId);
    if (model.runtime.mode !== "server") {
      return estimateTokenCount(text);
    }
    const result = await this.options.orchestrator.tokenizeCount(modelId, text);
    return result.success ? result.data : estimateTokenCount(text);
  }

  // ─── Sessions ────────────────────────────────────────────────────────

  createSession(modelId: string, systemPrompt?: string): ChatSession {
    return this.sessions.create(modelId, systemPrompt);
  }

  getSession(sessionId: string): ChatSession | null {
    return this.sessions.get(sessionId);
  }

  listSessions(modelId?: string): ChatSession[] {
    return this.sessions.list(modelId);
  }

  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private requireSession(sessionId: string): ChatSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  /** Append the user turn and return the transcript to send. */
  private beginTurn(sessionId: string, content: string): ChatMessage[] {
    this.sessions.append(sessionId, { role: "user", content });
    const history = this.sessions.history(sessionId);
    if (!history) throw new SessionNotFoundError(sessionId);
    return history;
  }

  /**
   * Append the user turn, chat with the whole transcript, append the reply.
   * Turns on one session run one at a time, so each sees the previous reply.
   */
  async sendMessage(
    sessionId: string,
    content: string,
    params?: SamplingParams
  ): Promise<ServiceResult<TimestampedChatMessage>> {
    const { modelId } = this.requireSession(sessionId);
    this.requireModel(modelId);

    return this.sessionLocks.withLock(sessionId, async () => {
      const result = await this.chat(modelId, this.beginTurn(sessionId, content), params);
      if (!result.success) return result;
      const reply = this.sessions.append(sessionId, { role: "assistant", content: result.data.text });
      if (!reply) throw new SessionNotFoundError(sessionId);
      return Ok(reply);
    });
  }

  /**
   * Streaming variant of sendMessage. Whatever was streamed is recorded as
   * the assistant turn, even when the consumer stops early. The session
   * stays locked while the stream is open.
   */
  async sendMessageStream(
    sessionId: string,
    content: string,
    params?: SamplingParams
  ): Promise<ServiceResult<AsyncGenerator<string>>> {
    const { modelId } = this.requireSession(sessionId);
    this.requireModel(modelId);

    const sessionLock = await this.sessionLocks.acquire(sessionId);
    let opened: ServiceResult<AsyncGenerator<string>>;
    try {
      opened = await this.chatStream(modelId, this.beginTurn(sessionId, content), params);
    } catch (error) {
      sessionLock.release();
      throw error;
    }
    if (!opened.success) {
      sessionLock.release();
      return opened;
    }

    const sessions = this.sessions;
    const stream = opened.data;
    async function* recorded(): AsyncGenerator<string> {
      let reply = "";
      try {
        for await (const piece of stream) {
          reply += piece;
          yield piece;
        }
      } finally {
        if (reply) sessions.append(sessionId, { role: "assistant", content: reply });
        sessionLock.release();
      }
    }
    return Ok(
      closeWith(recorded(), async () => {
        await stream.return(undefined);
        sessionLock.release();
      })
    );
  }

  // ─── Status ──────────────────────────────────────────────────────────

  listLoaded(): LoadedModelStats[] {
    return [...this.loaded.values()].map((m) => m.getStats());
  }

  isLoaded(modelId: string): boolean {
    return this.loaded.has(modelId);
  }

  async getStatus(): Promise<InferenceStatus> {
    const running = await this.options.orchestrator.listRunning();
    return {
      hardware: this.hardwareProfile,
      recommendedBackend: this.recommendedBackend,
      activeBackend: await this.options.backends.getActive(),
      defaultConfig: this.getDefaultConfig(),
      loadedModels: this.listLoaded(),
      runningServers: running.length,
    };
  }

  /**
   * Unload every model and stop every server.
   */
  async dispose(): Promise<void> {
    const ids = [...this.loaded.keys()];
    const results = await Promise.allSettled(ids.map((id) => this.unload(id)));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        log.error(`[inference] unloading ${ids[i]} failed:`, result.reason);
      }
    });
    await this.options.orchestrator.stopAll();
    this.options.orchestrator.off("server-evicted", this.onServerEvicted);
    this.initialized = false;
  }
}
