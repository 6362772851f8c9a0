/**
 * Legacy worker process: one child per model that loads the model itself
 * and answers JSON-RPC 2.0 over stdin/stdout.
 *
 * Methods: `health` (polled once at start; the worker answers when the model
 * is loaded), `complete`, `chat`, `generate_stream`, `shutdown`.
 */

import { spawn } from "child_process";
import type { Readable, Writable } from "stream";
import { log } from "@/node/services/log";
import { getErrorMessage } from "@/common/utils/errors";
import { Err, Ok, type Result } from "@/common/types/result";
import { JsonRpcClient } from "./jsonRpcClient";
import { TransportError, type InferenceFailure } from "./errors";
import { isRecord } from "./payloads";
import { LineTail } from "./processControl";
import type { ChatMessage, InferenceConfig, ResolvedSampling, UsageInfo } from "./types";

export const WORKER_READY_TIMEOUT_MS = 120_000;
export const WORKER_SHUTDOWN_TIMEOUT_MS = 5_000;

export interface WorkerHandle {
  readonly pid: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  hasExited(): boolean;
  onExit(listener: (code: number | null) => void): void;
  kill(signal: NodeJS.Signals): void;
}

export type WorkerSpawner = (
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv
) => WorkerHandle;

export const spawnWorker: WorkerSpawner = (command, args, env) => {
  const child = spawn(command, args, { env, windowsHide: true });
  let exited = false;
  const listeners: Array<(code: number | null) => void> = [];
  const markExited = (code: number | null) => {
    if (exited) return;
    exited = true;
    for (const listener of listeners) listener(code);
  };
  child.on("exit", (code) => markExited(code));
  child.on("error", (error) => {
    log.warn(`[inference/worker] process error: ${error.message}`);
    markExited(null);
  });
  return {
    pid: child.pid,
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    hasExited: () => exited,
    onExit: (listener) => {
      if (exited) listener(child.exitCode);
      else listeners.push(listener);
    },
    kill: (signal) => {
      if (!exited) child.kill(signal);
    },
  };
};


export interface WorkerGeneration {
  text: string;
  usage?: UsageInfo;
}

export interface WorkerProcessOptions {
  /** Executable followed by its leading arguments, e.g. ["python3", "worker.py"]. */
  command: string[];
  modelPath: string;
  config: InferenceConfig;
  env?: NodeJS.ProcessEnv;
  spawner?: WorkerSpawner;
  readyTimeoutMs?: number;
  shutdownTimeoutMs?: number;
  /** Called when the worker dies without stop() having been called. */
  onUnexpectedExit?: (code: number | null) => void;
}

function toGeneration(result: unknown): WorkerGeneration | null {
  if (!isRecord(result)) return null;
  let text: unknown = result.text;
  if (typeof text !== "string" && isRecord(result.message)) {
    text = result.message.content;
  }
  if (typeof text !== "string") return null;
  const usage = result.usage;
  if (
    isRecord(usage) &&
    typeof usage.prompt_tokens === "number" &&
    typeof usage.completion_tokens === "number" &&
    typeof usage.total_tokens === "number"
  ) {
    return {
      text,
      usage: {
        prompt_tokens: usage.prompt_tokens,
        completion_tokens: usage.completion_tokens,
        total_tokens: usage.total_tokens,
      },
    };
  }
  return { text };
}

export class WorkerProcess {
  private handle: WorkerHandle | null = null;
  private rpc: JsonRpcClient | null = null;
  private readonly stderrTail = new LineTail();
  private readonly label: string;

  constructor(private readonly options: WorkerProcessOptions) {
    this.label = `stdio:${options.command.join(" ")}`;
  }

  get alive(): boolean {
    return this.handle !== null && !this.handle.hasExited() && this.rpc !== null && !this.rpc.isDisposed;
  }

  get pid(): number | undefined {
    return this.handle?.pid;
  }

  private failure(message: string): InferenceFailure {
    return { kind: "transport", message, url: this.label };
  }

  /**
   * Spawn the worker and wait until it reports the model loaded.
   */
  async start(): Promise<Result<void, InferenceFailure>> {
    const [executable, ...leadingArgs] = this.options.command;
    if (!executable) {
      return Err({ kind: "configuration", message: "Worker command is empty" });
    }

    const { config } = this.options;
    const args = [
      ...leadingArgs,
      "--model",
      this.options.modelPath,
      "--config",
      JSON.stringify({
        n_ctx: config.contextSize,
        n_gpu_layers: config.gpuLayers,
        n_threads: config.threads,
        n_batch: config.batchSize,
      }),
    ];

    log.info(`[inference/worker] starting ${executable} for ${this.options.modelPath}`);
    const spawner = this.options.spawner ?? spawnWorker;
    let handle: WorkerHandle;
    try {
      handle = spawner(executable, args, {
        ...process.env,
        ...this.options.env,
        PYTHONUNBUFFERED: "1",
      });
    } catch (error) {
      return Err({ kind: "spawn", message: getErrorMessage(error), exitCode: null, stderrTail: "" });
    }

    const rpc = new JsonRpcClient(handle.stdin, handle.stdout);
    this.handle = handle;
    this.rpc = rpc;
    const workerLog = log.withFields({ pid: handle.pid });
    handle.stderr?.on("data", (data: Buffer) => {
      for (const line of this.stderrTail.push(data.toString())) {
        workerLog.debug(`[inference/worker] ${line}`);
      }
    });
    handle.onExit((code) => {
      rpc.dispose();
      if (this.handle !== handle) {
        log.info(`[inference/worker] exited with code ${code ?? "null"}`);
        return;
      }
      log.warn(`[inference/worker] exited unexpectedly with code ${code ?? "null"}`);
      this.handle = null;
      this.rpc = null;
      this.options.onUnexpectedExit?.(code);
    });

    const ready = await this.waitReady(rpc);
    if (!ready.success) {
      this.rpc = null;
      this.handle = null;
      handle.kill("SIGKILL");
      rpc.dispose();
      return ready;
    }
    log.info(`[inference/worker] ready (pid ${handle.pid ?? "unknown"})`);
    return Ok(undefined);
  }

  private async waitReady(rpc: JsonRpcClient): Promise<Result<void, InferenceFailure>> {
    const timeoutMs = this.options.readyTimeoutMs ?? WORKER_READY_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    try {
      const outcome = await Promise.race([rpc.call("health"), timeout]);
      if (outcome === "timeout") {
        return Err({
          kind: "startup_timeout",
          message: `Worker did not load the model within ${timeoutMs}ms`,
          timeoutMs,
          stderrTail: this.stderrTail.toString(),
        });
      }
      if (!isRecord(outcome) || outcome.status !== "ok") {
        return Err(this.failure(`Worker health check failed: ${JSON.stringify(outcome)}`));
      }
      return Ok(undefined);
    } catch (error) {
      return Err({
        kind: "spawn",
        message: `Worker failed to start: ${getErrorMessage(error)}`,
        exitCode: null,
        stderrTail: this.stderrTail.toString(),
      });
    } finally {
      clearTimeout(timer);
    }
  }

  private async generate(
    method: "complete" | "chat",
    params: Record<string, unknown>
  ): Promise<Result<WorkerGeneration, InferenceFailure>> {
    if (!this.rpc || !this.alive) {
      return Err(this.failure("Worker is not running"));
    }
    let result: unknown;
    try {
      result = await this.rpc.call(method, params);
    } catch (error) {
      return Err(this.failure(`Worker ${method} failed: ${getErrorMessage(error)}`));
    }
    const generation = toGeneration(result);
    return generation ? Ok(generation) : Err(this.failure(`Worker ${method} returned no text`));
  }

  complete(prompt: string, sampling: ResolvedSampling) {
    return this.generate("complete", { prompt, ...sampling });
  }

  chat(messages: ChatMessage[], sampling: ResolvedSampling) {
    return this.generate("chat", { messages, ...sampling });
  }

  /**
   * Stream text pieces. Worker errors are thrown as TransportError.
   */
  async *stream(
    input: { prompt: string } | { messages: ChatMessage[] },
    sampling: ResolvedSampling
  ): AsyncGenerator<string> {
    if (!this.rpc || !this.alive) {
      const failure = this.failure("Worker is not running");
      throw new TransportError(failure.message, failure);
    }
    try {
      for await (const token of this.rpc.callStream("generate_stream", { ...input, ...sampling })) {
        yield token.token;
      }
    } catch (error) {
      const failure = this.failure(getErrorMessage(error));
      throw new TransportError(failure.message, failure);
    }
  }

  /**
   * Ask the worker to exit, then SIGKILL after the shutdown timeout.
   */
  async stop(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;

    if (!handle.hasExited()) {
      this.rpc?.notify("shutdown");
      const exited = await new Promise<boolean>((resolve) => {
        const timer = setTimeout(
          () => resolve(false),
          this.options.shutdownTimeoutMs ?? WORKER_SHUTDOWN_TIMEOUT_MS
        );
        handle.onExit(() => {
          clearTimeout(timer);
          resolve(true);
        });
      });
      if (!exited) {
        log.warn("[inference/worker] did not exit after shutdown, sending SIGKILL");
        handle.kill("SIGKILL");
      }
    }

    this.rpc?.dispose();
    this.rpc = null;
  }
}
