/**
 * The three ways a loaded model can be backed, behind one capability set.
 *
 * - server:  a spawned llama-server owned by the ServerOrchestrator
 * - process: a legacy worker child speaking JSON-RPC on stdio
 * - library: an engine living in this process, supplied by the host
 *
 * The mode is chosen once, at load time; callers branch on `mode` only for
 * capabilities that a single mode has (embeddings, tokenization).
 */

import { log } from "@/node/services/log";
import { getErrorMessage } from "@/common/utils/errors";
import { Err, Ok, mapOk, type Result } from "@/common/types/result";
import { TransportError, type InferenceFailure } from "./errors";
import type { ServerOrchestrator } from "./serverOrchestrator";
import type { WorkerProcess } from "./workerProcess";
import type {
  ChatMessage,
  InferenceConfig,
  ResolvedSampling,
  UsageInfo,
} from "./types";

export interface Generation {
  text: string;
  /** Null when the backend reported no usage. */
  usage: UsageInfo | null;
  finishReason: string | null;
}

/** One streamed piece of output; the final piece may only carry usage. */
export interface GenerationDelta {
  text: string;
  usage?: UsageInfo;
}

type RuntimeResult<T> = Result<T, InferenceFailure>;
type PendingGeneration = Promise<RuntimeResult<Generation>>;
type PendingStream = Promise<RuntimeResult<AsyncGenerator<GenerationDelta>>>;

export interface RuntimeCapabilities {
  complete(prompt: string, sampling: ResolvedSampling, signal?: AbortSignal): PendingGeneration;
  completeStream(prompt: string, sampling: ResolvedSampling, signal?: AbortSignal): PendingStream;
  chat(messages: ChatMessage[], sampling: ResolvedSampling, signal?: AbortSignal): PendingGeneration;
  chatStream(messages: ChatMessage[], sampling: ResolvedSampling, signal?: AbortSignal): PendingStream;
  shutdown(): Promise<void>;
}

// ─── server ─────────────────────────────────────────────────────────────

export class ServerBackedRuntime implements RuntimeCapabilities {
  readonly mode = "server" as const;

  constructor(
    private readonly orchestrator: ServerOrchestrator,
    readonly modelId: string,
    readonly port: number
  ) {}

  async complete(prompt: string, sampling: ResolvedSampling, signal?: AbortSignal): PendingGeneration {
    const result = await this.orchestrator.completion(this.modelId, { prompt, ...sampling }, signal);
    return mapOk(result, (response): Generation => ({
      text: response.choices[0]?.text ?? "",
      usage: response.usage ?? null,
      finishReason: response.choices[0]?.finish_reason ?? null,
    }));
  }

  async completeStream(prompt: string, sampling: ResolvedSampling, signal?: AbortSignal): PendingStream {
    const result = await this.orchestrator.completionStream(this.modelId, { prompt, ...sampling }, signal);
    if (!result.success) return result;
    const chunks = result.data;
    async function* deltas(): AsyncGenerator<GenerationDelta> {
      for await (const chunk of chunks) {
        yield { text: chunk.choices[0]?.text ?? "", ...(chunk.usage ? { usage: chunk.usage } : {}) };
      }
    }
    return Ok(deltas());
  }

  async chat(messages: ChatMessage[], sampling: ResolvedSampling, signal?: AbortSignal): PendingGeneration {
    const result = await this.orchestrator.chatCompletion(this.modelId, { messages, ...sampling }, signal);
    return mapOk(result, (response): Generation => ({
      text: response.choices[0]?.message.content ?? "",
      usage: response.usage ?? null,
      finishReason: response.choices[0]?.finish_reason ?? null,
    }));
  }

  async chatStream(messages: ChatMessage[], sampling: ResolvedSampling, signal?: AbortSignal): PendingStream {
    const result = await this.orchestrator.chatCompletionStream(
      this.modelId,
      { messages, ...sampling },
      signal
    );
    if (!result.success) return result;
    const chunks = result.data;
    async function* deltas(): AsyncGenerator<GenerationDelta> {
      for await (const chunk of chunks) {
        yield {
          text: chunk.choices[0]?.delta.content ?? "",
          ...(chunk.usage ? { usage: chunk.usage } : {}),
        };
      }
    }
    return Ok(deltas());
  }

  async shutdown(): Promise<void> {
    const result = await this.orchestrator.stop(this.modelId);
    if (!result.success) {
      log.debug(`[inference/runtime] ${this.modelId}: ${result.error.message}`);
    }
  }
}

// ─── process ────────────────────────────────────────────────────────────

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Workers report no token usage; words stand in for tokens. */
export function approximateUsage(input: string, output: string): UsageInfo {
  const prompt = countWords(input);
  const completion = countWords(output);
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: prompt + completion };
}

function transcriptText(messages: ChatMessage[]): string {
  return messages.map((m) => m.content).join("\n");
}

export class ProcessBackedRuntime implements RuntimeCapabilities {
  readonly mode = "process" as const;

  constructor(
    private readonly worker: WorkerProcess,
    readonly modelId: string
  ) {}

  get pid(): number | undefined {
    return this.worker.pid;
  }

  async complete(prompt: string, sampling: ResolvedSampling): PendingGeneration {
    const result = await this.worker.complete(prompt, sampling);
    if (!result.success) return result;
    return Ok({
      text: result.data.text,
      usage: result.data.usage ?? approximateUsage(prompt, result.data.text),
      finishReason: "stop",
    });
  }

  completeStream(prompt: string, sampling: ResolvedSampling): PendingStream {
    return Promise.resolve(Ok(this.deltas(this.worker.stream({ prompt }, sampling))));
  }

  async chat(messages: ChatMessage[], sampling: ResolvedSampling): PendingGeneration {
    const result = await this.worker.chat(messages, sampling);
    if (!result.success) return result;
    return Ok({
      text: result.data.text,
      usage: result.data.usage ?? approximateUsage(transcriptText(messages), result.data.text),
      finishReason: "stop",
    });
  }

  chatStream(messages: ChatMessage[], sampling: ResolvedSampling): PendingStream {
    return Promise.resolve(Ok(this.deltas(this.worker.stream({ messages }, sampling))));
  }

  private async *deltas(pieces: AsyncGenerator<string>): AsyncGenerator<GenerationDelta> {
    for await (const text of pieces) {
      yield { text };
    }
  }

  shutdown(): Promise<void> {
    return this.worker.stop();
  }
}

// ─── library ────────────────────────────────────────────────────────────

/**
 * An inference engine hosted in this process, e.g. a native binding.
 * Errors are thrown; the runtime turns them into failures.
 */
export interface InProcessEngine {
  complete(prompt: string, sampling: ResolvedSampling, signal?: AbortSignal): Promise<string>;
  chat(messages: ChatMessage[], sampling: ResolvedSampling, signal?: AbortSignal): Promise<string>;
  stream(
    input: { prompt: string } | { messages: ChatMessage[] },
    sampling: ResolvedSampling,
    signal?: AbortSignal
  ): AsyncIterable<string>;
  dispose(): Promise<void>;
}

export type InProcessEngineLoader = (
  modelPath: string,
  config: InferenceConfig
) => Promise<InProcessEngine>;

export class LibraryBackedRuntime implements RuntimeCapabilities {
  readonly mode = "library" as const;
  private readonly label: string;

  constructor(
    private readonly engine: InProcessEngine,
    readonly modelId: string
  ) {
    this.label = `in-process:${modelId}`;
  }

  private failure(error: unknown): InferenceFailure {
    return { kind: "transport", message: `Engine error: ${getErrorMessage(error)}`, url: this.label };
  }

  async complete(prompt: string, sampling: ResolvedSampling, signal?: AbortSignal): PendingGeneration {
    try {
      const text = await this.engine.complete(prompt, sampling, signal);
      return Ok({ text, usage: approximateUsage(prompt, text), finishReason: "stop" });
    } catch (error) {
      return Err(this.failure(error));
    }
  }

  async chat(messages: ChatMessage[], sampling: ResolvedSampling, signal?: AbortSignal): PendingGeneration {
    try {
      const text = await this.engine.chat(messages, sampling, signal);
      return Ok({ text, usage: approximateUsage(transcriptText(messages), text), finishReason: "stop" });
    } catch (error) {
      return Err(this.failure(error));
    }
  }

  completeStream(prompt: string, sampling: ResolvedSampling, signal?: AbortSignal): PendingStream {
    return Promise.resolve(Ok(this.deltas(this.engine.stream({ prompt }, sampling, signal))));
  }

  chatStream(messages: ChatMessage[], sampling: ResolvedSampling, signal?: AbortSignal): PendingStream {
    return Promise.resolve(Ok(this.deltas(this.engine.stream({ messages }, sampling, signal))));
  }

  private async *deltas(pieces: AsyncIterable<string>): AsyncGenerator<GenerationDelta> {
    try {
      for await (const text of pieces) {
        yield { text };
      }
    } catch (error) {
      const failure = this.failure(error);
      throw new TransportError(failure.message, failure);
    }
  }

  shutdown(): Promise<void> {
    return this.engine.dispose();
  }
}

export type ModelRuntime = ServerBackedRuntime | ProcessBackedRuntime | LibraryBackedRuntime;
