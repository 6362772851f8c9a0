import { AsyncMutex } from "@/node/utils/concurrency/asyncMutex";
import type { ModelRuntime } from "./modelRuntime";
import type {
  InferenceConfig,
  LoadedModelStats,
  ResolvedSampling,
  RuntimeMode,
  SamplingParams,
} from "./types";

/**
 * Bookkeeping for one loaded model.
 *
 * `mutex` admits one request at a time, in arrival order; streams hold it
 * until they are exhausted or closed.
 */
export class LoadedModel {
  readonly mutex = new AsyncMutex();
  readonly loadedAt: Date;
  requestCount = 0;
  totalTokensGenerated = 0;

  constructor(
    readonly modelId: string,
    readonly modelPath: string,
    readonly config: InferenceConfig,
    readonly runtime: ModelRuntime,
    loadedAt: Date = new Date()
  ) {
    this.loadedAt = loadedAt;
  }

  get mode(): RuntimeMode {
    return this.runtime.mode;
  }

  /** Per-call overrides win over the model's config. */
  resolveSampling(overrides: SamplingParams = {}): ResolvedSampling {
    return {
      temperature: overrides.temperature ?? this.config.temperature,
      top_p: overrides.top_p ?? this.config.topP,
      top_k: overrides.top_k ?? this.config.topK,
      repeat_penalty: overrides.repeat_penalty ?? this.config.repeatPenalty,
      max_tokens: overrides.max_tokens ?? this.config.maxTokens,
      stop: overrides.stop ?? this.config.stop,
      ...(overrides.seed !== undefined ? { seed: overrides.seed } : {}),
    };
  }

  recordRequest(completionTokens: number): void {
    this.requestCount++;
    this.totalTokensGenerated += Math.max(0, completionTokens);
  }

  getStats(now: number = Date.now()): LoadedModelStats {
    return {
      modelId: this.modelId,
      modelPath: this.modelPath,
      mode: this.mode,
      loadedAt: this.loadedAt.toISOString(),
      uptimeSeconds: Math.max(0, Math.floor((now - this.loadedAt.getTime()) / 1000)),
      requestCount: this.requestCount,
      totalTokensGenerated: this.totalTokensGenerated,
      config: { ...this.config, stop: [...this.config.stop] },
      port: this.runtime.mode === "server" ? this.runtime.port : null,
    };
  }
}
