import { log } from "@/node/services/log";
import { getErrorMessage } from "@/common/utils/errors";
import { Err, Ok, type Result } from "@/common/types/result";
import { InferenceError, TransportError, toError, type InferenceFailure } from "./errors";
import {
  isChatCompletionChunk,
  isChatCompletionResponse,
  isCompletionChunk,
  isCompletionResponse,
  isEmbeddingResponse,
  isModelListResponse,
  isServerHealthResponse,
  isServerInfoResponse,
  isTokenizeResponse,
} from "./payloads";
import { iterateReadableStream, readSseJson } from "./sseParser";
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
  TokenCount,
  TokenizeResponse,
} from "./types";

/** Per-operation deadlines in ms. */
export const REQUEST_TIMEOUTS = {
  probe: 2_000,
  health: 5_000,
  info: 10_000,
  metrics: 10_000,
  tokenize: 10_000,
  embeddings: 60_000,
  generation: 600_000,
} as const;

/** Rough chars-per-token ratio used when the server cannot tokenize. */
export const CHARS_PER_TOKEN_ESTIMATE = 4;

type ClientResult<T> = Result<T, InferenceFailure>;

interface RequestOptions {
  method?: "GET" | "POST";
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * An abort signal that fires on a deadline or when the caller's signal fires.
 */
class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private expired = false;
  private readonly onCallerAbort = () => this.controller.abort();

  constructor(
    readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal
  ) {
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, timeoutMs);
    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener("abort", this.onCallerAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  get cancelled(): boolean {
    return !this.expired && (this.callerSignal?.aborted ?? false);
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener("abort", this.onCallerAbort);
  }
}

/**
 * HTTP client for one native inference server (llama-server or any
 * OpenAI-compatible server).
 *
 * Network and HTTP errors come back as `transport` failures, never thrown.
 * Streams are the exception: once a stream has started, a broken connection
 * is thrown from the generator as a TransportError.
 */
export class LlamaServerClient {
  constructor(
    readonly baseUrl: string,
    private readonly apiKey?: string
  ) {}

  private headers(): Record<string, string> {
    const h: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      h.Authorization = `Bearer ${this.apiKey}`;
    }
    return h;
  }

  private failure(deadline: Deadline, url: string, error: unknown): InferenceFailure {
    if (deadline.cancelled) {
      return { kind: "cancelled", message: `Request to ${url} was cancelled` };
    }
    if (deadline.timedOut) {
      return {
        kind: "transport",
        message: `Request to ${url} timed out after ${deadline.timeoutMs}ms`,
        url,
        timeoutMs: deadline.timeoutMs,
      };
    }
    return { kind: "transport", message: `Request to ${url} failed: ${getErrorMessage(error)}`, url };
  }

  /**
   * Send a request and return the response once its status is 2xx.
   * The returned deadline must be disposed by the caller.
   */
  private async send(
    path: string,
    options: RequestOptions
  ): Promise<{ result: ClientResult<Response>; deadline: Deadline }> {
    const url = `${this.baseUrl}${path}`;
    const deadline = new Deadline(options.timeoutMs, options.signal);

    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? "GET",
        headers: this.headers(),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: deadline.signal,
      });
    } catch (error) {
      return { result: Err(this.failure(deadline, url, error)), deadline };
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      return {
        result: Err({
          kind: "transport",
          message: `${options.method ?? "GET"} ${path} returned HTTP ${response.status}`,
          url,
          status: response.status,
          body: body.slice(0, 2000),
        }),
        deadline,
      };
    }

    return { result: Ok(response), deadline };
  }

  private async requestJson<T>(
    path: string,
    options: RequestOptions,
    isPayload: (value: unknown) => value is T
  ): Promise<ClientResult<T>> {
    const { result, deadline } = await this.send(path, options);
    try {
      if (!result.success) return result;
      const url = `${this.baseUrl}${path}`;

      let parsed: unknown;
      try {
        parsed = await result.data.json();
      } catch (error) {
        return Err(this.failure(deadline, url, error));
      }
      if (!isPayload(parsed)) {
        return Err({ kind: "transport", message: `Unexpected response shape from ${path}`, url });
      }
      return Ok(parsed);
    } finally {
      deadline.dispose();
    }
  }

  private async requestText(path: string, options: RequestOptions): Promise<ClientResult<string>> {
    const { result, deadline } = await this.send(path, options);
    try {
      if (!result.success) return result;
      try {
        return Ok(await result.data.text());
      } catch (error) {
        return Err(this.failure(deadline, `${this.baseUrl}${path}`, error));
      }
    } finally {
      deadline.dispose();
    }
  }

  private async requestStream<T>(
    path: string,
    body: unknown,
    isPayload: (value: unknown) => value is T,
    signal?: AbortSignal
  ): Promise<ClientResult<AsyncGenerator<T>>> {
    const { result, deadline } = await this.send(path, {
      method: "POST",
      body,
      timeoutMs: REQUEST_TIMEOUTS.generation,
      signal,
    });
    if (!result.success) {
      deadline.dispose();
      return result;
    }
    const responseBody = result.data.body;
    if (!responseBody) {
      deadline.dispose();
      return Err({
        kind: "transport",
        message: `No response body for streaming ${path}`,
        url: `${this.baseUrl}${path}`,
      });
    }

    const streamBody: ReadableStream<Uint8Array> = responseBody;
    const url = `${this.baseUrl}${path}`;
    const failure = (error: unknown) => this.failure(deadline, url, error);
    async function* stream(): AsyncGenerator<T> {
      try {
        yield* readSseJson(iterateReadableStream(streamBody), isPayload);
      } catch (error) {
        if (error instanceof InferenceError) throw error;
        const f = failure(error);
        throw f.kind === "transport" ? new TransportError(f.message, f) : toError(f);
      } finally {
        deadline.dispose();
      }
    }
    return Ok(stream());
  }

  // ─── Health ──────────────────────────────────────────────────────────

  /**
   * Quick liveness check used while starting and for staleness re-probes.
   */
  async probe(timeoutMs: number = REQUEST_TIMEOUTS.probe): Promise<boolean> {
    const { result, deadline } = await this.send("/health", { timeoutMs });
    deadline.dispose();
    if (!result.success) {
      log.debug(`[inference/client] probe ${this.baseUrl}: ${result.error.message}`);
      return false;
    }
    // Drain so the socket can be reused
    await result.data.arrayBuffer().catch(() => undefined);
    return true;
  }

  health(): Promise<ClientResult<ServerHealthResponse>> {
    return this.requestJson("/health", { timeoutMs: REQUEST_TIMEOUTS.health }, isServerHealthResponse);
  }

  info(): Promise<ClientResult<ServerInfoResponse>> {
    return this.requestJson("/info", { timeoutMs: REQUEST_TIMEOUTS.info }, isServerInfoResponse);
  }

  /** Prometheus exposition text; the server must run with --metrics. */
  metrics(): Promise<ClientResult<string>> {
    return this.requestText("/metrics", { timeoutMs: REQUEST_TIMEOUTS.metrics });
  }

  listModels(): Promise<ClientResult<ModelListResponse>> {
    return this.requestJson("/v1/models", { timeoutMs: REQUEST_TIMEOUTS.info }, isModelListResponse);
  }

  // ─── Generation ──────────────────────────────────────────────────────

  completion(
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<ClientResult<CompletionResponse>> {
    return this.requestJson(
      "/v1/completions",
      {
        method: "POST",
        body: { ...request, stream: false },
        timeoutMs: REQUEST_TIMEOUTS.generation,
        signal,
      },
      isCompletionResponse
    );
  }

  completionStream(
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<ClientResult<AsyncGenerator<CompletionChunk>>> {
    return this.requestStream(
      "/v1/completions",
      { ...request, stream: true },
      isCompletionChunk,
      signal
    );
  }

  chatCompletion(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ClientResult<ChatCompletionResponse>> {
    return this.requestJson(
      "/v1/chat/completions",
      {
        method: "POST",
        body: { ...request, stream: false },
        timeoutMs: REQUEST_TIMEOUTS.generation,
        signal,
      },
      isChatCompletionResponse
    );
  }

  chatCompletionStream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ClientResult<AsyncGenerator<ChatCompletionChunk>>> {
    return this.requestStream(
      "/v1/chat/completions",
      { ...request, stream: true },
      isChatCompletionChunk,
      signal
    );
  }

  // ─── Embeddings / tokens ─────────────────────────────────────────────

  embeddings(input: string | string[], model?: string): Promise<ClientResult<EmbeddingResponse>> {
    return this.requestJson(
      "/v1/embeddings",
      { method: "POST", body: { input, model }, timeoutMs: REQUEST_TIMEOUTS.embeddings },
      isEmbeddingResponse
    );
  }

  tokenize(content: string): Promise<ClientResult<TokenizeResponse>> {
    return this.requestJson(
      "/tokenize",
      { method: "POST", body: { content }, timeoutMs: REQUEST_TIMEOUTS.tokenize },
      isTokenizeResponse
    );
  }

  /**
   * Token count from the server's tokenizer, or a length-based estimate when
   * the endpoint is missing or failing.
   */
  async tokenizeCount(content: string): Promise<TokenCount> {
    const result = await this.tokenize(content);
    if (result.success) {
      return { count: result.data.tokens.length, estimated: false };
    }
    log.debug(`[inference/client] tokenize unavailable, estimating: ${result.error.message}`);
    return estimateTokenCount(content);
  }
}

export function estimateTokenCount(content: string): TokenCount {
  return { count: Math.floor(content.length / CHARS_PER_TOKEN_ESTIMATE), estimated: true };
}
