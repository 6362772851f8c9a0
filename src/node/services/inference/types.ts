/**
 * Shared types for the inference control plane.
 *
 * The OpenAI-compatible request/response shapes mirror what llama-server
 * speaks on /v1/*; the JSON-RPC shapes mirror the legacy worker protocol.
 */

// ─── Chat ───────────────────────────────────────────────────────────────

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** A transcript entry; timestamps are ISO strings. */
export interface TimestampedChatMessage extends ChatMessage {
  timestamp: string;
}

export interface ChatSession {
  id: string;
  modelId: string;
  messages: TimestampedChatMessage[];
  systemPrompt: string | null;
  createdAt: string;
  lastActivity: string;
}

// ─── Sampling ───────────────────────────────────────────────────────────

export interface SamplingParams {
  temperature?: number;
  top_p?: number;
  top_k?: number;
  repeat_penalty?: number;
  max_tokens?: number;
  stop?: string[];
  seed?: number;
}

/** Sampling after per-call overrides are merged over a model's config. */
export type ResolvedSampling = Required<Omit<SamplingParams, "seed">> & Pick<SamplingParams, "seed">;

// ─── OpenAI-compatible surface ──────────────────────────────────────────

export interface CompletionRequest extends SamplingParams {
  prompt: string;
  model?: string;
  stream?: boolean;
}

export interface CompletionChoice {
  index: number;
  text: string;
  finish_reason: string | null;
}

export interface CompletionResponse {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: CompletionChoice[];
  usage?: UsageInfo;
}

/** Streaming frames of /v1/completions share the response shape. */
export type CompletionChunk = CompletionResponse;

export interface ChatCompletionRequest extends SamplingParams {
  messages: ChatMessage[];
  model?: string;
  stream?: boolean;
}

export interface ChatCompletionChoice {
  index: number;
  message: ChatMessage;
  finish_reason: string | null;
}

export interface ChatCompletionResponse {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage?: UsageInfo;
}

export interface ChatCompletionChunk {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: ChatCompletionChunkChoice[];
  usage?: UsageInfo;
}

export interface ChatCompletionChunkChoice {
  index: number;
  delta: { role?: string; content?: string };
  finish_reason: string | null;
}

export interface UsageInfo {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface EmbeddingData {
  object: string;
  index: number;
  embedding: number[];
}

export interface EmbeddingResponse {
  object: string;
  model: string;
  data: EmbeddingData[];
  usage?: { prompt_tokens: number; total_tokens: number };
}

export interface ModelObject {
  id: string;
  object: string;
  created: number;
  owned_by: string;
}

export interface ModelListResponse {
  object: string;
  data: ModelObject[];
}

/** GET /health */
export interface ServerHealthResponse {
  status: string;
  slots_idle?: number;
  slots_processing?: number;
}

/** GET /info; fields vary by server build so only the common ones are named. */
export interface ServerInfoResponse {
  [key: string]: unknown;
}

export interface TokenizeResponse {
  tokens: number[];
}

export interface TokenCount {
  count: number;
  /** True when the server had no tokenizer endpoint and the count is a length heuristic. */
  estimated: boolean;
}

// ─── Backends ───────────────────────────────────────────────────────────

export interface Backend {
  id: string;
  displayName: string;
  description: string;
  requiresGpu: boolean;
  installed: boolean;
  installedVersion: string | null;
  installPath: string | null;
}

/** Marker written to <backendsDir>/<id>/installed.json after a successful install. */
export interface BackendInstallMarker {
  version: string;
  backendId: string;
  assetName: string;
  /** CUDA toolkit version of the build, for CUDA backends only. */
  cudaVersion?: string;
  installedDate: string; // ISO date
  platform: string;
  arch: string;
}

export type DownloadProgressCallback = (percent: number, message: string) => void;

// ─── Servers ────────────────────────────────────────────────────────────

export type ServerStatus = "starting" | "running" | "unhealthy" | "stopped";

export interface ServerInstance {
  modelId: string;
  modelPath: string;
  host: string;
  port: number;
  pid: number;
  status: ServerStatus;
  backendId: string;
  startedAt: string; // ISO date
  contextSize: number;
  gpuLayers: number;
  /** Epoch ms of the last successful health probe. */
  lastHealthyAt: number;
}

export interface PersistedServerState {
  servers: Record<string, ServerInstance>;
}

// ─── Loaded models ──────────────────────────────────────────────────────

export type RuntimeMode = "server" | "process" | "library";

export interface InferenceConfig {
  contextSize: number;
  batchSize: number;
  /** 0 = let the runtime pick */
  threads: number;
  /** -1 = all layers on GPU */
  gpuLayers: number;
  temperature: number;
  topP: number;
  topK: number;
  repeatPenalty: number;
  maxTokens: number;
  stop: string[];
}

export interface LoadedModelStats {
  modelId: string;
  modelPath: string;
  mode: RuntimeMode;
  loadedAt: string; // ISO date
  uptimeSeconds: number;
  requestCount: number;
  totalTokensGenerated: number;
  config: InferenceConfig;
  port: number | null;
}

// ─── Legacy worker JSON-RPC 2.0 ─────────────────────────────────────────

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: number;
  method: string;
  params?: unknown;
}

export interface JsonRpcError {
  code: number;
  message: string;
}

/** A single streaming token emitted by the legacy worker. */
export interface StreamToken {
  token: string;
  done: boolean;
  error?: string;
}
