/**
 * Typed llama-server options and the pure mapping to an argv list.
 *
 * Required flags are always emitted. Optional flags are emitted only when the
 * field is set and differs from the server's own default, so a config that
 * leaves a knob alone never overrides what the server would have picked.
 */

import { z } from "zod";
import { Err, Ok, type Result } from "@/common/types/result";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8080;
export const DEFAULT_CONTEXT_SIZE = 4096;
/** -1 = every layer on the GPU */
export const DEFAULT_GPU_LAYERS = -1;
export const DEFAULT_BATCH_SIZE = 512;
export const DEFAULT_PARALLEL = 1;

export const ServerConfigSchema = z.object({
  modelPath: z.string().min(1),
  host: z.string().min(1).default(DEFAULT_HOST),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  /** 0 = take the context length from the model */
  contextSize: z.number().int().min(0).default(DEFAULT_CONTEXT_SIZE),
  gpuLayers: z.number().int().min(-1).default(DEFAULT_GPU_LAYERS),
  /** 0 = auto, flag omitted */
  threads: z.number().int().min(0).default(0),
  batchSize: z.number().int().min(1).default(DEFAULT_BATCH_SIZE),
  parallel: z.number().int().min(1).default(DEFAULT_PARALLEL),

  threadsBatch: z.number().int().min(1).optional(),
  ubatchSize: z.number().int().min(1).optional(),
  flashAttention: z.boolean().optional(),
  useMmap: z.boolean().optional(),
  useMlock: z.boolean().optional(),
  numa: z.enum(["distribute", "isolate", "numactl"]).optional(),
  tensorSplit: z.array(z.number().min(0)).min(1).optional(),
  mainGpu: z.number().int().min(0).optional(),
  splitMode: z.enum(["none", "layer", "row"]).optional(),
  ropeScaling: z.enum(["none", "linear", "yarn"]).optional(),
  ropeFreqBase: z.number().positive().optional(),
  ropeFreqScale: z.number().positive().optional(),
  seed: z.number().int().optional(),
  cacheTypeK: z.string().min(1).optional(),
  cacheTypeV: z.string().min(1).optional(),
  continuousBatching: z.boolean().optional(),
  embedding: z.boolean().optional(),
  alias: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  chatTemplate: z.string().min(1).optional(),
  metrics: z.boolean().optional(),
  requestTimeoutSeconds: z.number().int().min(1).optional(),
});

/** Fully-resolved config; every required field present. */
export type ServerConfig = z.output<typeof ServerConfigSchema>;
/** What callers pass: required fields may be left to their defaults. */
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

/**
 * Fill defaults and check ranges.
 */
export function resolveServerConfig(input: ServerConfigInput): Result<ServerConfig> {
  const parsed = ServerConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    return Err(`Invalid server config: ${details}`);
  }
  return Ok(parsed.data);
}

/**
 * Map a resolved config to llama-server arguments (executable excluded).
 */
export function buildServerArgs(config: ServerConfig): string[] {
  const args = [
    "--model",
    config.modelPath,
    "--host",
    config.host,
    "--port",
    String(config.port),
    "--ctx-size",
    String(config.contextSize),
    "--n-gpu-layers",
    String(config.gpuLayers),
    "--batch-size",
    String(config.batchSize),
    "--parallel",
    String(config.parallel),
  ];

  if (config.threads > 0) {
    args.push("--threads", String(config.threads));
  }
  if (config.threadsBatch !== undefined) {
    args.push("--threads-batch", String(config.threadsBatch));
  }
  if (config.ubatchSize !== undefined) {
    args.push("--ubatch-size", String(config.ubatchSize));
  }
  if (config.flashAttention === true) {
    args.push("--flash-attn");
  }
  // mmap and continuous batching are on by default; only the opt-out has a flag
  if (config.useMmap === false) {
    args.push("--no-mmap");
  }
  if (config.useMlock === true) {
    args.push("--mlock");
  }
  if (config.numa !== undefined) {
    args.push("--numa", config.numa);
  }
  if (config.tensorSplit !== undefined) {
    args.push("--tensor-split", config.tensorSplit.join(","));
  }
  if (config.mainGpu !== undefined) {
    args.push("--main-gpu", String(config.mainGpu));
  }
  if (config.splitMode !== undefined && config.splitMode !== "layer") {
    args.push("--split-mode", config.splitMode);
  }
  if (config.ropeScaling !== undefined) {
    args.push("--rope-scaling", config.ropeScaling);
  }
  if (config.ropeFreqBase !== undefined) {
    args.push("--rope-freq-base", String(config.ropeFreqBase));
  }
  if (config.ropeFreqScale !== undefined) {
    args.push("--rope-freq-scale", String(config.ropeFreqScale));
  }
  if (config.seed !== undefined && config.seed !== -1) {
    args.push("--seed", String(config.seed));
  }
  if (config.cacheTypeK !== undefined && config.cacheTypeK !== "f16") {
    args.push("--cache-type-k", config.cacheTypeK);
  }
  if (config.cacheTypeV !== undefined && config.cacheTypeV !== "f16") {
    args.push("--cache-type-v", config.cacheTypeV);
  }
  if (config.continuousBatching === false) {
    args.push("--no-cont-batching");
  }
  if (config.embedding === true) {
    args.push("--embedding");
  }
  if (config.alias !== undefined) {
    args.push("--alias", config.alias);
  }
  if (config.apiKey !== undefined) {
    args.push("--api-key", config.apiKey);
  }
  if (config.chatTemplate !== undefined) {
    args.push("--chat-template", config.chatTemplate);
  }
  if (config.metrics === true) {
    args.push("--metrics");
  }
  if (config.requestTimeoutSeconds !== undefined) {
    args.push("--timeout", String(config.requestTimeoutSeconds));
  }

  return args;
}

/**
 * Redact secrets from an argv list before it is logged.
 */
export function redactServerArgs(args: readonly string[]): string[] {
  return args.map((arg, i) => (i > 0 && args[i - 1] === "--api-key" ? "***" : arg));
}
