import * as os from "os";
import { backendInfo } from "./backendTable";
import type { InferenceConfig } from "./types";

export interface HardwareProfile {
  cpuCores: number;
  totalMemoryBytes: number;
  freeMemoryBytes: number;
  platform: NodeJS.Platform;
  arch: string;
}

/** Runtime defaults a provider suggests for one backend. */
export interface TuningHints {
  gpuLayers: number;
  threads: number;
  batchSize: number;
  contextSize?: number;
}

export interface HardwareProfileProvider {
  getProfile(): Promise<HardwareProfile>;
  /** Backend id that suits this machine best. */
  getRecommendedBackend(): Promise<string>;
  getTuningHints(backendId: string): Promise<TuningHints>;
}

/**
 * GPU backends: everything offloaded, few CPU threads, bigger batches.
 * CPU: nothing offloaded, all cores but one.
 */
export function defaultTuningHints(profile: HardwareProfile, backendId: string): TuningHints {
  if (backendInfo(backendId).requiresGpu) {
    return { gpuLayers: -1, threads: 4, batchSize: 1024 };
  }
  return { gpuLayers: 0, threads: Math.max(1, profile.cpuCores - 1), batchSize: 512 };
}

function readOsProfile(): HardwareProfile {
  return {
    cpuCores: Math.max(1, os.cpus().length),
    totalMemoryBytes: os.totalmem(),
    freeMemoryBytes: os.freemem(),
    platform: process.platform,
    arch: process.arch,
  };
}

/**
 * Reads what Node's `os` module knows. It sees no GPUs, so apart from Apple
 * Silicon (always Metal) it recommends the CPU backend; richer detection
 * belongs in another provider.
 */
export class OsHardwareProfileProvider implements HardwareProfileProvider {
  getProfile(): Promise<HardwareProfile> {
    return Promise.resolve(readOsProfile());
  }

  getRecommendedBackend(): Promise<string> {
    return Promise.resolve(process.platform === "darwin" && process.arch === "arm64" ? "metal" : "cpu");
  }

  getTuningHints(backendId: string): Promise<TuningHints> {
    return Promise.resolve(defaultTuningHints(readOsProfile(), backendId));
  }
}

export interface StaticHardwareOptions {
  recommendedBackend?: string;
  /** Per-backend hints; backends not listed get the defaults. */
  hints?: Record<string, TuningHints>;
}

export class StaticHardwareProfileProvider implements HardwareProfileProvider {
  constructor(
    private readonly profile: HardwareProfile,
    private readonly options: StaticHardwareOptions = {}
  ) {}

  getProfile(): Promise<HardwareProfile> {
    return Promise.resolve(this.profile);
  }

  getRecommendedBackend(): Promise<string> {
    return Promise.resolve(this.options.recommendedBackend ?? "cpu");
  }

  getTuningHints(backendId: string): Promise<TuningHints> {
    return Promise.resolve(this.options.hints?.[backendId] ?? defaultTuningHints(this.profile, backendId));
  }
}

export const BASE_INFERENCE_CONFIG: InferenceConfig = {
  contextSize: 4096,
  batchSize: 512,
  threads: 0,
  gpuLayers: -1,
  temperature: 0.7,
  topP: 0.95,
  topK: 40,
  repeatPenalty: 1.1,
  maxTokens: 2048,
  stop: [],
};

/**
 * Runtime defaults from the active backend's hints. With no backend
 * installed the offload default stays and the runtime decides.
 */
export function deriveInferenceConfig(hints: TuningHints | null): InferenceConfig {
  if (!hints) {
    return { ...BASE_INFERENCE_CONFIG, stop: [] };
  }
  return {
    ...BASE_INFERENCE_CONFIG,
    stop: [],
    gpuLayers: hints.gpuLayers,
    threads: hints.threads,
    batchSize: hints.batchSize,
    contextSize: hints.contextSize ?? BASE_INFERENCE_CONFIG.contextSize,
  };
}
