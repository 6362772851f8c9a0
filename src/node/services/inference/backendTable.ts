/**
 * Which prebuilt llama-server builds exist for which platform, and how the
 * release assets are named.
 *
 * Asset patterns take `{version}` (release tag) and, for CUDA, `{cuda}`
 * (the newest CUDA toolkit version published in that release).
 */

export interface BackendInfo {
  displayName: string;
  description: string;
  requiresGpu: boolean;
}

export const BACKEND_INFO: Record<string, BackendInfo> = {
  cpu: {
    displayName: "CPU (OpenBLAS)",
    description: "CPU-only inference with OpenBLAS optimization",
    requiresGpu: false,
  },
  cuda: {
    displayName: "NVIDIA CUDA",
    description: "GPU acceleration for NVIDIA GPUs",
    requiresGpu: true,
  },
  vulkan: {
    displayName: "Vulkan",
    description: "Cross-platform GPU (NVIDIA, AMD, Intel)",
    requiresGpu: true,
  },
  hip: {
    displayName: "AMD ROCm/HIP (Radeon)",
    description: "GPU acceleration for AMD Radeon GPUs",
    requiresGpu: true,
  },
  sycl: {
    displayName: "Intel SYCL/OneAPI",
    description: "GPU acceleration for Intel Arc/Xe GPUs",
    requiresGpu: true,
  },
  metal: {
    displayName: "Apple Metal",
    description: "GPU acceleration for Apple Silicon",
    requiresGpu: true,
  },
  "opencl-adreno": {
    displayName: "OpenCL Adreno (Windows ARM)",
    description: "GPU acceleration for Qualcomm Adreno GPUs",
    requiresGpu: true,
  },
};

type AssetTable = Partial<Record<NodeJS.Platform, Partial<Record<string, Record<string, string>>>>>;

export const BACKEND_ASSETS: AssetTable = {
  win32: {
    x64: {
      cpu: "llama-{version}-bin-win-cpu-x64.zip",
      cuda: "llama-{version}-bin-win-cuda-{cuda}-x64.zip",
      vulkan: "llama-{version}-bin-win-vulkan-x64.zip",
      sycl: "llama-{version}-bin-win-sycl-x64.zip",
      hip: "llama-{version}-bin-win-hip-radeon-x64.zip",
    },
    arm64: {
      cpu: "llama-{version}-bin-win-cpu-arm64.zip",
      "opencl-adreno": "llama-{version}-bin-win-opencl-adreno-arm64.zip",
    },
  },
  linux: {
    x64: {
      cpu: "llama-{version}-bin-ubuntu-x64.zip",
      vulkan: "llama-{version}-bin-ubuntu-vulkan-x64.zip",
    },
    s390x: {
      cpu: "llama-{version}-bin-ubuntu-s390x.zip",
    },
  },
  darwin: {
    arm64: { metal: "llama-{version}-bin-macos-arm64.zip" },
    x64: { metal: "llama-{version}-bin-macos-x64.zip" },
  },
};

/** CUDA runtime DLLs ship as a separate archive on Windows. */
export const CUDA_RUNTIME_ASSET = "cudart-llama-bin-win-cuda-{cuda}-x64.zip";

/** Preferred order when several backends are usable. */
export const RECOMMENDATION_ORDER: Partial<Record<NodeJS.Platform, string[]>> = {
  win32: ["cuda", "vulkan", "hip", "sycl", "cpu"],
  darwin: ["metal", "cpu"],
  linux: ["vulkan", "cpu"],
};

/** Token that release asset names use for each platform. */
export const PLATFORM_ASSET_TOKEN: Partial<Record<NodeJS.Platform, string>> = {
  win32: "win",
  linux: "ubuntu",
  darwin: "macos",
};

export interface PlatformTarget {
  platform: NodeJS.Platform;
  arch: string;
}

export function currentTarget(): PlatformTarget {
  return { platform: process.platform, arch: process.arch };
}

/** Backend id → asset pattern for a platform; empty when nothing is published. */
export function assetPatternsFor(target: PlatformTarget): Record<string, string> {
  return BACKEND_ASSETS[target.platform]?.[target.arch] ?? {};
}

export function backendInfo(backendId: string): BackendInfo {
  return (
    BACKEND_INFO[backendId] ?? {
      displayName: backendId,
      description: "Custom backend",
      requiresGpu: backendId !== "cpu",
    }
  );
}

export function serverExecutableName(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "llama-server.exe" : "llama-server";
}
