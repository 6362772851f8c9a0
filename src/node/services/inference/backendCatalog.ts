import type { Dirent } from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import { log } from "@/node/services/log";
import { Ok, type Result } from "@/common/types/result";
import {
  RECOMMENDATION_ORDER,
  assetPatternsFor,
  backendInfo,
  currentTarget,
  serverExecutableName,
  type PlatformTarget,
} from "./backendTable";
import type { BackendInstaller } from "./backendInstaller";
import type { InferenceFailure } from "./errors";
import type { Backend, BackendInstallMarker, DownloadProgressCallback } from "./types";

/** Backends whose shared libraries live next to the executable. */
const LIBRARY_PATH_BACKENDS = new Set(["cuda", "hip"]);

export interface BackendUpdate {
  backendId: string;
  currentVersion: string;
  latestVersion: string;
}

export interface BackendCatalogOptions {
  backendsDir: string;
  installer: BackendInstaller;
  target?: PlatformTarget;
}

/**
 * What acceleration backends exist on this machine and where their
 * llama-server executables are.
 *
 * Installed state is recomputed from the install markers on every call;
 * nothing is cached between calls.
 */
export class BackendCatalog {
  private readonly backendsDir: string;
  private readonly installer: BackendInstaller;
  private readonly target: PlatformTarget;

  constructor(options: BackendCatalogOptions) {
    this.backendsDir = options.backendsDir;
    this.installer = options.installer;
    this.target = options.target ?? currentTarget();
  }

  private toBackend(backendId: string, marker: BackendInstallMarker | null): Backend {
    const info = backendInfo(backendId);
    return {
      id: backendId,
      displayName: info.displayName,
      description: info.description,
      requiresGpu: info.requiresGpu,
      installed: marker !== null,
      installedVersion: marker?.version ?? null,
      installPath: marker ? path.join(this.backendsDir, backendId) : null,
    };
  }

  /** Backends published for this platform/arch, with their installed state. */
  async listAvailable(): Promise<Backend[]> {
    const ids = Object.keys(assetPatternsFor(this.target));
    return Promise.all(
      ids.map(async (id) => this.toBackend(id, await this.installer.readMarker(id)))
    );
  }

  /** Every backend directory holding a valid install marker, preferred first. */
  async listInstalled(): Promise<Backend[]> {
    let entries: Dirent[];
    try {
      entries = await fsp.readdir(this.backendsDir, { withFileTypes: true });
    } catch {
      return [];
    }

    const installed: Backend[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const marker = await this.installer.readMarker(entry.name);
      if (marker) installed.push(this.toBackend(entry.name, marker));
    }

    const order = this.recommendationOrder();
    const rank = (id: string) => {
      const i = order.indexOf(id);
      return i === -1 ? order.length : i;
    };
    return installed.sort((a, b) => rank(a.id) - rank(b.id) || a.id.localeCompare(b.id));
  }

  /** First installed GPU backend, else the first installed one. */
  async getActive(): Promise<Backend | null> {
    const installed = await this.listInstalled();
    return installed.find((b) => b.requiresGpu) ?? installed[0] ?? null;
  }

  async getBackend(backendId: string): Promise<Backend> {
    return this.toBackend(backendId, await this.installer.readMarker(backendId));
  }

  /**
   * Path of llama-server for a backend (the active one by default), or null
   * when the backend is not installed or ships no executable.
   */
  async getServerExecutable(backendId?: string): Promise<string | null> {
    const backend = backendId ? await this.getBackend(backendId) : await this.getActive();
    if (!backend?.installPath) return null;

    const exe = serverExecutableName(this.target.platform);
    for (const candidate of [
      path.join(backend.installPath, "bin", exe),
      path.join(backend.installPath, exe),
    ]) {
      if (await isFile(candidate)) return candidate;
    }

    // Release archives sometimes nest everything one directory down
    const nested = await findFileRecursive(backend.installPath, exe);
    if (!nested) {
      log.warn(`[inference/backends] ${backend.id} is installed but has no ${exe}`);
    }
    return nested;
  }

  /** Platform preference order, filtered to what is published here. */
  recommendationOrder(): string[] {
    const available = new Set(Object.keys(assetPatternsFor(this.target)));
    return (RECOMMENDATION_ORDER[this.target.platform] ?? ["cpu"]).filter((id) => available.has(id));
  }

  getRecommended(): string {
    return this.recommendationOrder()[0] ?? "cpu";
  }

  async download(
    backendId: string,
    onProgress?: DownloadProgressCallback,
    signal?: AbortSignal
  ): Promise<Result<Backend, InferenceFailure>> {
    const result = await this.installer.install(backendId, { onProgress, signal });
    if (!result.success) return result;
    return Ok(this.toBackend(backendId, result.data));
  }

  uninstall(backendId: string): Promise<Result<void, InferenceFailure>> {
    return this.installer.uninstall(backendId);
  }

  /**
   * Installed backends whose version differs from the latest release.
   */
  async checkForUpdates(): Promise<Result<BackendUpdate[], InferenceFailure>> {
    const release = await this.installer.fetchRelease();
    if (!release.success) return release;

    const latestVersion = release.data.tag_name;
    const installed = await this.listInstalled();
    return Ok(
      installed
        .filter((b) => b.installedVersion !== latestVersion)
        .map((b) => ({
          backendId: b.id,
          currentVersion: b.installedVersion ?? "unknown",
          latestVersion,
        }))
    );
  }

  /**
   * Environment for launching a backend's server. CUDA and HIP builds load
   * their runtime libraries from the install dir.
   */
  buildLaunchEnv(backend: Backend, baseEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...baseEnv };
    if (!backend.installPath || !LIBRARY_PATH_BACKENDS.has(backend.id)) {
      return env;
    }

    const key = this.target.platform === "win32" ? "PATH" : "LD_LIBRARY_PATH";
    const separator = this.target.platform === "win32" ? ";" : ":";
    const existing = env[key];
    env[key] = existing ? `${backend.installPath}${separator}${existing}` : backend.installPath;
    return env;
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fsp.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function findFileRecursive(dir: string, fileName: string): Promise<string | null> {
  let entries: Dirent[];
  try {
    entries = await fsp.readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }
  for (const entry of entries) {
    if (entry.isFile() && entry.name === fileName) {
      return path.join(dir, entry.name);
    }
  }
  for (const entry of entries) {
    if (entry.isDirectory()) {
      const found = await findFileRecursive(path.join(dir, entry.name), fileName);
      if (found) return found;
    }
  }
  return null;
}
