/**
 * Installs prebuilt llama-server builds from a GitHub-style release.
 *
 * Flow: fetch release metadata → pick the asset for (platform, arch, backend)
 * → stream it to the downloads dir → extract into <backendsDir>/<id> →
 * write installed.json. Progress is reported as (percent, message) with the
 * download itself mapped onto 10-70%.
 */

import { execFile } from "child_process";
import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import { pipeline } from "stream/promises";
import * as unzipper from "unzipper";
import { promisify } from "util";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { log } from "@/node/services/log";
import { getErrorMessage } from "@/common/utils/errors";
import { Err, Ok, type Result } from "@/common/types/result";
import {
  CUDA_RUNTIME_ASSET,
  PLATFORM_ASSET_TOKEN,
  assetPatternsFor,
  currentTarget,
  type PlatformTarget,
} from "./backendTable";
import type { InferenceFailure } from "./errors";
import type { BackendInstallMarker, DownloadProgressCallback } from "./types";

const execFileAsync = promisify(execFile);

export const DEFAULT_RELEASE_URL = "https://api.github.com/repos/ggml-org/llama.cpp/releases/latest";
export const INSTALL_MARKER_FILE = "installed.json";

const RELEASE_FETCH_TIMEOUT_MS = 30_000;

const ReleaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string(),
  size: z.number().default(0),
});

export const ReleaseSchema = z.object({
  tag_name: z.string(),
  assets: z.array(ReleaseAssetSchema),
});

export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;
export type Release = z.infer<typeof ReleaseSchema>;

export const InstallMarkerSchema = z.object({
  version: z.string(),
  backendId: z.string(),
  assetName: z.string(),
  cudaVersion: z.string().optional(),
  installedDate: z.string(),
  platform: z.string(),
  arch: z.string(),
});

/** Unpack an archive into destDir. */
export type ArchiveExtractor = (archivePath: string, destDir: string) => Promise<void>;

function isInside(root: string, target: string): boolean {
  return target === root || target.startsWith(root + path.sep);
}

/**
 * Unpack a zip with unzipper. Entries keep their unix mode bits so the
 * server binary stays executable; an entry that would land outside destDir
 * fails the whole extraction.
 */
export async function extractZip(archivePath: string, destDir: string): Promise<void> {
  const directory = await unzipper.Open.file(archivePath);
  const root = path.resolve(destDir);
  for (const entry of directory.files) {
    const target = path.resolve(root, entry.path);
    if (!isInside(root, target)) {
      throw new Error(`Archive entry escapes ${destDir}: ${entry.path}`);
    }
    if (entry.type === "Directory") {
      await fsp.mkdir(target, { recursive: true });
      continue;
    }
    await fsp.mkdir(path.dirname(target), { recursive: true });
    const mode = (entry.externalFileAttributes >>> 16) & 0o777;
    await pipeline(entry.stream(), fs.createWriteStream(target, mode ? { mode } : {}));
  }
}

/**
 * Zips go through unzipper, except on macOS where the native unzip keeps
 * the signatures and extended attributes the dylibs need. Tarballs (and
 * everything on Windows, whose bsdtar reads zip too) go through tar.
 */
export const extractArchive: ArchiveExtractor = async (archivePath, destDir) => {
  const isZip = archivePath.toLowerCase().endsWith(".zip");
  if (isZip && process.platform === "darwin") {
    try {
      await execFileAsync("unzip", ["-o", "-q", archivePath, "-d", destDir]);
      return;
    } catch (error) {
      log.warn(`[inference/backends] native unzip failed, retrying with unzipper: ${getErrorMessage(error)}`);
    }
  }
  if (isZip && process.platform !== "win32") {
    await extractZip(archivePath, destDir);
    return;
  }
  await execFileAsync("tar", ["-xf", archivePath, "-C", destDir], { windowsHide: true });
};

/**
 * Newest CUDA toolkit version among Windows CUDA assets, e.g. "12.4".
 */
export function findLatestCudaVersion(assetNames: readonly string[]): string | null {
  let best: number[] | null = null;
  let bestText: string | null = null;
  for (const name of assetNames) {
    const match = /win-cuda-(\d+(?:\.\d+)*)-x64/.exec(name);
    if (!match) continue;
    const parts = match[1].split(".").map(Number);
    if (best === null || compareVersionParts(parts, best) > 0) {
      best = parts;
      bestText = match[1];
    }
  }
  return bestText;
}

function compareVersionParts(a: number[], b: number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export interface SelectedAsset {
  asset: ReleaseAsset;
  cudaVersion: string | null;
}

/**
 * Pick the release asset for a backend. Tries the exact name, then the
 * x86_64 and tar.gz spellings, then (except for CUDA) any asset naming the
 * backend, platform and arch.
 */
export function selectReleaseAsset(
  release: Release,
  backendId: string,
  target: PlatformTarget
): Result<SelectedAsset> {
  const pattern = assetPatternsFor(target)[backendId];
  if (!pattern) {
    return Err(`Backend ${backendId} is not available for ${target.platform}/${target.arch}`);
  }

  const byName = new Map(release.assets.map((asset) => [asset.name, asset]));

  let cudaVersion: string | null = null;
  if (pattern.includes("{cuda}")) {
    cudaVersion = findLatestCudaVersion([...byName.keys()]);
    if (!cudaVersion) {
      return Err(`No CUDA builds found in release ${release.tag_name}`);
    }
  }

  const expected = pattern
    .replace("{version}", release.tag_name)
    .replace("{cuda}", cudaVersion ?? "");
  const candidates = [
    expected,
    expected.replace("-x64", "-x86_64"),
    expected.replace(/\.zip$/, ".tar.gz"),
  ];
  for (const name of candidates) {
    const asset = byName.get(name);
    if (asset) return Ok({ asset, cudaVersion });
  }

  if (cudaVersion === null) {
    const backendToken = backendId.replace(/-/g, "");
    const platformToken = PLATFORM_ASSET_TOKEN[target.platform] ?? target.platform;
    const archTokens = target.arch === "x64" ? ["x64", "x86_64"] : [target.arch];
    for (const asset of release.assets) {
      const lower = asset.name.toLowerCase();
      if (
        lower.replace(/-/g, "").includes(backendToken) &&
        lower.includes(platformToken) &&
        archTokens.some((token) => lower.includes(token))
      ) {
        return Ok({ asset, cudaVersion });
      }
    }
  }

  const sample = release.assets
    .slice(0, 10)
    .map((a) => a.name)
    .join(", ");
  return Err(`Asset not found for ${backendId}. Looking for ${expected}; release has: ${sample}`);
}

export interface BackendInstallerOptions {
  backendsDir: string;
  downloadsDir: string;
  releaseUrl?: string;
  extractor?: ArchiveExtractor;
  target?: PlatformTarget;
}

export interface InstallOptions {
  onProgress?: DownloadProgressCallback;
  signal?: AbortSignal;
}

type InstallResult<T> = Result<T, InferenceFailure>;

function installFailure(message: string): InferenceFailure {
  return { kind: "install", message };
}

function cancelledFailure(backendId: string): InferenceFailure {
  return { kind: "cancelled", message: `Installation of ${backendId} was cancelled` };
}

export class BackendInstaller {
  private readonly releaseUrl: string;
  private readonly extractor: ArchiveExtractor;
  private readonly target: PlatformTarget;

  constructor(private readonly options: BackendInstallerOptions) {
    this.releaseUrl = options.releaseUrl ?? DEFAULT_RELEASE_URL;
    this.extractor = options.extractor ?? extractArchive;
    this.target = options.target ?? currentTarget();
  }

  backendDir(backendId: string): string {
    return path.join(this.options.backendsDir, backendId);
  }

  async fetchRelease(signal?: AbortSignal): Promise<InstallResult<Release>> {
    let body: unknown;
    try {
      const response = await fetch(this.releaseUrl, {
        headers: { Accept: "application/vnd.github+json" },
        signal: signal ?? AbortSignal.timeout(RELEASE_FETCH_TIMEOUT_MS),
      });
      if (!response.ok) {
        return Err(installFailure(`Release lookup returned HTTP ${response.status}`));
      }
      body = await response.json();
    } catch (error) {
      if (signal?.aborted) return Err(cancelledFailure("release lookup"));
      return Err(installFailure(`Failed to fetch release information: ${getErrorMessage(error)}`));
    }

    const parsed = ReleaseSchema.safeParse(body);
    if (!parsed.success) {
      return Err(installFailure("Release information has an unexpected shape"));
    }
    return Ok(parsed.data);
  }

  async install(
    backendId: string,
    options: InstallOptions = {}
  ): Promise<InstallResult<BackendInstallMarker>> {
    const { onProgress, signal } = options;
    const report = (percent: number, message: string) => onProgress?.(percent, message);

    report(5, "Fetching release information...");
    const release = await this.fetchRelease(signal);
    if (!release.success) return release;

    const selected = selectReleaseAsset(release.data, backendId, this.target);
    if (!selected.success) return Err(installFailure(selected.error));
    const { asset, cudaVersion } = selected.data;
    if (cudaVersion) {
      report(8, `Found latest CUDA version: ${cudaVersion}`);
    }

    const sizeMb = (asset.size / 1024 / 1024).toFixed(1);
    report(10, `Downloading ${asset.name} (${sizeMb} MB)...`);

    await fsp.mkdir(this.options.downloadsDir, { recursive: true });
    const archivePath = path.join(this.options.downloadsDir, asset.name);
    const downloaded = await this.download(asset, archivePath, backendId, {
      signal,
      onBytes: (done, total) => {
        if (total <= 0) return;
        const percent = 10 + Math.floor((done / total) * 60);
        const doneMb = (done / 1024 / 1024).toFixed(1);
        const totalMb = (total / 1024 / 1024).toFixed(1);
        report(percent, `Downloading: ${doneMb} / ${totalMb} MB`);
      },
    });
    if (!downloaded.success) return downloaded;

    report(70, "Extracting files...");
    const backendDir = this.backendDir(backendId);
    await fsp.rm(backendDir, { recursive: true, force: true });
    await fsp.mkdir(backendDir, { recursive: true });
    try {
      await this.extractor(archivePath, backendDir);
    } catch (error) {
      return Err(installFailure(`Extraction failed: ${getErrorMessage(error)}`));
    }

    if (cudaVersion && this.target.platform === "win32") {
      const runtimeExtracted = await this.installCudaRuntime(
        release.data,
        cudaVersion,
        backendDir,
        backendId,
        report,
        signal
      );
      if (!runtimeExtracted.success) return runtimeExtracted;
    }

    report(90, "Writing install marker...");
    const marker: BackendInstallMarker = {
      version: release.data.tag_name,
      backendId,
      assetName: asset.name,
      ...(cudaVersion ? { cudaVersion } : {}),
      installedDate: new Date().toISOString(),
      platform: this.target.platform,
      arch: this.target.arch,
    };
    await writeFileAtomic(path.join(backendDir, INSTALL_MARKER_FILE), JSON.stringify(marker, null, 2), "utf-8");

    log.info(`[inference/backends] installed ${backendId} ${marker.version} → ${backendDir}`);
    report(100, `${backendId} installed successfully!`);
    return Ok(marker);
  }

  private async installCudaRuntime(
    release: Release,
    cudaVersion: string,
    backendDir: string,
    backendId: string,
    report: (percent: number, message: string) => void,
    signal?: AbortSignal
  ): Promise<InstallResult<void>> {
    const runtimeName = CUDA_RUNTIME_ASSET.replace("{cuda}", cudaVersion);
    const runtimeAsset = release.assets.find((a) => a.name === runtimeName);
    if (!runtimeAsset) {
      log.warn(`[inference/backends] ${runtimeName} not in release; CUDA DLLs must come from the system`);
      return Ok(undefined);
    }

    report(80, `Downloading CUDA ${cudaVersion} runtime libraries...`);
    const runtimePath = path.join(this.options.downloadsDir, runtimeName);
    const reuse = await fsp
      .stat(runtimePath)
      .then((stat) => runtimeAsset.size > 0 && stat.size === runtimeAsset.size)
      .catch(() => false);
    if (!reuse) {
      const downloaded = await this.download(runtimeAsset, runtimePath, backendId, { signal });
      if (!downloaded.success) return downloaded;
    }

    report(85, "Extracting CUDA runtime...");
    try {
      await this.extractor(runtimePath, backendDir);
    } catch (error) {
      return Err(installFailure(`CUDA runtime extraction failed: ${getErrorMessage(error)}`));
    }
    return Ok(undefined);
  }

  /**
   * Stream an asset to disk. The abort signal is checked between chunks;
   * a cancelled or failed download leaves no partial file behind.
   */
  private async download(
    asset: ReleaseAsset,
    destPath: string,
    backendId: string,
    options: { signal?: AbortSignal; onBytes?: (done: number, total: number) => void }
  ): Promise<InstallResult<void>> {
    const { signal, onBytes } = options;
    if (signal?.aborted) return Err(cancelledFailure(backendId));

    let response: Response;
    try {
      response = await fetch(asset.browser_download_url, { redirect: "follow" });
    } catch (error) {
      return Err(installFailure(`Download of ${asset.name} failed: ${getErrorMessage(error)}`));
    }
    if (!response.ok || !response.body) {
      return Err(installFailure(`Download of ${asset.name} returned HTTP ${response.status}`));
    }

    const contentLength = Number(response.headers.get("content-length") ?? 0);
    const total = asset.size > 0 ? asset.size : contentLength;
    const reader = response.body.getReader();
    const handle = await fsp.open(destPath, "w");
    let done = 0;
    let outcome: InstallResult<void> = Ok(undefined);

    try {
      while (true) {
        if (signal?.aborted) {
          outcome = Err(cancelledFailure(backendId));
          break;
        }
        const chunk = await reader.read();
        if (chunk.done) break;
        await handle.write(chunk.value);
        done += chunk.value.byteLength;
        onBytes?.(done, total);
      }
    } catch (error) {
      outcome = Err(installFailure(`Download of ${asset.name} failed: ${getErrorMessage(error)}`));
    } finally {
      await handle.close();
      if (!outcome.success) {
        await reader.cancel().catch((error: unknown) => {
          log.debug(`[inference/backends] cancelling download body failed`, error);
        });
        await fsp.rm(destPath, { force: true });
      }
      reader.releaseLock();
    }

    return outcome;
  }

  async uninstall(backendId: string): Promise<InstallResult<void>> {
    const dir = this.backendDir(backendId);
    try {
      await fsp.access(dir);
    } catch {
      return Err(installFailure(`Backend ${backendId} is not installed`));
    }
    try {
      await fsp.rm(dir, { recursive: true, force: true });
    } catch (error) {
      return Err(installFailure(`Failed to remove ${dir}: ${getErrorMessage(error)}`));
    }
    log.info(`[inference/backends] uninstalled ${backendId}`);
    return Ok(undefined);
  }

  /**
   * Read the marker of an installed backend; null when absent or invalid.
   */
  async readMarker(backendId: string): Promise<BackendInstallMarker | null> {
    const markerPath = path.join(this.backendDir(backendId), INSTALL_MARKER_FILE);
    let content: string;
    try {
      content = await fsp.readFile(markerPath, "utf-8");
    } catch {
      return null;
    }
    try {
      const parsed = InstallMarkerSchema.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data;
    } catch {
      // fall through to the warning below
    }
    log.warn(`[inference/backends] ignoring malformed ${markerPath}`);
    return null;
  }
}
