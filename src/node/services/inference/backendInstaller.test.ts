import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import * as fs from "fs/promises";
import * as http from "http";
import * as os from "os";
import * as path from "path";
import {
  BackendInstaller,
  extractZip,
  findLatestCudaVersion,
  selectReleaseAsset,
  type ArchiveExtractor,
  type Release,
} from "./backendInstaller";
import type { PlatformTarget } from "./backendTable";

const LINUX: PlatformTarget = { platform: "linux", arch: "x64" };
const WINDOWS: PlatformTarget = { platform: "win32", arch: "x64" };

function release(names: string[]): Release {
  return {
    tag_name: "b100",
    assets: names.map((name) => ({ name, browser_download_url: `http://example.invalid/${name}`, size: 1 })),
  };
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  return c >>> 0;
});

function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (const byte of data) crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  return (crc ^ 0xffffffff) >>> 0;
}

/** An uncompressed zip whose entries carry unix modes. */
function buildZip(entries: Array<{ name: string; data: string; mode: number }>): Buffer {
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;
  for (const entry of entries) {
    const name = Buffer.from(entry.name);
    const data = Buffer.from(entry.data);
    const crc = crc32(data);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(data.length, 22);
    local.writeUInt16LE(name.length, 26);
    locals.push(local, name, data);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE(0x031e, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt32LE(crc, 16);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(data.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt32LE(((0o100000 | entry.mode) << 16) >>> 0, 38);
    central.writeUInt32LE(offset, 42);
    centrals.push(central, name);

    offset += local.length + name.length + data.length;
  }
  const directory = Buffer.concat(centrals);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(entries.length, 8);
  end.writeUInt16LE(entries.length, 10);
  end.writeUInt32LE(directory.length, 12);
  end.writeUInt32LE(offset, 16);
  return Buffer.concat([...locals, directory, end]);
}

describe("extractZip", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "extract-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("unpacks nested files and keeps the executable bit", async () => {
    const archive = path.join(tempDir, "backend.zip");
    await fs.writeFile(
      archive,
      buildZip([
        { name: "build/bin/llama-server", data: "#!/bin/sh\n", mode: 0o755 },
        { name: "build/bin/README.txt", data: "hello", mode: 0o644 },
      ])
    );
    const dest = path.join(tempDir, "out");

    await extractZip(archive, dest);

    const server = path.join(dest, "build", "bin", "llama-server");
    expect(await fs.readFile(server, "utf-8")).toBe("#!/bin/sh\n");
    expect((await fs.stat(server)).mode & 0o100).toBe(0o100);
    expect(await fs.readFile(path.join(dest, "build", "bin", "README.txt"), "utf-8")).toBe("hello");
  });

  it("refuses entries that climb out of the destination", async () => {
    const archive = path.join(tempDir, "evil.zip");
    await fs.writeFile(archive, buildZip([{ name: "../escaped.txt", data: "x", mode: 0o644 }]));
    const dest = path.join(tempDir, "out");

    await expect(extractZip(archive, dest)).rejects.toThrow(`Archive entry escapes ${dest}: ../escaped.txt`);
    await expect(fs.access(path.join(tempDir, "escaped.txt"))).rejects.toThrow();
  });
});

describe("findLatestCudaVersion", () => {
  it("compares versions numerically", () => {
    expect(
      findLatestCudaVersion([
        "llama-b1-bin-win-cuda-11.7-x64.zip",
        "llama-b1-bin-win-cuda-12.10-x64.zip",
        "llama-b1-bin-win-cuda-12.4-x64.zip",
        "llama-b1-bin-win-cpu-x64.zip",
      ])
    ).toBe("12.10");
  });

  it("returns null without CUDA assets", () => {
    expect(findLatestCudaVersion(["llama-b1-bin-win-cpu-x64.zip"])).toBeNull();
  });
});

describe("selectReleaseAsset", () => {
  it("matches the exact asset name", () => {
    const result = selectReleaseAsset(
      release(["llama-b100-bin-ubuntu-x64.zip", "llama-b100-bin-ubuntu-vulkan-x64.zip"]),
      "vulkan",
      LINUX
    );
    expect(result.success && result.data.asset.name).toBe("llama-b100-bin-ubuntu-vulkan-x64.zip");
  });

  it("accepts the x86_64 and tar.gz spellings", () => {
    const x86 = selectReleaseAsset(release(["llama-b100-bin-ubuntu-x86_64.zip"]), "cpu", LINUX);
    expect(x86.success && x86.data.asset.name).toBe("llama-b100-bin-ubuntu-x86_64.zip");
    const tgz = selectReleaseAsset(release(["llama-b100-bin-ubuntu-x64.tar.gz"]), "cpu", LINUX);
    expect(tgz.success && tgz.data.asset.name).toBe("llama-b100-bin-ubuntu-x64.tar.gz");
  });

  it("picks the newest CUDA build", () => {
    const result = selectReleaseAsset(
      release([
        "llama-b100-bin-win-cuda-12.4-x64.zip",
        "llama-b100-bin-win-cuda-11.7-x64.zip",
        "cudart-llama-bin-win-cuda-12.4-x64.zip",
      ]),
      "cuda",
      WINDOWS
    );
    expect(result).toEqual({
      success: true,
      data: {
        asset: {
          name: "llama-b100-bin-win-cuda-12.4-x64.zip",
          browser_download_url: "http://example.invalid/llama-b100-bin-win-cuda-12.4-x64.zip",
          size: 1,
        },
        cudaVersion: "12.4",
      },
    });
  });

  it("falls back to a fuzzy match for renamed assets", () => {
    const result = selectReleaseAsset(release(["llama-b100-bin-ubuntu-vulkan-x64-static.zip"]), "vulkan", LINUX);
    expect(result.success && result.data.asset.name).toBe("llama-b100-bin-ubuntu-vulkan-x64-static.zip");
  });

  it("rejects backends not published for the platform", () => {
    expect(selectReleaseAsset(release([]), "metal", LINUX)).toEqual({
      success: false,
      error: "Backend metal is not available for linux/x64",
    });
  });

  it("fails when no asset matches", () => {
    const result = selectReleaseAsset(release(["other.zip"]), "cpu", LINUX);
    expect(result).toEqual({
      success: false,
      error: "Asset not found for cpu. Looking for llama-b100-bin-ubuntu-x64.zip; release has: other.zip",
    });
  });
});

describe("BackendInstaller", () => {
  const ASSET = "llama-b100-bin-ubuntu-x64.zip";
  const PAYLOAD = Buffer.alloc(1000, 7);

  let tempDir: string;
  let server: http.Server;
  let baseUrl: string;
  let extracted: string[];
  let installer: BackendInstaller;

  const extractor: ArchiveExtractor = async (archivePath, destDir) => {
    extracted.push(path.basename(archivePath));
    const bin = path.join(destDir, "build", "bin");
    await fs.mkdir(bin, { recursive: true });
    await fs.writeFile(path.join(bin, "llama-server"), "#!/bin/sh\n");
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "installer-test-"));
    extracted = [];
    server = http.createServer((req, res) => {
      if (req.url === "/release") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(
          JSON.stringify({
            tag_name: "b100",
            assets: [{ name: ASSET, browser_download_url: `${baseUrl}/asset`, size: PAYLOAD.length }],
          })
        );
        return;
      }
      if (req.url === "/asset") {
        res.writeHead(200, { "Content-Length": String(PAYLOAD.length) });
        res.end(PAYLOAD);
        return;
      }
      res.writeHead(404);
      res.end();
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
    installer = new BackendInstaller({
      backendsDir: path.join(tempDir, "backends"),
      downloadsDir: path.join(tempDir, "downloads"),
      releaseUrl: `${baseUrl}/release`,
      extractor,
      target: LINUX,
    });
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("downloads, extracts and writes the marker", async () => {
    const progress: Array<[number, string]> = [];
    const result = await installer.install("cpu", { onProgress: (p, m) => progress.push([p, m]) });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toMatchObject({ version: "b100", backendId: "cpu", assetName: ASSET, platform: "linux", arch: "x64" });
    expect(await installer.readMarker("cpu")).toEqual(result.data);
    expect(extracted).toEqual([ASSET]);
    expect((await fs.readFile(path.join(tempDir, "downloads", ASSET))).length).toBe(1000);

    expect(progress[0]).toEqual([5, "Fetching release information..."]);
    expect(progress[1]).toEqual([10, "Downloading llama-b100-bin-ubuntu-x64.zip (0.0 MB)..."]);
    expect(progress.slice(-3)).toEqual([
      [70, "Extracting files..."],
      [90, "Writing install marker..."],
      [100, "cpu installed successfully!"],
    ]);
    const percents = progress.map(([p]) => p);
    expect([...percents].sort((a, b) => a - b)).toEqual(percents);
  });

  it("stops between chunks when cancelled and leaves nothing behind", async () => {
    const controller = new AbortController();
    const result = await installer.install("cpu", {
      signal: controller.signal,
      onProgress: (percent) => {
        if (percent === 10) controller.abort();
      },
    });

    expect(result).toEqual({
      success: false,
      error: { kind: "cancelled", message: "Installation of cpu was cancelled" },
    });
    expect(extracted).toEqual([]);
    expect(await installer.readMarker("cpu")).toBeNull();
    await expect(fs.access(path.join(tempDir, "downloads", ASSET))).rejects.toThrow();
  });

  it("reports a backend with no asset as an install failure", async () => {
    const result = await installer.install("metal");
    expect(result).toEqual({
      success: false,
      error: { kind: "install", message: "Backend metal is not available for linux/x64" },
    });
  });

  it("uninstalls and refuses to uninstall twice", async () => {
    await installer.install("cpu");
    expect(await installer.uninstall("cpu")).toEqual({ success: true, data: undefined });
    expect(await installer.uninstall("cpu")).toEqual({
      success: false,
      error: { kind: "install", message: "Backend cpu is not installed" },
    });
  });
});
