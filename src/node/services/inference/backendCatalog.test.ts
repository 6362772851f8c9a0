import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import * as fs from "fs/promises";
import * as http from "http";
import * as os from "os";
import * as path from "path";
import { BackendCatalog } from "./backendCatalog";
import { BackendInstaller } from "./backendInstaller";
import type { PlatformTarget } from "./backendTable";

describe("BackendCatalog", () => {
  let tempDir: string;
  let backendsDir: string;

  const catalogFor = (target: PlatformTarget, releaseUrl?: string) =>
    new BackendCatalog({
      backendsDir,
      target,
      installer: new BackendInstaller({
        backendsDir,
        downloadsDir: path.join(tempDir, "downloads"),
        releaseUrl,
        target,
        extractor: () => Promise.resolve(),
      }),
    });

  async function install(id: string, exeRelative: string | null, version = "b100"): Promise<string> {
    const dir = path.join(backendsDir, id);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(
      path.join(dir, "installed.json"),
      JSON.stringify({
        version,
        backendId: id,
        assetName: `${id}.zip`,
        installedDate: "2026-01-01T00:00:00.000Z",
        platform: "linux",
        arch: "x64",
      })
    );
    if (exeRelative === null) return dir;
    const exe = path.join(dir, exeRelative);
    await fs.mkdir(path.dirname(exe), { recursive: true });
    await fs.writeFile(exe, "");
    return exe;
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "catalog-test-"));
    backendsDir = path.join(tempDir, "backends");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("lists what is published for the platform with installed state", async () => {
    await install("vulkan", "bin/llama-server");
    const catalog = catalogFor({ platform: "linux", arch: "x64" });
    const available = await catalog.listAvailable();
    expect(available.map((b) => [b.id, b.installed, b.installedVersion])).toEqual([
      ["cpu", false, null],
      ["vulkan", true, "b100"],
    ]);
  });

  it("returns nothing installed when the directory is missing", async () => {
    const catalog = catalogFor({ platform: "linux", arch: "x64" });
    expect(await catalog.listInstalled()).toEqual([]);
    expect(await catalog.getActive()).toBeNull();
    expect(await catalog.getServerExecutable()).toBeNull();
  });

  it("only counts directories with a valid marker", async () => {
    await install("cpu", null);
    await fs.mkdir(path.join(backendsDir, "broken"), { recursive: true });
    await fs.writeFile(path.join(backendsDir, "broken", "installed.json"), "{");
    await fs.mkdir(path.join(backendsDir, "empty"), { recursive: true });
    const catalog = catalogFor({ platform: "linux", arch: "x64" });
    expect((await catalog.listInstalled()).map((b) => b.id)).toEqual(["cpu"]);
  });

  it("prefers a GPU backend as active", async () => {
    await install("cpu", "llama-server");
    await install("vulkan", "bin/llama-server");
    const catalog = catalogFor({ platform: "linux", arch: "x64" });
    expect((await catalog.listInstalled()).map((b) => b.id)).toEqual(["vulkan", "cpu"]);
    expect((await catalog.getActive())?.id).toBe("vulkan");
  });

  it("finds the executable in bin/, the root, or nested", async () => {
    const inBin = await install("vulkan", "bin/llama-server");
    const atRoot = await install("cpu", "llama-server");
    const nested = await install("hip", "build/release/bin/llama-server");
    const catalog = catalogFor({ platform: "linux", arch: "x64" });
    expect(await catalog.getServerExecutable("vulkan")).toBe(inBin);
    expect(await catalog.getServerExecutable("cpu")).toBe(atRoot);
    expect(await catalog.getServerExecutable("hip")).toBe(nested);
    expect(await catalog.getServerExecutable()).toBe(inBin);
  });

  it("returns null for an installed backend without an executable", async () => {
    await install("cpu", null);
    const catalog = catalogFor({ platform: "linux", arch: "x64" });
    expect(await catalog.getServerExecutable("cpu")).toBeNull();
    expect(await catalog.getServerExecutable("vulkan")).toBeNull();
  });

  it("recommends per platform", () => {
    expect(catalogFor({ platform: "win32", arch: "x64" }).recommendationOrder()).toEqual([
      "cuda",
      "vulkan",
      "hip",
      "sycl",
      "cpu",
    ]);
    expect(catalogFor({ platform: "darwin", arch: "arm64" }).getRecommended()).toBe("metal");
    expect(catalogFor({ platform: "linux", arch: "x64" }).getRecommended()).toBe("vulkan");
    expect(catalogFor({ platform: "linux", arch: "s390x" }).getRecommended()).toBe("cpu");
    expect(catalogFor({ platform: "win32", arch: "arm64" }).getRecommended()).toBe("cpu");
  });

  it("puts CUDA and HIP install dirs on the library path", async () => {
    const linux = catalogFor({ platform: "linux", arch: "x64" });
    const hip = await linux.getBackend("hip");
    expect(hip.installPath).toBeNull();

    await install("hip", null);
    const installed = await linux.getBackend("hip");
    const env = linux.buildLaunchEnv(installed, { LD_LIBRARY_PATH: "/usr/lib" });
    expect(env.LD_LIBRARY_PATH).toBe(`${path.join(backendsDir, "hip")}:/usr/lib`);

    const cpuEnv = linux.buildLaunchEnv(await linux.getBackend("cpu"), { LD_LIBRARY_PATH: "/usr/lib" });
    expect(cpuEnv).toEqual({ LD_LIBRARY_PATH: "/usr/lib" });

    await install("cuda", null);
    const windows = catalogFor({ platform: "win32", arch: "x64" });
    const winEnv = windows.buildLaunchEnv(await windows.getBackend("cuda"), {});
    expect(winEnv.PATH).toBe(path.join(backendsDir, "cuda"));
  });

  it("uninstalls a backend", async () => {
    await install("cpu", "llama-server");
    const catalog = catalogFor({ platform: "linux", arch: "x64" });
    expect(await catalog.uninstall("cpu")).toEqual({ success: true, data: undefined });
    expect(await catalog.listInstalled()).toEqual([]);
  });

  describe("checkForUpdates", () => {
    let server: http.Server;
    let baseUrl: string;

    beforeEach(async () => {
      server = http.createServer((req, res) => {
        if (req.url !== "/release") {
          res.writeHead(404);
          res.end();
          return;
        }
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ tag_name: "b200", assets: [] }));
      });
      await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
      const address = server.address();
      if (address === null || typeof address === "string") throw new Error("no port");
      baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it("lists installed backends behind the latest release", async () => {
      await install("cpu", "llama-server", "b100");
      await install("vulkan", "bin/llama-server", "b200");
      const catalog = catalogFor({ platform: "linux", arch: "x64" }, `${baseUrl}/release`);

      expect(await catalog.checkForUpdates()).toEqual({
        success: true,
        data: [{ backendId: "cpu", currentVersion: "b100", latestVersion: "b200" }],
      });
    });

    it("passes on a failed release lookup", async () => {
      await install("cpu", "llama-server", "b100");
      const catalog = catalogFor({ platform: "linux", arch: "x64" }, `${baseUrl}/missing`);

      expect(await catalog.checkForUpdates()).toEqual({
        success: false,
        error: { kind: "install", message: "Release lookup returned HTTP 404" },
      });
    });
  });
});
