import { dirname } from "path";
import { mkdir, readFile, rm } from "fs/promises";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { log } from "@/node/services/log";
import { getErrorCode } from "@/common/utils/errors";
import { isRecord } from "./payloads";
import type { PersistedServerState, ServerInstance } from "./types";

export const ServerInstanceSchema = z.object({
  modelId: z.string().min(1),
  modelPath: z.string(),
  host: z.string(),
  port: z.number().int().min(0).max(65535),
  pid: z.number().int().positive(),
  status: z.enum(["starting", "running", "unhealthy", "stopped"]),
  backendId: z.string(),
  startedAt: z.string(),
  contextSize: z.number().int(),
  gpuLayers: z.number().int(),
  // Written by older builds without the field
  lastHealthyAt: z.number().default(0),
});

/**
 * Persists the table of running servers at <home>/server_state.json.
 *
 * The file exists so the next launch can find servers a crashed process left
 * behind. Reads never fail: a missing or unreadable file is an empty table,
 * and an entry that does not validate is dropped on its own.
 */
export class ServerStateStore {
  constructor(private readonly filePath: string) {}

  getPath(): string {
    return this.filePath;
  }

  async read(): Promise<PersistedServerState> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (getErrorCode(error) !== "ENOENT") {
        log.warn(`[inference/state] cannot read ${this.filePath}:`, error);
      }
      return { servers: {} };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      log.warn(`[inference/state] ${this.filePath} is not valid JSON; ignoring it`);
      return { servers: {} };
    }

    if (!isRecord(parsed) || !isRecord(parsed.servers)) {
      log.warn(`[inference/state] ${this.filePath} has no servers table; ignoring it`);
      return { servers: {} };
    }

    const servers: Record<string, ServerInstance> = {};
    for (const [modelId, entry] of Object.entries(parsed.servers)) {
      const result = ServerInstanceSchema.safeParse(entry);
      if (result.success) {
        servers[modelId] = result.data;
      } else {
        log.warn(`[inference/state] dropping invalid entry for ${modelId}`);
      }
    }
    return { servers };
  }

  async write(state: PersistedServerState): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, JSON.stringify(state, null, 2), "utf-8");
  }

  async clear(): Promise<void> {
    await this.write({ servers: {} });
  }

  async remove(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
