/**
 * Local model registry: maps a model id to a GGUF file on disk.
 *
 * The control plane only needs `resolvePath`; discovery and download of
 * remote models live elsewhere.
 */

import type { Dirent } from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import { getErrorCode } from "@/common/utils/errors";

export interface LocalModel {
  id: string;
  path: string;
  sizeBytes: number;
}

export interface LocalModelRegistry {
  /** Absolute path of the model file, or null when the id is unknown. */
  resolvePath(modelId: string): Promise<string | null>;
  list(): Promise<LocalModel[]>;
}

const MODEL_EXTENSION = ".gguf";

/**
 * Scans a directory for models. Two layouts are recognised:
 *
 *   <dir>/llama-3.2-3b-q4.gguf              → id "llama-3.2-3b-q4"
 *   <dir>/org--repo/model-q4_k_m.gguf       → id "org/repo"
 *
 * In the second layout the first .gguf file (by name) is the model.
 */
export class DirectoryModelRegistry implements LocalModelRegistry {
  constructor(private readonly modelsDir: string) {}

  getModelsDir(): string {
    return this.modelsDir;
  }

  async list(): Promise<LocalModel[]> {
    let entries: Dirent[];
    try {
      entries = await fsp.readdir(this.modelsDir, { withFileTypes: true });
    } catch (err) {
      if (getErrorCode(err) === "ENOENT") return [];
      throw err;
    }

    const models: LocalModel[] = [];
    for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
      const fullPath = path.join(this.modelsDir, entry.name);
      if (entry.isFile() && entry.name.toLowerCase().endsWith(MODEL_EXTENSION)) {
        models.push({
          id: entry.name.slice(0, -MODEL_EXTENSION.length),
          path: fullPath,
          sizeBytes: await fileSize(fullPath),
        });
      } else if (entry.isDirectory()) {
        const file = await firstModelFile(fullPath);
        if (file) {
          models.push({ id: denormalizeModelID(entry.name), path: file, sizeBytes: await fileSize(file) });
        }
      }
    }
    return models;
  }

  async resolvePath(modelId: string): Promise<string | null> {
    // An explicit path to an existing model file is taken as-is
    if (path.isAbsolute(modelId) && (await fileSize(modelId)) > 0) {
      return modelId;
    }

    const models = await this.list();
    const exact = models.find((m) => m.id === modelId);
    if (exact) return exact.path;

    const needle = modelId.toLowerCase();
    return models.find((m) => m.id.toLowerCase() === needle)?.path ?? null;
  }
}

/**
 * Fixed id → path table, for embedding hosts that manage files themselves.
 */
export class StaticModelRegistry implements LocalModelRegistry {
  private readonly models: Map<string, string>;

  constructor(models: Record<string, string>) {
    this.models = new Map(Object.entries(models));
  }

  register(modelId: string, modelPath: string): void {
    this.models.set(modelId, modelPath);
  }

  resolvePath(modelId: string): Promise<string | null> {
    return Promise.resolve(this.models.get(modelId) ?? null);
  }

  async list(): Promise<LocalModel[]> {
    return Promise.all(
      [...this.models].map(async ([id, modelPath]) => ({
        id,
        path: modelPath,
        sizeBytes: await fileSize(modelPath),
      }))
    );
  }
}

/**
 * Convert HuggingFace-style IDs to filesystem-safe names.
 * "org/Llama-3.2-3B-Instruct-GGUF" → "org--Llama-3.2-3B-Instruct-GGUF"
 */
export function normalizeModelID(id: string): string {
  return id.replace(/\//g, "--");
}

/**
 * Convert filesystem names back to HuggingFace IDs.
 */
export function denormalizeModelID(name: string): string {
  return name.replace("--", "/");
}

async function firstModelFile(dir: string): Promise<string | null> {
  try {
    const names = (await fsp.readdir(dir)).filter((n) => n.toLowerCase().endsWith(MODEL_EXTENSION));
    names.sort();
    return names.length > 0 ? path.join(dir, names[0]) : null;
  } catch {
    return null;
  }
}

async function fileSize(filePath: string): Promise<number> {
  try {
    const stat = await fsp.stat(filePath);
    return stat.isFile() ? stat.size : 0;
  } catch {
    return 0;
  }
}
