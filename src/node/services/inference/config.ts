import * as fs from "fs";
import * as jsonc from "jsonc-parser";
import { z } from "zod";
import { getConfigFile } from "@/common/constants/paths";
import { parseIntEnv } from "@/common/utils/env";
import { getErrorCode, getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";
import { DEFAULT_RELEASE_URL } from "./backendInstaller";
import { PORT_RANGE_END, PORT_RANGE_START } from "./portAllocator";
import { DEFAULT_HOST } from "./serverArgs";
import {
  DEFAULT_HEALTH_POLL_INTERVAL_MS,
  DEFAULT_STALENESS_MS,
  DEFAULT_STARTUP_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_MS,
} from "./serverOrchestrator";

/**
 * Shape of `<home>/config.jsonc`. Every field is optional in the file.
 */
export const InferhostConfigSchema = z
  .object({
    host: z.string().min(1).default(DEFAULT_HOST),
    portRangeStart: z.number().int().min(1).max(65535).default(PORT_RANGE_START),
    portRangeEnd: z.number().int().min(2).max(65536).default(PORT_RANGE_END),
    startupTimeoutMs: z.number().int().positive().default(DEFAULT_STARTUP_TIMEOUT_MS),
    healthPollIntervalMs: z.number().int().positive().default(DEFAULT_HEALTH_POLL_INTERVAL_MS),
    stopGraceMs: z.number().int().nonnegative().default(DEFAULT_STOP_GRACE_MS),
    stalenessMs: z.number().int().nonnegative().default(DEFAULT_STALENESS_MS),
    releaseUrl: z.string().url().default(DEFAULT_RELEASE_URL),
    modelsDir: z.string().min(1).optional(),
    workerCommand: z.array(z.string().min(1)).min(1).optional(),
  })
  .refine((c) => c.portRangeEnd > c.portRangeStart, {
    message: "portRangeEnd must be greater than portRangeStart",
    path: ["portRangeEnd"],
  });

export type InferhostConfig = z.output<typeof InferhostConfigSchema>;

export function defaultConfig(): InferhostConfig {
  return InferhostConfigSchema.parse({});
}

/** INFERHOST_HOST and INFERHOST_STARTUP_TIMEOUT_MS win over the file. */
export function applyEnvOverrides(config: InferhostConfig, env: NodeJS.ProcessEnv = process.env): InferhostConfig {
  const next = { ...config };
  const host = env.INFERHOST_HOST?.trim();
  if (host) next.host = host;
  const startupTimeoutMs = parseIntEnv(env.INFERHOST_STARTUP_TIMEOUT_MS);
  if (startupTimeoutMs !== undefined && startupTimeoutMs > 0) {
    next.startupTimeoutMs = startupTimeoutMs;
  }
  return next;
}

/**
 * Parse config text. Comments and trailing commas are allowed; a document
 * with nothing but whitespace and comments means all defaults.
 */
export function parseConfigText(text: string): InferhostConfig {
  if (!jsonc.stripComments(text).trim()) {
    return InferhostConfigSchema.parse({});
  }

  const errors: jsonc.ParseError[] = [];
  const raw: unknown = jsonc.parse(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new Error(`Invalid JSONC at offset ${first.offset}: ${jsonc.printParseErrorCode(first.error)}`);
  }

  const parsed = InferhostConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid config: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Load the config file, falling back to defaults when it is missing or broken.
 * Environment overrides are applied last.
 */
export async function loadConfig(
  filePath: string = getConfigFile(),
  env: NodeJS.ProcessEnv = process.env
): Promise<InferhostConfig> {
  let config: InferhostConfig;
  try {
    const text = await fs.promises.readFile(filePath, "utf-8");
    config = parseConfigText(text);
  } catch (error) {
    if (getErrorCode(error) !== "ENOENT") {
      log.warn(`[config] Ignoring ${filePath}: ${getErrorMessage(error)}`);
    }
    config = defaultConfig();
  }
  return applyEnvOverrides(config, env);
}
