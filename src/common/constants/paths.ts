import { homedir } from "os";
import { join } from "path";

const INFERHOST_DIR_NAME = ".inferhost";

/**
 * Get the root directory for all inferhost configuration and state.
 * Can be overridden with the INFERHOST_ROOT env var.
 * Appends '-dev' suffix when NODE_ENV=development.
 *
 * This is a getter function to support test mocking of os.homedir().
 */
export function getInferhostHome(): string {
  if (process.env.INFERHOST_ROOT) {
    return process.env.INFERHOST_ROOT;
  }

  const suffix = process.env.NODE_ENV === "development" ? "-dev" : "";
  return join(homedir(), INFERHOST_DIR_NAME + suffix);
}

/**
 * Get the main configuration file path.
 * Example: ~/.inferhost/config.jsonc
 *
 * @param rootDir - Optional root directory (defaults to getInferhostHome())
 */
export function getConfigFile(rootDir?: string): string {
  return join(rootDir ?? getInferhostHome(), "config.jsonc");
}

/**
 * Get the file holding the table of spawned servers, used for orphan cleanup.
 * Example: ~/.inferhost/server_state.json
 */
export function getServerStateFile(rootDir?: string): string {
  return join(rootDir ?? getInferhostHome(), "server_state.json");
}

/**
 * Get the directory where backend builds are installed, one subdirectory per backend id.
 * Example: ~/.inferhost/backends/vulkan/bin/llama-server
 */
export function getBackendsDir(rootDir?: string): string {
  return join(rootDir ?? getInferhostHome(), "backends");
}

/**
 * Get the directory where downloaded backend archives are kept before extraction.
 */
export function getDownloadsDir(rootDir?: string): string {
  return join(rootDir ?? getInferhostHome(), "downloads");
}

/**
 * Get the default local model directory.
 * Example: ~/.inferhost/models/llama-3.2-3b-instruct-q4_k_m.gguf
 */
export function getModelsDir(rootDir?: string): string {
  return join(rootDir ?? getInferhostHome(), "models");
}
