/**
 * Thin layer over child_process for native server processes.
 *
 * The orchestrator only talks to `SpawnedServer`, so tests can swap in a fake
 * spawner that never touches the OS.
 */

import { execFile, spawn, type ChildProcess } from "child_process";
import { promisify } from "util";
import { log } from "@/node/services/log";
import { getErrorCode, getErrorMessage } from "@/common/utils/errors";
import { Err, Ok, type Result } from "@/common/types/result";

const execFileAsync = promisify(execFile);

/** Lines of stderr kept for failure reports. */
export const STDERR_TAIL_LINES = 40;

export interface SpawnedServer {
  readonly pid: number;
  /** Exit code, or null while running (or when killed by a signal). */
  readonly exitCode: number | null;
  hasExited(): boolean;
  /** Last lines the process wrote to stderr. */
  stderrTail(): string;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  kill(signal: NodeJS.Signals): void;
  /** Resolves true if the process exited within timeoutMs. */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

export interface SpawnOptions {
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

export type ProcessSpawner = (
  command: string,
  args: string[],
  options: SpawnOptions
) => Result<SpawnedServer>;

/** Force-kill a pid that is not (or no longer) our child. */
export type PidKiller = (pid: number) => Promise<void>;

/**
 * Keeps the last N lines of a stream.
 */
export class LineTail {
  private lines: string[] = [];
  private partial = "";

  constructor(private readonly maxLines: number = STDERR_TAIL_LINES) {}

  push(text: string): string[] {
    const pieces = (this.partial + text).split("\n");
    this.partial = pieces.pop() ?? "";
    const complete = pieces.map((line) => line.replace(/\r$/, "")).filter((line) => line.length > 0);
    this.lines.push(...complete);
    if (this.lines.length > this.maxLines) {
      this.lines.splice(0, this.lines.length - this.maxLines);
    }
    return complete;
  }

  toString(): string {
    const all = this.partial ? [...this.lines, this.partial] : this.lines;
    return all.slice(-this.maxLines).join("\n");
  }
}

/**
 * Spawn a detached, windowless child with both output streams drained.
 * stderr is kept in a tail buffer and mirrored to the debug log.
 */
export const spawnServerProcess: ProcessSpawner = (command, args, options) => {
  let child: ChildProcess;
  try {
    child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: true,
      windowsHide: true,
    });
  } catch (error) {
    return Err(`Failed to spawn ${command}: ${getErrorMessage(error)}`);
  }

  const pid = child.pid;
  if (pid === undefined) {
    // ENOENT and friends surface asynchronously; the error event still needs a listener
    child.once("error", (error) => {
      log.debug(`[inference/process] spawn error: ${error.message}`);
    });
    return Err(`Failed to spawn ${command}: no pid assigned`);
  }

  const tail = new LineTail();
  const serverLog = log.withFields({ pid });

  child.stdout?.on("data", (data: Buffer) => {
    if (serverLog.isDebugMode()) {
      for (const line of data.toString().split("\n")) {
        if (line.trim()) serverLog.debug(`[inference/server] ${line}`);
      }
    }
  });
  child.stderr?.on("data", (data: Buffer) => {
    for (const line of tail.push(data.toString())) {
      serverLog.debug(`[inference/server] ${line}`);
    }
  });

  let exited = false;
  let exitCode: number | null = null;
  const exitListeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];

  const markExited = (code: number | null, signal: NodeJS.Signals | null) => {
    if (exited) return;
    exited = true;
    exitCode = code;
    for (const listener of exitListeners) {
      listener(code, signal);
    }
  };

  child.on("exit", (code, signal) => markExited(code, signal));
  child.on("error", (error) => {
    serverLog.warn(`[inference/server] process error: ${error.message}`);
    if (child.exitCode !== null || child.signalCode !== null) {
      markExited(child.exitCode, child.signalCode);
    }
  });

  const server: SpawnedServer = {
    pid,
    get exitCode() {
      return exitCode;
    },
    hasExited: () => exited,
    stderrTail: () => tail.toString(),
    onExit: (listener) => {
      exitListeners.push(listener);
    },
    kill: (signal) => {
      if (exited) return;
      try {
        child.kill(signal);
      } catch (error) {
        serverLog.debug(`[inference/server] kill(${signal}) failed: ${getErrorMessage(error)}`);
      }
    },
    waitForExit: (timeoutMs) =>
      new Promise<boolean>((resolve) => {
        if (exited) {
          resolve(true);
          return;
        }
        const timer = setTimeout(() => resolve(false), timeoutMs);
        exitListeners.push(() => {
          clearTimeout(timer);
          resolve(true);
        });
      }),
  };

  return Ok(server);
};

/**
 * Check whether a pid refers to a live process.
 * Signal 0 tests existence without delivering anything.
 */
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but belongs to someone else
    return getErrorCode(error) === "EPERM";
  }
}

/**
 * Kill a pid with no ChildProcess handle: `taskkill /F` on Windows, SIGKILL elsewhere.
 * A pid that no longer exists is not an error.
 */
export const forceKillPid: PidKiller = async (pid) => {
  if (process.platform === "win32") {
    try {
      await execFileAsync("taskkill", ["/F", "/PID", String(pid)], { windowsHide: true });
    } catch (error) {
      // taskkill exits 128 when the pid is gone
      log.debug(`[inference/process] taskkill ${pid}: ${getErrorMessage(error)}`);
    }
    return;
  }

  try {
    process.kill(pid, "SIGKILL");
  } catch (error) {
    if (getErrorCode(error) !== "ESRCH") {
      throw error;
    }
  }
};
