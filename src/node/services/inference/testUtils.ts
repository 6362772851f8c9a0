/**
 * In-process stand-ins for native servers, used by the inference tests.
 */

import * as http from "http";
import * as readline from "readline";
import { PassThrough } from "stream";
import { Ok } from "@/common/types/result";
import { isRecord } from "./payloads";
import type { ProcessSpawner, SpawnedServer } from "./processControl";
import type { ServerBackendResolver } from "./serverOrchestrator";
import type { WorkerHandle, WorkerSpawner } from "./workerProcess";
import type { Backend, ChatMessage } from "./types";

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
  authorization: string | undefined;
}

export interface FakeLlamaServerOptions {
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  /** Text returned by /v1/completions. */
  completionText?: (prompt: string) => string;
  /** Text returned by /v1/chat/completions. */
  chatText?: (messages: ChatMessage[]) => string;
  /** When false, /tokenize answers 404. */
  tokenize?: boolean;
  /** Status code for GET /health. */
  healthStatus?: number;
  /** Delay before answering generation requests. */
  generationDelayMs?: number;
}

export interface FakeLlamaServer {
  readonly port: number;
  readonly url: string;
  readonly requests: RecordedRequest[];
  setHealthStatus(status: number): void;
  close(): Promise<void>;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString("utf-8");
      if (!text) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch (error) {
        reject(error);
      }
    });
    req.on("error", reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/** Split "a b c" into ["a", " b", " c"] so the pieces concatenate back. */
export function splitPieces(text: string): string[] {
  return text.split(/(?= )/).filter((piece) => piece.length > 0);
}

function chatMessages(body: unknown): ChatMessage[] {
  if (!isRecord(body) || !Array.isArray(body.messages)) return [];
  const messages: ChatMessage[] = [];
  for (const m of body.messages) {
    if (isRecord(m) && typeof m.content === "string" && (m.role === "system" || m.role === "user" || m.role === "assistant")) {
      messages.push({ role: m.role, content: m.content });
    }
  }
  return messages;
}

function usage(prompt: number, completion: number) {
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: prompt + completion };
}

/**
 * A tiny OpenAI-compatible server speaking the llama-server endpoints.
 */
export async function startFakeLlamaServer(options: FakeLlamaServerOptions = {}): Promise<FakeLlamaServer> {
  const requests: RecordedRequest[] = [];
  let healthStatus = options.healthStatus ?? 200;
  const completionText = options.completionText ?? ((prompt: string) => `echo ${prompt}`);
  const chatText =
    options.chatText ?? ((messages: ChatMessage[]) => `reply to ${messages[messages.length - 1]?.content ?? ""}`);

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const body = await readBody(req);
    const path = req.url ?? "/";
    requests.push({ method: req.method ?? "GET", path, body, authorization: req.headers.authorization });

    if (req.method === "GET" && path === "/health") {
      sendJson(res, healthStatus, healthStatus === 200 ? { status: "ok" } : { status: "loading model" });
      return;
    }
    if (req.method === "GET" && path === "/info") {
      sendJson(res, 200, { build: "fake" });
      return;
    }
    if (req.method === "GET" && path === "/metrics") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("llamacpp:requests_processing 0\n");
      return;
    }
    if (req.method === "GET" && path === "/v1/models") {
      sendJson(res, 200, { object: "list", data: [{ id: "fake", object: "model", created: 0, owned_by: "test" }] });
      return;
    }
    if (req.method === "POST" && path === "/tokenize") {
      if (options.tokenize === false) {
        sendJson(res, 404, { error: "not found" });
        return;
      }
      const content = isRecord(body) && typeof body.content === "string" ? body.content : "";
      sendJson(res, 200, { tokens: splitPieces(content).map((_, i) => i + 1) });
      return;
    }
    if (req.method === "POST" && path === "/v1/embeddings") {
      sendJson(res, 200, {
        object: "list",
        model: "fake",
        data: [{ object: "embedding", index: 0, embedding: [0.25, 0.5, 0.75] }],
      });
      return;
    }

    const isCompletion = path === "/v1/completions";
    const isChat = path === "/v1/chat/completions";
    if (req.method !== "POST" || (!isCompletion && !isChat)) {
      sendJson(res, 404, { error: "not found" });
      return;
    }

    if (options.generationDelayMs) await sleep(options.generationDelayMs);
    const prompt = isRecord(body) && typeof body.prompt === "string" ? body.prompt : "";
    const text = isCompletion ? completionText(prompt) : chatText(chatMessages(body));
    const pieces = splitPieces(text);
    const stream = isRecord(body) && body.stream === true;

    if (!stream) {
      const choice = isCompletion
        ? { index: 0, text, finish_reason: "stop" }
        : { index: 0, message: { role: "assistant", content: text }, finish_reason: "stop" };
      sendJson(res, 200, {
        id: "cmpl-1",
        object: isCompletion ? "text_completion" : "chat.completion",
        created: 0,
        model: "fake",
        choices: [choice],
        usage: usage(3, pieces.length),
      });
      return;
    }

    res.writeHead(200, { "Content-Type": "text/event-stream" });
    const frame = (payload: unknown) => res.write(`data: ${JSON.stringify(payload)}\n\n`);
    const base = { id: "cmpl-1", object: "chunk", created: 0, model: "fake" };
    if (isChat) {
      frame({ ...base, choices: [{ index: 0, delta: { role: "assistant" }, finish_reason: null }] });
    }
    for (const piece of pieces) {
      frame({
        ...base,
        choices: [
          isCompletion
            ? { index: 0, text: piece, finish_reason: null }
            : { index: 0, delta: { content: piece }, finish_reason: null },
        ],
      });
    }
    frame({ ...base, choices: [], usage: usage(3, pieces.length) });
    res.end("data: [DONE]\n\n");
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch(() => sendJson(res, 500, { error: "bad request" }));
  });
  const host = options.host ?? "127.0.0.1";
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? 0, host, () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("fake server has no TCP address");
  }
  const port = address.port;

  return {
    port,
    url: `http://${host}:${port}`,
    requests,
    setHealthStatus(status: number) {
      healthStatus = status;
    },
    close: () =>
      new Promise<void>((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  };
}

// ─── Fake processes ─────────────────────────────────────────────────────

export type FakeServerBehavior = "healthy" | "exit-immediately" | "never-healthy" | "ignore-sigterm";

export interface SpawnCall {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  cwd: string | undefined;
}

let nextFakePid = 50_000;

/**
 * A SpawnedServer whose "process" is an in-process fake llama server listening
 * on the port from the argv.
 */
export class FakeServerProcess implements SpawnedServer {
  readonly pid = nextFakePid++;
  exitCode: number | null = null;
  readonly signals: NodeJS.Signals[] = [];
  server: FakeLlamaServer | null = null;
  private exited = false;
  private readonly listeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];
  private readonly exitWaiters: Array<() => void> = [];

  constructor(
    private readonly behavior: FakeServerBehavior,
    private readonly stderr = ""
  ) {}

  hasExited(): boolean {
    return this.exited;
  }

  stderrTail(): string {
    return this.stderr;
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.listeners.push(listener);
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.behavior === "ignore-sigterm") return;
    this.exit(null, signal);
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exited) return Promise.resolve(true);
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      this.exitWaiters.push(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  /** Simulate the process dying on its own. */
  crash(code: number): void {
    this.exit(code, null);
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = true;
    this.exitCode = code;
    const server = this.server;
    this.server = null;
    const notify = () => {
      for (const listener of this.listeners) listener(code, signal);
      for (const waiter of this.exitWaiters.splice(0)) waiter();
    };
    if (server) {
      server.close().then(notify, notify);
    } else {
      notify();
    }
  }
}

function argValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i === -1 ? undefined : args[i + 1];
}

export interface FakeSpawner {
  spawner: ProcessSpawner;
  calls: SpawnCall[];
  processes: FakeServerProcess[];
  /** Behavior of the next spawned process; defaults to healthy. */
  nextBehavior: FakeServerBehavior;
  /** Close every fake server still listening. */
  closeAll(): Promise<void>;
}

export function createFakeSpawner(serverOptions: Omit<FakeLlamaServerOptions, "port" | "host"> = {}): FakeSpawner {
  const fake: FakeSpawner = {
    calls: [],
    processes: [],
    nextBehavior: "healthy",
    spawner: (command, args, options) => {
      fake.calls.push({ command, args, env: options.env, cwd: options.cwd });
      const behavior = fake.nextBehavior;
      const proc = new FakeServerProcess(behavior, behavior === "exit-immediately" ? "error: model load failed" : "");
      fake.processes.push(proc);

      if (behavior === "exit-immediately") {
        proc.crash(1);
      } else {
        const port = Number(argValue(args, "--port"));
        const host = argValue(args, "--host");
        startFakeLlamaServer({
          ...serverOptions,
          host,
          port,
          healthStatus: behavior === "never-healthy" ? 503 : 200,
        }).then(
          (server) => {
            if (proc.hasExited()) {
              server.close().catch(() => undefined);
            } else {
              proc.server = server;
            }
          },
          () => proc.crash(1)
        );
      }
      return Ok(proc);
    },
    closeAll: async () => {
      await Promise.all(
        fake.processes.map(async (proc) => {
          const server = proc.server;
          proc.server = null;
          if (server) await server.close();
        })
      );
    },
  };
  return fake;
}

// ─── Backends ───────────────────────────────────────────────────────────

export const TEST_CPU_BACKEND: Backend = {
  id: "cpu",
  displayName: "CPU",
  description: "test backend",
  requiresGpu: false,
  installed: true,
  installedVersion: "b100",
  installPath: "/opt/backends/cpu",
};

/**
 * A backend resolver with one installed backend whose server lives at
 * `executable` (null: nothing installed).
 */
export function stubBackendResolver(
  executable: string | null,
  backend: Backend = TEST_CPU_BACKEND
): ServerBackendResolver {
  return {
    getActive: () => Promise.resolve(executable ? backend : null),
    getBackend: (backendId: string) =>
      Promise.resolve(backendId === backend.id ? backend : { ...backend, id: backendId, installed: false, installPath: null }),
    getServerExecutable: (backendId?: string) =>
      Promise.resolve(backendId === undefined || backendId === backend.id ? executable : null),
    buildLaunchEnv: (_backend: Backend, baseEnv: NodeJS.ProcessEnv = {}) => ({ ...baseEnv, TEST_BACKEND: backend.id }),
  };
}

// ─── Fake workers ───────────────────────────────────────────────────────

export interface FakeWorkerOptions {
  /** How the worker answers `health`: ok, a non-ok status, or never. */
  health?: "ok" | "loading" | "silent";
  /** Error reported mid-stream by `generate_stream`. */
  streamError?: string;
  /** Keep running after a `shutdown` request. */
  ignoreShutdown?: boolean;
}

export interface ReceivedRpc {
  id: number;
  method: string;
  params: unknown;
}

function lastContent(params: unknown): string {
  if (!isRecord(params)) return "";
  if (typeof params.prompt === "string") return params.prompt;
  const messages = chatMessages(params);
  return messages[messages.length - 1]?.content ?? "";
}

/**
 * A worker "process" made of in-memory pipes that speaks the JSON-RPC
 * worker protocol.
 */
export class FakeWorker implements WorkerHandle {
  readonly pid = nextFakePid++;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly received: ReceivedRpc[] = [];
  readonly signals: NodeJS.Signals[] = [];
  private exited = false;
  private exitCode: number | null = null;
  private readonly listeners: Array<(code: number | null) => void> = [];

  constructor(private readonly options: FakeWorkerOptions = {}) {
    const rl = readline.createInterface({ input: this.stdin, crlfDelay: Infinity });
    rl.on("line", (line) => this.handleLine(line));
  }

  hasExited(): boolean {
    return this.exited;
  }

  onExit(listener: (code: number | null) => void): void {
    if (this.exited) listener(this.exitCode);
    else this.listeners.push(listener);
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    this.exit(null);
  }

  crash(code: number): void {
    this.exit(code);
  }

  private exit(code: number | null): void {
    if (this.exited) return;
    this.exited = true;
    this.exitCode = code;
    this.stdout.end();
    this.stderr.end();
    for (const listener of this.listeners.splice(0)) listener(code);
  }

  private send(payload: unknown): void {
    if (!this.exited) this.stdout.write(JSON.stringify(payload) + "\n");
  }

  private handleLine(line: string): void {
    const parsed: unknown = JSON.parse(line);
    if (!isRecord(parsed) || typeof parsed.id !== "number" || typeof parsed.method !== "string") return;
    const { id, method } = parsed;
    this.received.push({ id, method, params: parsed.params });
    const reply = (result: unknown) => this.send({ jsonrpc: "2.0", id, result });

    switch (method) {
      case "health":
        if (this.options.health === "silent") return;
        this.stderr.write("loading model\n");
        reply({ status: this.options.health === "loading" ? "loading" : "ok" });
        return;
      case "complete":
        reply({ text: `done: ${lastContent(parsed.params)}` });
        return;
      case "chat":
        reply({ message: { role: "assistant", content: `chat: ${lastContent(parsed.params)}` } });
        return;
      case "generate_stream": {
        reply({ started: true });
        const pieces = splitPieces(`stream: ${lastContent(parsed.params)}`);
        for (const piece of pieces) this.send({ token: piece, done: false });
        if (this.options.streamError) {
          this.send({ token: "", done: true, error: this.options.streamError });
        } else {
          this.send({ token: "", done: true });
        }
        return;
      }
      case "shutdown":
        if (!this.options.ignoreShutdown) this.exit(0);
        return;
      default:
        this.send({ jsonrpc: "2.0", id, error: { code: -32601, message: `Unknown method ${method}` } });
    }
  }
}

export interface FakeWorkerSpawner {
  spawner: WorkerSpawner;
  workers: FakeWorker[];
  calls: Array<{ command: string; args: string[]; env: NodeJS.ProcessEnv }>;
}

export function createFakeWorkerSpawner(options: FakeWorkerOptions = {}): FakeWorkerSpawner {
  const fake: FakeWorkerSpawner = {
    workers: [],
    calls: [],
    spawner: (command, args, env) => {
      fake.calls.push({ command, args, env });
      const worker = new FakeWorker(options);
      fake.workers.push(worker);
      return worker;
    },
  };
  return fake;
}
