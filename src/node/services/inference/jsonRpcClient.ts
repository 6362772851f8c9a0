/**
 * JSON-RPC 2.0 client for a worker process over stdin/stdout.
 *
 * Both directions are newline-delimited JSON. Worker output lines are either
 * RPC responses (carry "jsonrpc", routed by id) or stream tokens (carry
 * "token"/"done", routed to the single stream in flight). Anything else on
 * stdout is logged at debug level and dropped.
 */

import type { Readable, Writable } from "stream";
import * as readline from "readline";
import { log } from "@/node/services/log";
import { isRecord } from "./payloads";
import type { JsonRpcError, JsonRpcRequest, StreamToken } from "./types";

export class JsonRpcRemoteError extends Error {
  constructor(readonly rpcError: JsonRpcError) {
    super(`RPC error [${rpcError.code}]: ${rpcError.message}`);
    this.name = "JsonRpcRemoteError";
  }
}

type WorkerMessage =
  | { type: "response"; id: number; result: unknown; error?: JsonRpcError }
  | { type: "token"; token: StreamToken };

function classify(value: unknown): WorkerMessage | null {
  if (!isRecord(value)) return null;

  if ("jsonrpc" in value) {
    if (typeof value.id !== "number") return null;
    const { error } = value;
    if (!isRecord(error)) return { type: "response", id: value.id, result: value.result };
    return {
      type: "response",
      id: value.id,
      result: value.result,
      error: {
        code: typeof error.code === "number" ? error.code : -32603,
        message: typeof error.message === "string" ? error.message : "Unknown error",
      },
    };
  }

  if ("token" in value || "done" in value) {
    const token: StreamToken = {
      token: typeof value.token === "string" ? value.token : "",
      done: value.done === true,
    };
    if (typeof value.error === "string") token.error = value.error;
    return { type: "token", token };
  }

  return null;
}

/** Buffers tokens until the consumer pulls them. */
class TokenChannel {
  private readonly buffered: StreamToken[] = [];
  private waiter: ((token: StreamToken) => void) | null = null;

  push(token: StreamToken): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(token);
    } else {
      this.buffered.push(token);
    }
  }

  next(): Promise<StreamToken> {
    const token = this.buffered.shift();
    if (token) return Promise.resolve(token);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}

interface Waiter {
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
}

export class JsonRpcClient {
  private lastId = 0;
  private readonly waiters = new Map<number, Waiter>();
  private channel: TokenChannel | null = null;
  private readonly lines: readline.Interface;
  private disposed = false;

  constructor(
    private readonly stdin: Writable,
    stdout: Readable
  ) {
    this.lines = readline.createInterface({ input: stdout, crlfDelay: Infinity });
    this.lines.on("line", (line) => this.onLine(line));
    this.lines.on("close", () => {
      this.disposed = true;
      this.failAll("Worker process exited");
      this.channel?.push({ token: "", done: true, error: "Worker process exited" });
    });
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  private write(request: JsonRpcRequest, onError: (error: Error) => void): void {
    this.stdin.write(`${JSON.stringify(request)}\n`, (error) => {
      if (error) onError(new Error(`Failed to write RPC request: ${error.message}`));
    });
  }

  private request(method: string, params: unknown): JsonRpcRequest {
    const request: JsonRpcRequest = { jsonrpc: "2.0", id: ++this.lastId, method };
    if (params !== undefined) request.params = params;
    return request;
  }

  /** Resolves with the response's `result`; a remote error rejects with JsonRpcRemoteError. */
  call(method: string, params?: unknown): Promise<unknown> {
    if (this.disposed) return Promise.reject(new Error("JsonRpcClient is disposed"));

    const request = this.request(method, params);
    return new Promise<unknown>((resolve, reject) => {
      this.waiters.set(request.id, { resolve, reject });
      this.write(request, (error) => {
        this.waiters.delete(request.id);
        reject(error);
      });
    });
  }

  notify(method: string, params?: unknown): void {
    if (this.disposed) return;
    this.write(this.request(method, params), (error) =>
      log.debug(`[inference/rpc] ${method}: ${error.message}`)
    );
  }

  /**
   * The worker acknowledges with an ordinary response, then emits token
   * lines until one has `done: true`. Empty tokens are skipped.
   */
  async *callStream(method: string, params?: unknown): AsyncGenerator<StreamToken> {
    if (this.disposed) throw new Error("JsonRpcClient is disposed");
    if (this.channel) throw new Error("Another stream is already in progress");

    const channel = new TokenChannel();
    this.channel = channel;
    try {
      await this.call(method, params);
      for (;;) {
        const token = await channel.next();
        if (token.error) throw new Error(`Worker stream error: ${token.error}`);
        if (token.token) yield token;
        if (token.done) return;
      }
    } finally {
      if (this.channel === channel) this.channel = null;
    }
  }

  private onLine(line: string): void {
    const text = line.trim();
    if (!text) return;

    let message: WorkerMessage | null;
    try {
      message = classify(JSON.parse(text));
    } catch {
      log.debug(`[inference/rpc] non-JSON worker output: ${text.slice(0, 200)}`);
      return;
    }

    if (!message) return;
    if (message.type === "token") {
      this.channel?.push(message.token);
      return;
    }

    const waiter = this.waiters.get(message.id);
    if (!waiter) return;
    this.waiters.delete(message.id);
    if (message.error) waiter.reject(new JsonRpcRemoteError(message.error));
    else waiter.resolve(message.result);
  }

  private failAll(reason: string): void {
    const waiters = [...this.waiters.values()];
    this.waiters.clear();
    for (const waiter of waiters) waiter.reject(new Error(reason));
  }

  dispose(): void {
    this.disposed = true;
    this.failAll("Client disposed");
    this.lines.close();
  }
}
