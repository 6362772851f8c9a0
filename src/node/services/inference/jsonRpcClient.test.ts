import { describe, expect, it } from "@jest/globals";
import * as readline from "readline";
import { PassThrough } from "stream";
import { JsonRpcClient, JsonRpcRemoteError } from "./jsonRpcClient";

/** Pipes plus a line reader over what the client wrote. */
function pipes() {
  const stdin = new PassThrough();
  const stdout = new PassThrough();
  const requests: unknown[] = [];
  let notify: (() => void) | null = null;
  readline.createInterface({ input: stdin }).on("line", (line) => {
    requests.push(JSON.parse(line));
    notify?.();
  });
  /** Resolves once the client has written `count` requests in total. */
  const requestsWritten = async (count: number) => {
    while (requests.length < count) {
      await new Promise<void>((resolve) => {
        notify = resolve;
      });
    }
  };
  const respond = (payload: unknown) => stdout.write(JSON.stringify(payload) + "\n");
  return { stdin, stdout, requests, requestsWritten, respond };
}

describe("JsonRpcClient", () => {
  it("matches responses to requests by id", async () => {
    const io = pipes();
    const client = new JsonRpcClient(io.stdin, io.stdout);

    const first = client.call("complete", { prompt: "a" });
    const second = client.call("complete", { prompt: "b" });
    await io.requestsWritten(2);
    io.respond({ jsonrpc: "2.0", id: 2, result: "second" });
    io.respond({ jsonrpc: "2.0", id: 1, result: "first" });

    expect(await first).toBe("first");
    expect(await second).toBe("second");
    expect(io.requests).toEqual([
      { jsonrpc: "2.0", id: 1, method: "complete", params: { prompt: "a" } },
      { jsonrpc: "2.0", id: 2, method: "complete", params: { prompt: "b" } },
    ]);
    client.dispose();
  });

  it("rejects with the remote error", async () => {
    const io = pipes();
    const client = new JsonRpcClient(io.stdin, io.stdout);
    const call = client.call("nope");
    await io.requestsWritten(1);
    io.respond({ jsonrpc: "2.0", id: 1, error: { code: -32601, message: "Method not found" } });

    await expect(call).rejects.toBeInstanceOf(JsonRpcRemoteError);
    await expect(call).rejects.toThrow("RPC error [-32601]: Method not found");
    client.dispose();
  });

  it("ignores noise on stdout", async () => {
    const io = pipes();
    const client = new JsonRpcClient(io.stdin, io.stdout);
    const call = client.call("health");
    await io.requestsWritten(1);
    io.stdout.write("Loading weights...\n[1, 2]\n");
    io.respond({ jsonrpc: "2.0", id: 1, result: { status: "ok" } });
    expect(await call).toEqual({ status: "ok" });
    client.dispose();
  });

  it("streams tokens until done, skipping empty ones", async () => {
    const io = pipes();
    const client = new JsonRpcClient(io.stdin, io.stdout);
    const tokens: string[] = [];

    const consume = (async () => {
      for await (const token of client.callStream("generate_stream", { prompt: "x" })) {
        tokens.push(token.token);
      }
    })();
    await io.requestsWritten(1);
    io.respond({ jsonrpc: "2.0", id: 1, result: { started: true } });
    io.respond({ token: "Hel", done: false });
    io.respond({ token: "", done: false });
    io.respond({ token: "lo", done: false });
    io.respond({ token: "", done: true });
    await consume;

    expect(tokens).toEqual(["Hel", "lo"]);
    client.dispose();
  });

  it("throws when the worker reports a stream error", async () => {
    const io = pipes();
    const client = new JsonRpcClient(io.stdin, io.stdout);
    const stream = client.callStream("generate_stream", {});
    const next = stream.next();
    await io.requestsWritten(1);
    io.respond({ jsonrpc: "2.0", id: 1, result: null });
    io.respond({ token: "", done: true, error: "out of memory" });

    await expect(next).rejects.toThrow("Worker stream error: out of memory");
    client.dispose();
  });

  it("fails pending calls when stdout closes", async () => {
    const io = pipes();
    const client = new JsonRpcClient(io.stdin, io.stdout);
    const call = client.call("health");
    await io.requestsWritten(1);
    io.stdout.end();

    await expect(call).rejects.toThrow("Worker process exited");
    expect(client.isDisposed).toBe(true);
    await expect(client.call("health")).rejects.toThrow("JsonRpcClient is disposed");
  });

  it("rejects pending calls on dispose", async () => {
    const io = pipes();
    const client = new JsonRpcClient(io.stdin, io.stdout);
    const call = client.call("health");
    client.dispose();
    await expect(call).rejects.toThrow("Client disposed");
  });
});
