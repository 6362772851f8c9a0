/**
 * Incremental Server-Sent-Events parser.
 *
 * Bytes arrive in arbitrary TCP-sized pieces: an event may be split across
 * many chunks, and one chunk may hold several events. The parser keeps three
 * pieces of state between pushes (the undecoded UTF-8 tail, the current
 * partial line, and the data lines of the event being built) and only emits
 * an event once its terminating blank line has been seen.
 */

import { log } from "@/node/services/log";

export interface SseEvent {
  /** Value of the last `event:` field, or null for the default "message" event. */
  event: string | null;
  /** `data:` lines joined with "\n". */
  data: string;
}

export const SSE_DONE_SENTINEL = "[DONE]";

export class SseParser {
  private readonly decoder = new TextDecoder("utf-8");
  private lineBuffer = "";
  private dataLines: string[] = [];
  private eventName: string | null = null;

  /**
   * Feed the next piece of the stream. Returns the events it completed, in order.
   */
  push(chunk: Uint8Array | string): SseEvent[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    return this.consume(text);
  }

  /**
   * Signal end of stream. A final line without a trailing newline is still
   * processed, and a pending event without its blank line is dispatched.
   */
  end(): SseEvent[] {
    const events = this.consume(this.decoder.decode());
    if (this.lineBuffer.length > 0) {
      const last = this.lineBuffer;
      this.lineBuffer = "";
      this.processLine(last, events);
    }
    this.dispatch(events);
    return events;
  }

  private consume(text: string): SseEvent[] {
    const events: SseEvent[] = [];
    if (!text) return events;

    this.lineBuffer += text;
    let newlineIndex = this.lineBuffer.indexOf("\n");
    while (newlineIndex !== -1) {
      let line = this.lineBuffer.slice(0, newlineIndex);
      if (line.endsWith("\r")) {
        line = line.slice(0, -1);
      }
      this.lineBuffer = this.lineBuffer.slice(newlineIndex + 1);
      this.processLine(line, events);
      newlineIndex = this.lineBuffer.indexOf("\n");
    }
    return events;
  }

  private processLine(line: string, events: SseEvent[]): void {
    if (line === "") {
      this.dispatch(events);
      return;
    }
    if (line.startsWith(":")) {
      return; // comment / keep-alive
    }

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }

    if (field === "data") {
      this.dataLines.push(value);
    } else if (field === "event") {
      this.eventName = value;
    }
    // id / retry and unknown fields carry nothing we use
  }

  private dispatch(events: SseEvent[]): void {
    if (this.dataLines.length > 0) {
      events.push({ event: this.eventName, data: this.dataLines.join("\n") });
    }
    this.dataLines = [];
    this.eventName = null;
  }
}

/**
 * Decode an SSE byte stream into JSON payloads.
 *
 * Ends on the `[DONE]` sentinel or when the source ends, whichever comes
 * first. Payloads that are not valid JSON, or that fail `isPayload`, are
 * dropped so a consumer never sees a partial chunk.
 */
export async function* readSseJson<T>(
  source: AsyncIterable<Uint8Array | string>,
  isPayload: (value: unknown) => value is T
): AsyncGenerator<T> {
  const parser = new SseParser();

  for await (const chunk of source) {
    for (const event of parser.push(chunk)) {
      const outcome = decodeEvent(event, isPayload);
      if (outcome === "done") return;
      if (outcome !== null) yield outcome.value;
    }
  }

  for (const event of parser.end()) {
    const outcome = decodeEvent(event, isPayload);
    if (outcome === "done") return;
    if (outcome !== null) yield outcome.value;
  }
}

function decodeEvent<T>(
  event: SseEvent,
  isPayload: (value: unknown) => value is T
): "done" | { value: T } | null {
  const data = event.data.trim();
  if (data === SSE_DONE_SENTINEL) return "done";
  if (!data) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    log.debug(`[inference/sse] dropping non-JSON event (${data.length} chars)`);
    return null;
  }

  if (!isPayload(parsed)) {
    log.debug("[inference/sse] dropping event with unexpected shape");
    return null;
  }
  return { value: parsed };
}

/**
 * Adapt a WHATWG ReadableStream (fetch body) to an async iterable.
 * Returning early cancels the underlying stream so the connection is freed.
 */
export async function* iterateReadableStream(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        log.debug("[inference/sse] cancelling response body failed", error);
      });
    }
    reader.releaseLock();
  }
}
