import * as net from "net";
import { AsyncMutex } from "@/node/utils/concurrency/asyncMutex";
import { Err, Ok, type Result } from "@/common/types/result";
import type { InferenceFailure } from "./errors";

export const PORT_RANGE_START = 8080;
/** Exclusive upper bound */
export const PORT_RANGE_END = 8180;

/** Resolves true when the port can be bound on host right now. */
export type PortProbe = (port: number, host: string) => Promise<boolean>;

/**
 * Try to bind the port and immediately close.
 */
export const bindTestPort: PortProbe = (port, host) =>
  new Promise((resolve) => {
    const server = net.createServer();
    server.once("error", () => resolve(false));
    server.listen(port, host, () => {
      server.close(() => resolve(true));
    });
  });

export interface PortAllocatorOptions {
  rangeStart?: number;
  rangeEnd?: number;
  probe?: PortProbe;
}

/**
 * Hands out ports from a fixed range.
 *
 * A port is only given out when nothing in this process holds it and a bind
 * test on the host succeeds. Allocation is serialized so two concurrent
 * starts never receive the same port.
 */
export class PortAllocator {
  private readonly rangeStart: number;
  private readonly rangeEnd: number;
  private readonly probe: PortProbe;
  private readonly used = new Set<number>();
  private readonly mutex = new AsyncMutex();

  constructor(options: PortAllocatorOptions = {}) {
    this.rangeStart = options.rangeStart ?? PORT_RANGE_START;
    this.rangeEnd = options.rangeEnd ?? PORT_RANGE_END;
    this.probe = options.probe ?? bindTestPort;
  }

  async allocate(host: string): Promise<Result<number, InferenceFailure>> {
    return this.mutex.runExclusive(async () => {
      for (let port = this.rangeStart; port < this.rangeEnd; port++) {
        if (this.used.has(port)) continue;
        if (await this.probe(port, host)) {
          this.used.add(port);
          return Ok(port);
        }
      }
      return Err({
        kind: "port_exhausted",
        message: `No free port in range ${this.rangeStart}-${this.rangeEnd - 1}`,
        rangeStart: this.rangeStart,
        rangeEnd: this.rangeEnd,
      });
    });
  }

  /** Mark a port as taken (e.g. adopted from a running server). */
  reserve(port: number): void {
    this.used.add(port);
  }

  release(port: number): void {
    this.used.delete(port);
  }

  isUsed(port: number): boolean {
    return this.used.has(port);
  }

  usedPorts(): number[] {
    return [...this.used].sort((a, b) => a - b);
  }
}
