/**
 * Failure taxonomy for the inference control plane.
 *
 * Expected failures travel as `InferenceFailure` values inside a `Result`.
 * The Error classes exist for the few places that must throw: a stream that
 * breaks after it started, and misuse such as chatting with a model that was
 * never loaded.
 */

export type InferenceFailure =
  | { kind: "configuration"; message: string }
  | { kind: "startup_timeout"; message: string; timeoutMs: number; stderrTail: string }
  | { kind: "port_exhausted"; message: string; rangeStart: number; rangeEnd: number }
  | {
      kind: "transport";
      message: string;
      url: string;
      status?: number;
      body?: string;
      timeoutMs?: number;
    }
  | { kind: "spawn"; message: string; exitCode: number | null; stderrTail: string }
  | { kind: "not_running"; message: string; modelId: string }
  | { kind: "install"; message: string }
  | { kind: "cancelled"; message: string };

export type InferenceFailureKind = InferenceFailure["kind"];

export function configurationFailure(message: string): InferenceFailure {
  return { kind: "configuration", message };
}

export function notRunningFailure(
  modelId: string,
  message = `No server running for model ${modelId}`
): InferenceFailure {
  return { kind: "not_running", message, modelId };
}

export class InferenceError extends Error {
  constructor(
    message: string,
    readonly failure?: InferenceFailure
  ) {
    super(message);
    this.name = "InferenceError";
  }
}

export class ConfigurationError extends InferenceError {
  constructor(message: string, failure?: InferenceFailure) {
    super(message, failure);
    this.name = "ConfigurationError";
  }
}

export class StartupTimeoutError extends InferenceError {
  constructor(message: string, failure?: InferenceFailure) {
    super(message, failure);
    this.name = "StartupTimeoutError";
  }
}

export class PortExhaustionError extends InferenceError {
  constructor(message: string, failure?: InferenceFailure) {
    super(message, failure);
    this.name = "PortExhaustionError";
  }
}

export class TransportError extends InferenceError {
  constructor(message: string, failure?: InferenceFailure) {
    super(message, failure);
    this.name = "TransportError";
  }
}

export class ProcessDeathError extends InferenceError {
  constructor(message: string, failure?: InferenceFailure) {
    super(message, failure);
    this.name = "ProcessDeathError";
  }
}

export class ModelNotLoadedError extends InferenceError {
  constructor(readonly modelId: string) {
    super(`Model not loaded: ${modelId}`);
    this.name = "ModelNotLoadedError";
  }
}

export class SessionNotFoundError extends InferenceError {
  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

/**
 * Map a failure value to the Error class a caller would catch.
 */
export function toError(failure: InferenceFailure): InferenceError {
  switch (failure.kind) {
    case "configuration":
      return new ConfigurationError(failure.message, failure);
    case "startup_timeout":
      return new StartupTimeoutError(failure.message, failure);
    case "port_exhausted":
      return new PortExhaustionError(failure.message, failure);
    case "transport":
      return new TransportError(failure.message, failure);
    case "not_running":
    case "spawn":
      return new ProcessDeathError(failure.message, failure);
    case "install":
    case "cancelled":
      return new InferenceError(failure.message, failure);
  }
}
