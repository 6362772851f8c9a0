/**
 * Local inference control plane: backend catalog, llama-server orchestration
 * and the facade that loads models and serves completions over them.
 */

// Facade
export { InferenceService } from "./inferenceService";
export type {
  InferenceServiceEvents,
  InferenceServiceOptions,
  InferenceStatus,
  LoadOptions,
} from "./inferenceService";

// Server orchestration
export { ServerOrchestrator } from "./serverOrchestrator";
export type { ServerLaunchOptions, ServerOrchestratorEvents, ServerOrchestratorOptions } from "./serverOrchestrator";
export { LlamaServerClient, estimateTokenCount } from "./llamaServerClient";
export { PortAllocator, bindTestPort } from "./portAllocator";
export type { PortProbe } from "./portAllocator";
export { ServerStateStore } from "./serverStateStore";
export { buildServerArgs, redactServerArgs, resolveServerConfig } from "./serverArgs";
export type { ServerConfig, ServerConfigInput } from "./serverArgs";
export { spawnServerProcess, forceKillPid } from "./processControl";
export type { PidKiller, ProcessSpawner, SpawnedServer } from "./processControl";
export { SseParser, readSseJson } from "./sseParser";

// Backends
export { BackendCatalog } from "./backendCatalog";
export type { BackendUpdate } from "./backendCatalog";
export { BackendInstaller, selectReleaseAsset } from "./backendInstaller";
export type { ArchiveExtractor } from "./backendInstaller";
export type { PlatformTarget } from "./backendTable";

// Runtimes
export { ServerBackedRuntime, ProcessBackedRuntime, LibraryBackedRuntime } from "./modelRuntime";
export type { Generation, InProcessEngine, InProcessEngineLoader, ModelRuntime } from "./modelRuntime";
export { WorkerProcess } from "./workerProcess";
export type { WorkerSpawner } from "./workerProcess";

// Collaborators
export { DirectoryModelRegistry, StaticModelRegistry } from "./modelRegistry";
export type { LocalModel, LocalModelRegistry } from "./modelRegistry";
export { OsHardwareProfileProvider, StaticHardwareProfileProvider } from "./hardwareProfile";
export type { HardwareProfile, HardwareProfileProvider, TuningHints } from "./hardwareProfile";
export { ChatSessionStore } from "./chatSessions";

// Config
export { loadConfig, parseConfigText } from "./config";
export type { InferhostConfig } from "./config";

export * from "./errors";
export type * from "./types";
