import {
  getBackendsDir,
  getConfigFile,
  getDownloadsDir,
  getInferhostHome,
  getModelsDir,
  getServerStateFile,
} from "@/common/constants/paths";
import { log } from "@/node/services/log";
import {
  BackendCatalog,
  BackendInstaller,
  DirectoryModelRegistry,
  InferenceService,
  OsHardwareProfileProvider,
  PortAllocator,
  ServerOrchestrator,
  ServerStateStore,
  loadConfig,
  type ArchiveExtractor,
  type HardwareProfileProvider,
  type InProcessEngineLoader,
  type InferhostConfig,
  type LocalModelRegistry,
  type PidKiller,
  type PlatformTarget,
  type PortProbe,
  type ProcessSpawner,
  type WorkerSpawner,
} from "@/node/services/inference";

/**
 * Everything that can be swapped out when building the services.
 * Tests pass fakes here; production passes nothing.
 */
export interface ServiceContainerOptions {
  /** Root for state, backends and models; defaults to INFERHOST_ROOT or ~/.inferhost. */
  rootDir?: string;
  /** Skip reading config.jsonc. */
  config?: InferhostConfig;
  target?: PlatformTarget;
  extractor?: ArchiveExtractor;
  spawner?: ProcessSpawner;
  killPid?: PidKiller;
  portProbe?: PortProbe;
  models?: LocalModelRegistry;
  hardware?: HardwareProfileProvider;
  workerSpawner?: WorkerSpawner;
  engineLoader?: InProcessEngineLoader;
}

/**
 * Owns every inference service and their lifetimes. Construction is plain
 * wiring; `initialize()` does the I/O (orphan cleanup, hardware probe).
 */
export class ServiceContainer {
  readonly rootDir: string;
  readonly config: InferhostConfig;
  readonly installer: BackendInstaller;
  readonly backends: BackendCatalog;
  readonly stateStore: ServerStateStore;
  readonly ports: PortAllocator;
  readonly orchestrator: ServerOrchestrator;
  readonly models: LocalModelRegistry;
  readonly inference: InferenceService;

  constructor(config: InferhostConfig, options: ServiceContainerOptions = {}) {
    this.rootDir = options.rootDir ?? getInferhostHome();
    this.config = config;

    this.installer = new BackendInstaller({
      backendsDir: getBackendsDir(this.rootDir),
      downloadsDir: getDownloadsDir(this.rootDir),
      releaseUrl: config.releaseUrl,
      extractor: options.extractor,
      target: options.target,
    });
    this.backends = new BackendCatalog({
      backendsDir: getBackendsDir(this.rootDir),
      installer: this.installer,
      target: options.target,
    });
    this.stateStore = new ServerStateStore(getServerStateFile(this.rootDir));
    this.ports = new PortAllocator({
      rangeStart: config.portRangeStart,
      rangeEnd: config.portRangeEnd,
      probe: options.portProbe,
    });
    this.orchestrator = new ServerOrchestrator({
      backends: this.backends,
      stateStore: this.stateStore,
      ports: this.ports,
      spawner: options.spawner,
      killPid: options.killPid,
      host: config.host,
      startupTimeoutMs: config.startupTimeoutMs,
      healthPollIntervalMs: config.healthPollIntervalMs,
      stopGraceMs: config.stopGraceMs,
      stalenessMs: config.stalenessMs,
    });
    this.models = options.models ?? new DirectoryModelRegistry(config.modelsDir ?? getModelsDir(this.rootDir));
    this.inference = new InferenceService({
      orchestrator: this.orchestrator,
      backends: this.backends,
      models: this.models,
      hardware: options.hardware ?? new OsHardwareProfileProvider(),
      workerCommand: config.workerCommand,
      workerSpawner: options.workerSpawner,
      engineLoader: options.engineLoader,
    });
  }

  async initialize(): Promise<void> {
    const orphans = await this.inference.initialize();
    if (orphans > 0) {
      log.info(`Cleaned up ${orphans} server(s) left over from a previous run`);
    }
  }

  async dispose(): Promise<void> {
    await this.inference.dispose();
  }
}

/**
 * Build the inference services, reading `<root>/config.jsonc` unless a
 * config is passed in.
 */
export async function createInferenceServices(options: ServiceContainerOptions = {}): Promise<ServiceContainer> {
  const rootDir = options.rootDir ?? getInferhostHome();
  const config = options.config ?? (await loadConfig(getConfigFile(rootDir)));
  return new ServiceContainer(config, { ...options, rootDir });
}
