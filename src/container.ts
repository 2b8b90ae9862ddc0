import { Config } from './infrastructure/config/Config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { InMemoryTaskEventBus } from './infrastructure/events/InMemoryTaskEventBus';
import { FileSystemCheckpointStore } from './infrastructure/repositories/FileSystemCheckpointStore';
import { InMemoryCheckpointStore } from './infrastructure/repositories/InMemoryCheckpointStore';
import { createChunkGenerator } from './infrastructure/generators/createChunkGenerator';
import { SseStreamAdapter } from './infrastructure/streaming/SseStreamAdapter';
import { StagePromptBuilder } from './application/services/StagePromptBuilder';
import { StagePipeline } from './application/services/StagePipeline';
import { TaskRegistry } from './application/services/TaskRegistry';
import { TaskManager } from './application/services/TaskManager';
import { ILogger } from './domain/common/ILogger';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { ITaskEventBus } from './domain/events/ITaskEventBus';
import { ICheckpointStore } from './domain/repositories/ICheckpointStore';
import { IChunkGenerator } from './domain/services/IChunkGenerator';

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  idGenerator: IIdGenerator;
  eventBus: ITaskEventBus;
  checkpointStore: ICheckpointStore;
  generator: IChunkGenerator;
  sse: SseStreamAdapter;

  // Services
  taskManager: TaskManager;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Replacements for individual components, mainly for tests.
 */
export interface ContainerOverrides {
  config?: Config;
  logger?: ILogger;
  generator?: IChunkGenerator;
  checkpointStore?: ICheckpointStore;
}

/**
 * Create and wire up all dependencies.
 */
export async function createContainer(overrides: ContainerOverrides = {}): Promise<Container> {
  // 1. Configuration
  const config = overrides.config ?? new Config();

  // 2. Infrastructure - Core
  const logger = overrides.logger ?? new ConsoleLogger(config.log.level, config.log.format);
  const idGenerator = new TimestampIdGenerator();
  const eventBus = new InMemoryTaskEventBus(logger.child({ component: 'events' }), {
    retentionMs: config.events.retentionMs
  });

  // 3. Storage
  const checkpointStore = overrides.checkpointStore ?? (config.storageType === 'memory'
    ? new InMemoryCheckpointStore()
    : new FileSystemCheckpointStore(config.dataDir, logger));

  // 4. Generation
  const generator = overrides.generator ?? createChunkGenerator(config.generator, logger);
  const prompts = new StagePromptBuilder({
    outlineMaxTokens: config.generator.outlineMaxTokens,
    episodeMaxTokens: config.generator.episodeMaxTokens
  });
  const pipeline = new StagePipeline(generator, prompts, eventBus, config.pipeline);

  // 5. Services
  const registry = new TaskRegistry();
  const taskManager = new TaskManager(registry, checkpointStore, eventBus, pipeline, idGenerator, logger);
  const sse = new SseStreamAdapter(eventBus, checkpointStore, logger.child({ component: 'sse' }), {
    heartbeatMs: config.stream.heartbeatMs
  });

  const container: Container = {
    config,
    logger,
    idGenerator,
    eventBus,
    checkpointStore,
    generator,
    sse,
    taskManager,

    async initialize() {
      logger.info('Initializing container...');
      await taskManager.initialize();
      logger.info(`Container initialized (generator: ${generator.name})`);
    },

    async shutdown() {
      logger.info('Shutting down container...');
      await taskManager.shutdown();
      eventBus.clear();
      registry.clear();
      logger.info('Container shutdown complete');
    }
  };

  return container;
}
