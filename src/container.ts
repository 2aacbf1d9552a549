import { Config } from './infrastructure/config/Config';
import { SequenceConfigLoader } from './infrastructure/config/SequenceConfigLoader';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { InMemoryRecordRepository } from './infrastructure/repositories/InMemoryRecordRepository';
import { FileSystemRecordRepository } from './infrastructure/repositories/FileSystemRecordRepository';
import { SequenceService } from './application/services/SequenceService';
import { SequencedCollection } from './application/services/SequencedCollection';
import { ILogger } from './domain/common/ILogger';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { IEventBus } from './domain/events/IEventBus';
import { IRecordRepository } from './domain/repositories/IRecordRepository';
import { NotFoundError } from './domain/common/Errors';

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
  eventBus: IEventBus;

  // Repositories
  recordRepo: IRecordRepository;

  // Services
  sequenceService: SequenceService;
  collections: Map<string, SequencedCollection>;

  /**
   * Sequenced collection by ID.
   * @throws {NotFoundError} if the collection is not configured
   */
  collection(collectionId: string): SequencedCollection;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Create and wire up all dependencies.
 */
export async function createContainer(config: Config = new Config()): Promise<Container> {
  config.validate();

  // 1. Infrastructure - Core
  const logger = new ConsoleLogger(config.logLevel);
  const idGenerator = new TimestampIdGenerator();
  const eventBus = new InMemoryEventBus(logger);

  // 2. Repositories
  const recordRepo: IRecordRepository = config.storeType === 'memory'
    ? new InMemoryRecordRepository(logger)
    : new FileSystemRecordRepository(config.dataDir, idGenerator, logger);

  // 3. Services
  const sequenceService = new SequenceService(recordRepo, logger);
  const sequenceConfigs = await new SequenceConfigLoader(config.sequenceConfigPath, logger).load();

  const collections = new Map<string, SequencedCollection>();
  for (const [collectionId, sequenceConfig] of sequenceConfigs) {
    const collectionLogger = logger.child({ collection: collectionId });
    collections.set(
      collectionId,
      new SequencedCollection(collectionId, sequenceConfig, recordRepo, sequenceService, eventBus, collectionLogger)
    );
  }

  return {
    config,
    logger,
    idGenerator,
    eventBus,
    recordRepo,
    sequenceService,
    collections,

    collection(collectionId: string): SequencedCollection {
      const collection = collections.get(collectionId);
      if (!collection) {
        throw new NotFoundError('Sequenced collection', collectionId);
      }
      return collection;
    },

    async initialize() {
      logger.info('Initializing record store...');
      await recordRepo.initialize();
      logger.info(`Ready with ${collections.size} sequenced collection(s)`);
    },

    async shutdown() {
      logger.info('Shutting down...');
      eventBus.removeAllListeners();
      logger.info('Shutdown complete');
    }
  };
}
