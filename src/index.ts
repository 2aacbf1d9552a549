export * from './types';

// Domain
export * from './domain/common/Errors';
export type { ILogger, LogLevel, LogMetadata } from './domain/common/ILogger';
export type { IIdGenerator } from './domain/common/IIdGenerator';
export type { IEventBus, EventHandler } from './domain/events/IEventBus';
export * from './domain/events/SequenceEvents';
export type { ISequenceStore } from './domain/repositories/ISequenceStore';
export type { IRecordRepository } from './domain/repositories/IRecordRepository';
export { parseSequenceConfig, resolveSequenceConfig, DEFAULT_ORDER_FIELD, DEFAULT_START_AT } from './domain/sequence/SequenceConfig';

// Application
export { SequenceService } from './application/services/SequenceService';
export { SequencedCollection } from './application/services/SequencedCollection';

// Infrastructure
export { Config } from './infrastructure/config/Config';
export type { ConfigOptions, StoreType } from './infrastructure/config/Config';
export { SequenceConfigLoader } from './infrastructure/config/SequenceConfigLoader';
export { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
export { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
export { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
export { InMemoryRecordRepository } from './infrastructure/repositories/InMemoryRecordRepository';
export { FileSystemRecordRepository } from './infrastructure/repositories/FileSystemRecordRepository';

export { createContainer } from './container';
export type { Container } from './container';
