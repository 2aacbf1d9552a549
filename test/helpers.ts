import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { GroupValues, RecordData, SequenceConfigInput } from '../src/types';
import { IRecordRepository } from '../src/domain/repositories/IRecordRepository';
import { resolveSequenceConfig } from '../src/domain/sequence/SequenceConfig';
import { SequenceService } from '../src/application/services/SequenceService';
import { SequencedCollection } from '../src/application/services/SequencedCollection';
import { InMemoryEventBus } from '../src/infrastructure/events/InMemoryEventBus';
import { InMemoryRecordRepository } from '../src/infrastructure/repositories/InMemoryRecordRepository';

/**
 * Test helper utilities
 */

export class TestDataDir {
  private testDir: string;

  constructor() {
    // Unique directory per test
    this.testDir = path.join(os.tmpdir(), `sequencer-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  }

  getPath(): string {
    return this.testDir;
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.testDir, { recursive: true, force: true });
  }
}

export function createMockLogger() {
  return {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  };
}

/**
 * Sequenced collection over an in-memory repository (or the one given).
 */
export function createTestCollection(
  input: SequenceConfigInput = {},
  options: { collectionId?: string; repo?: IRecordRepository } = {}
) {
  const logger = createMockLogger();
  const repo = options.repo ?? new InMemoryRecordRepository(logger);
  const eventBus = new InMemoryEventBus(logger);
  const sequenceService = new SequenceService(repo, logger);
  const collection = new SequencedCollection(
    options.collectionId ?? 'items',
    resolveSequenceConfig(input),
    repo,
    sequenceService,
    eventBus,
    logger
  );
  return { collection, repo, eventBus, sequenceService, logger };
}

/**
 * Create records named after `names`, in order, appending each.
 */
export async function seed(collection: SequencedCollection, names: string[], extra: RecordData = {}): Promise<void> {
  for (const name of names) {
    await collection.create({ name, ...extra });
  }
}

/**
 * The group's records as `name:order`, in sequence order.
 */
export async function sequenceOf(collection: SequencedCollection, groupValues?: GroupValues): Promise<string[]> {
  const records = await collection.list(groupValues);
  return records.map(record => `${record.name}:${record[collection.config.orderField]}`);
}

/**
 * Order values of a group, in sequence order.
 */
export async function ordersOf(collection: SequencedCollection, groupValues?: GroupValues): Promise<number[]> {
  const records = await collection.list(groupValues);
  return records.map(record => {
    const order = record[collection.config.orderField];
    if (typeof order !== 'number') {
      throw new Error(`Record ${record.id} has no numeric order`);
    }
    return order;
  });
}
