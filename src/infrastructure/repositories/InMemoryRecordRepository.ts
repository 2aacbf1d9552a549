import { RecordId } from '../../types';
import { CachedRecordRepository } from './CachedRecordRepository';

/**
 * Non-persistent repository with numeric auto-increment IDs per collection.
 */
export class InMemoryRecordRepository extends CachedRecordRepository {
  private counters: Map<string, number> = new Map();

  async initialize(): Promise<void> {
    this.logger.info('In-memory record store ready');
  }

  protected nextId(collectionId: string): RecordId {
    const id = (this.counters.get(collectionId) ?? 0) + 1;
    this.counters.set(collectionId, id);
    return id;
  }

  protected async persist(): Promise<void> {
    // nothing to write
  }
}
