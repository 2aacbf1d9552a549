import {
  FieldValue,
  Filter,
  IncrementAssignment,
  RecordData,
  RecordId,
  RecordQuery,
  SortOrder,
  StoredRecord,
} from '../../types';
import { IRecordRepository } from '../../domain/repositories/IRecordRepository';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';
import { ownValue } from '../../domain/sequence/conditions';
import { matchesFilter, sortRecords } from './recordQuery';

/**
 * Record repository that answers every query from an in-memory cache.
 * Subclasses decide how IDs are made and where changes are persisted.
 * Records are copied on the way in and out, so callers never hold cache entries.
 */
export abstract class CachedRecordRepository implements IRecordRepository {
  protected collections: Map<string, Map<string, StoredRecord>> = new Map();

  constructor(protected logger: ILogger) {}

  abstract initialize(): Promise<void>;

  protected abstract nextId(collectionId: string): RecordId;

  /**
   * Called after every mutation of a collection.
   */
  protected abstract persist(collectionId: string): Promise<void>;

  protected collection(collectionId: string): Map<string, StoredRecord> {
    let records = this.collections.get(collectionId);
    if (!records) {
      records = new Map();
      this.collections.set(collectionId, records);
    }
    return records;
  }

  private matching(collectionId: string, filter?: Filter): StoredRecord[] {
    return Array.from(this.collection(collectionId).values()).filter(record => matchesFilter(record, filter));
  }

  async readField(collectionId: string, recordId: RecordId, field: string): Promise<FieldValue | undefined> {
    const record = this.collection(collectionId).get(String(recordId));
    if (!record) {
      return undefined;
    }
    return ownValue(record, field);
  }

  async findOne(collectionId: string, filter: Filter, sort: SortOrder): Promise<StoredRecord | null> {
    const [first] = sortRecords(this.matching(collectionId, filter), sort);
    return first ? { ...first } : null;
  }

  /**
   * All or nothing: when a matched record holds a non-numeric value in the
   * field, nothing is changed and the update reports failure.
   */
  async bulkUpdate(collectionId: string, filter: Filter, assignment: IncrementAssignment): Promise<boolean> {
    const records = this.matching(collectionId, filter);
    const invalid = records.filter(record => typeof ownValue(record, assignment.field) !== 'number');
    if (invalid.length > 0) {
      this.logger.warn(`Cannot increment non-numeric ${assignment.field}`, {
        collectionId,
        recordIds: invalid.map(record => record.id),
      });
      return false;
    }

    for (const record of records) {
      const current = ownValue(record, assignment.field);
      if (typeof current === 'number') {
        record[assignment.field] = current + assignment.delta;
      }
    }
    if (records.length > 0) {
      await this.persist(collectionId);
    }
    this.logger.debug(`Incremented ${assignment.field} by ${assignment.delta} on ${records.length} record(s)`, { collectionId });
    return true;
  }

  async findById(collectionId: string, id: RecordId): Promise<StoredRecord | null> {
    const record = this.collection(collectionId).get(String(id));
    return record ? { ...record } : null;
  }

  async findAll(collectionId: string, query: RecordQuery = {}): Promise<StoredRecord[]> {
    return sortRecords(this.matching(collectionId, query.filter), query.sort).map(record => ({ ...record }));
  }

  async insert(collectionId: string, data: RecordData): Promise<StoredRecord> {
    const record: StoredRecord = { ...data, id: this.nextId(collectionId) };
    this.collection(collectionId).set(String(record.id), record);
    await this.persist(collectionId);
    return { ...record };
  }

  async update(collectionId: string, id: RecordId, data: RecordData): Promise<StoredRecord> {
    const records = this.collection(collectionId);
    const existing = records.get(String(id));
    if (!existing) {
      throw new NotFoundError('Record', id);
    }

    const updated: StoredRecord = { ...existing, ...data, id: existing.id };
    records.set(String(existing.id), updated);
    await this.persist(collectionId);
    return { ...updated };
  }

  async delete(collectionId: string, id: RecordId): Promise<void> {
    if (!this.collection(collectionId).delete(String(id))) {
      throw new NotFoundError('Record', id);
    }
    await this.persist(collectionId);
  }
}
