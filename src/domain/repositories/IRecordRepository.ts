import { RecordData, RecordId, RecordQuery, StoredRecord } from '../../types';
import { ISequenceStore } from './ISequenceStore';

/**
 * Repository interface for record persistence.
 * Records of every collection live behind one repository.
 */
export interface IRecordRepository extends ISequenceStore {
  /**
   * Find a record by ID.
   * @returns The record if found, null otherwise
   */
  findById(collectionId: string, id: RecordId): Promise<StoredRecord | null>;

  /**
   * Find records matching a query.
   */
  findAll(collectionId: string, query?: RecordQuery): Promise<StoredRecord[]>;

  /**
   * Insert a record. The repository assigns the ID.
   */
  insert(collectionId: string, data: RecordData): Promise<StoredRecord>;

  /**
   * Merge fields into an existing record.
   * @throws NotFoundError if record doesn't exist
   */
  update(collectionId: string, id: RecordId, data: RecordData): Promise<StoredRecord>;

  /**
   * Delete a record.
   * @throws NotFoundError if record doesn't exist
   */
  delete(collectionId: string, id: RecordId): Promise<void>;

  /**
   * Initialize the repository (load existing data, etc.).
   */
  initialize(): Promise<void>;
}
