import { FieldValue, Filter, IncrementAssignment, RecordId, SortOrder, StoredRecord } from '../../types';

/**
 * The store capabilities the sequencer needs.
 * Any persistence layer that can provide these three calls can host it.
 */
export interface ISequenceStore {
  /**
   * Point read of one field of one record.
   * @returns undefined if the record does not exist; null if the record lacks the field
   */
  readField(collectionId: string, recordId: RecordId, field: string): Promise<FieldValue | undefined>;

  /**
   * First record matching the filter under the given sort.
   */
  findOne(collectionId: string, filter: Filter, sort: SortOrder): Promise<StoredRecord | null>;

  /**
   * Apply `field := field + delta` to every record matching the filter.
   * @returns false if the store could not apply the update
   */
  bulkUpdate(collectionId: string, filter: Filter, assignment: IncrementAssignment): Promise<boolean>;
}
