// Record primitives
export type RecordId = string | number;
export type FieldValue = string | number | boolean | null;

/**
 * A stored record, or the payload of a write. Field names are set per
 * collection, so records are plain field maps keyed by column name.
 */
export type RecordData = Record<string, FieldValue>;

export interface StoredRecord extends RecordData {
  id: RecordId;
}

/**
 * Values of a collection's group fields, keyed by field name.
 * Two records are in the same group when every group field matches.
 */
export type GroupValues = Record<string, FieldValue>;

// Query model shared by the sequencer and the stores
export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

export interface Condition {
  field: string;
  op: ComparisonOperator;
  value: FieldValue;
}

/** Conjunction of conditions; an empty filter matches every record. */
export type Filter = Condition[];

export type SortDirection = 'asc' | 'desc';

export interface SortOrder {
  field: string;
  direction: SortDirection;
}

export interface RecordQuery {
  filter?: Filter;
  sort?: SortOrder;
}

/** `field := field + delta` */
export interface IncrementAssignment {
  field: string;
  delta: ShiftDelta;
}

// Sequence configuration
export interface SequenceConfig {
  readonly orderField: string;
  readonly groupFields: readonly string[];
  readonly startAt: number;
}

/**
 * Accepted input for a collection's sequence settings. A bare string names
 * the order field; `groupFields` may be a single field name.
 */
export type SequenceConfigInput =
  | string
  | {
      orderField?: string;
      groupFields?: string | string[] | false;
      startAt?: number;
    };

// Planning
export type SequenceOperationKind = 'insert' | 'update' | 'delete';

export type SequenceOperation =
  | { kind: 'insert'; collectionId: string; payload: RecordData }
  | { kind: 'update'; collectionId: string; recordId: RecordId; payload: RecordData }
  | { kind: 'delete'; collectionId: string; recordId: RecordId };

/**
 * Order and group values of the record being written, before and after.
 * Undefined means unknown (insert) or unspecified (absent from the payload).
 */
export interface OrderState {
  oldOrder?: number;
  newOrder?: number;
  oldGroups?: GroupValues;
  newGroups?: GroupValues;
}

export type ShiftDelta = 1 | -1;

export type RangeOperator = 'gt' | 'gte' | 'lt' | 'lte';

export interface RangeBound {
  op: RangeOperator;
  value: number;
}

export interface ShiftInstruction {
  delta: ShiftDelta;
  range: RangeBound[];
  groupValues?: GroupValues;  // overrides the operation's old groups
}

export interface SequencePlan {
  operation: SequenceOperation;
  config: SequenceConfig;
  state: OrderState;
  assignedOrder: number | null;
  payload: RecordData | null;  // write payload with the assigned order applied; null for deletes
  instructions: ShiftInstruction[];
}

export interface SequenceCommitResult {
  collectionId: string;
  recordId: RecordId;
  applied: number;
}
