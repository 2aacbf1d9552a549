import { RecordId, SequenceOperationKind, ShiftInstruction, StoredRecord } from '../../types';

/**
 * Type-safe event definitions emitted by sequenced collections.
 */

export interface SequencePlannedEvent {
  type: 'sequence:planned';
  data: {
    collectionId: string;
    kind: SequenceOperationKind;
    assignedOrder: number | null;
    instructions: ShiftInstruction[];
  };
}

export interface SequenceShiftedEvent {
  type: 'sequence:shifted';
  data: { collectionId: string; recordId: RecordId; applied: number };
}

// Record Events
export interface RecordCreatedEvent {
  type: 'record:created';
  data: { collectionId: string; record: StoredRecord };
}

export interface RecordUpdatedEvent {
  type: 'record:updated';
  data: { collectionId: string; record: StoredRecord };
}

export interface RecordDeletedEvent {
  type: 'record:deleted';
  data: { collectionId: string; id: RecordId };
}

export type SequenceEvent =
  | SequencePlannedEvent
  | SequenceShiftedEvent
  | RecordCreatedEvent
  | RecordUpdatedEvent
  | RecordDeletedEvent;

export type SequenceEventType = SequenceEvent['type'];

/**
 * Payload type for a given event name.
 */
export type SequenceEventData<T extends SequenceEventType> = Extract<SequenceEvent, { type: T }>['data'];
