import { GroupValues, RecordData, RecordId, SequenceConfig } from '../../types';
import { ISequenceStore } from '../../domain/repositories/ISequenceStore';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';
import { ownValue, toOrder } from '../../domain/sequence/conditions';

export interface PersistedState {
  oldOrder: number;
  oldGroups?: GroupValues;
}

export interface RequestedState {
  newOrder?: number;
  newGroups?: GroupValues;
}

/**
 * Reads a record's order and group values as persisted, and as requested by
 * an incoming write.
 */
export class StateCapture {
  constructor(private store: ISequenceStore) {}

  /**
   * @throws {NotFoundError} if the record does not exist
   */
  async captureOld(config: SequenceConfig, collectionId: string, recordId: RecordId): Promise<PersistedState> {
    const order = await this.store.readField(collectionId, recordId, config.orderField);
    if (order === undefined) {
      throw new NotFoundError('Record', recordId);
    }
    if (order === null) {
      throw new ValidationError(`Record '${recordId}' has no ${config.orderField} value`, { collectionId, recordId });
    }

    const state: PersistedState = { oldOrder: toOrder(order, config.orderField) };
    if (config.groupFields.length === 0) {
      return state;
    }

    const oldGroups: GroupValues = {};
    for (const field of config.groupFields) {
      const value = await this.store.readField(collectionId, recordId, field);
      if (value === undefined) {
        throw new NotFoundError('Record', recordId);
      }
      oldGroups[field] = value;
    }
    state.oldGroups = oldGroups;
    return state;
  }

  /**
   * Fields absent from the payload are unspecified. A null order counts as
   * unspecified too; a null group value is a real group.
   */
  captureNew(config: SequenceConfig, payload: RecordData): RequestedState {
    const state: RequestedState = {};

    const order = ownValue(payload, config.orderField);
    if (order !== null) {
      state.newOrder = toOrder(order, config.orderField);
    }

    const specified = config.groupFields.filter(field => Object.prototype.hasOwnProperty.call(payload, field));
    if (specified.length > 0) {
      const newGroups: GroupValues = {};
      for (const field of specified) {
        newGroups[field] = ownValue(payload, field);
      }
      state.newGroups = newGroups;
    }

    return state;
  }
}
