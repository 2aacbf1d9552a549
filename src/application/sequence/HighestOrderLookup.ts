import { GroupValues, SequenceConfig } from '../../types';
import { ISequenceStore } from '../../domain/repositories/ISequenceStore';
import { groupConditions, ownValue, toOrder } from '../../domain/sequence/conditions';

/**
 * Finds the append point of a group.
 */
export class HighestOrderLookup {
  constructor(private store: ISequenceStore) {}

  /**
   * Highest order value among the records of the given group, or
   * `startAt - 1` when the group is empty.
   */
  async highestOrder(config: SequenceConfig, collectionId: string, groupValues: GroupValues | undefined): Promise<number> {
    const last = await this.store.findOne(
      collectionId,
      groupConditions(config, groupValues),
      { field: config.orderField, direction: 'desc' }
    );

    const order = last ? ownValue(last, config.orderField) : null;
    if (order === null) {
      return config.startAt - 1;
    }
    return toOrder(order, config.orderField);
  }
}
