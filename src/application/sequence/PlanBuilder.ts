import {
  GroupValues,
  OrderState,
  RecordData,
  SequenceConfig,
  SequenceOperation,
  SequencePlan,
  ShiftInstruction,
} from '../../types';
import { ValidationError } from '../../domain/common/Errors';
import { groupsEqual, ownValue } from '../../domain/sequence/conditions';
import { StateCapture } from './StateCapture';
import { HighestOrderLookup } from './HighestOrderLookup';

type InsertOperation = Extract<SequenceOperation, { kind: 'insert' }>;
type UpdateOperation = Extract<SequenceOperation, { kind: 'update' }>;
type DeleteOperation = Extract<SequenceOperation, { kind: 'delete' }>;

/**
 * Decides the order a written record gets and which sibling ranges shift
 * to keep each group contiguous.
 *
 * Insert
 *  - order not given: append at highest order + 1 of the new group
 *  - order given: take it, +1 on siblings with order >= it
 * Update
 *  - neither order nor group given, or both unchanged: nothing to do
 *  - group changes: -1 on old group siblings with order >= old order, then
 *    append to the new group or, with an order, +1 on new group siblings
 *    with order >= new order
 *  - moving toward the front: +1 on siblings with new <= order < old
 *  - moving toward the back: -1 on siblings with old < order <= new
 * Delete
 *  - -1 on siblings with order > old order
 *
 * A requested order below startAt is rejected; one past the end of the
 * target group is pulled back to the last slot.
 */
export class PlanBuilder {
  constructor(
    private capture: StateCapture,
    private lookup: HighestOrderLookup
  ) {}

  async build(config: SequenceConfig, operation: SequenceOperation): Promise<SequencePlan> {
    switch (operation.kind) {
      case 'insert':
        return this.planInsert(config, operation);
      case 'update':
        return this.planUpdate(config, operation);
      case 'delete':
        return this.planDelete(config, operation);
    }
  }

  private async planInsert(config: SequenceConfig, operation: InsertOperation): Promise<SequencePlan> {
    const { newOrder, newGroups } = this.capture.captureNew(config, operation.payload);
    const state: OrderState = { newOrder, newGroups };
    const targetGroups = this.completeGroups(config, newGroups);

    if (newOrder === undefined) {
      const highest = await this.lookup.highestOrder(config, operation.collectionId, targetGroups);
      return this.toPlan(config, operation, state, highest + 1, []);
    }

    const assigned = await this.resolveRequestedOrder(config, operation.collectionId, newOrder, targetGroups, 1);
    return this.toPlan(config, operation, state, assigned, [
      { delta: 1, range: [{ op: 'gte', value: assigned }], groupValues: targetGroups },
    ]);
  }

  private async planUpdate(config: SequenceConfig, operation: UpdateOperation): Promise<SequencePlan> {
    const { newOrder, newGroups } = this.capture.captureNew(config, operation.payload);
    if (newOrder === undefined && newGroups === undefined) {
      return this.toPlan(config, operation, {}, null, []);
    }

    const { oldOrder, oldGroups } = await this.capture.captureOld(config, operation.collectionId, operation.recordId);
    const state: OrderState = { oldOrder, newOrder, oldGroups, newGroups };

    // Group fields left out of the payload keep their persisted value
    const targetGroups = oldGroups !== undefined ? { ...oldGroups, ...newGroups } : undefined;
    const groupChanged = newGroups !== undefined && !groupsEqual(config, targetGroups, oldGroups);

    if (!groupChanged) {
      if (newOrder === undefined || newOrder === oldOrder) {
        return this.toPlan(config, operation, state, null, []);
      }

      const assigned = await this.resolveRequestedOrder(config, operation.collectionId, newOrder, oldGroups, 0);
      if (assigned === oldOrder) {
        return this.toPlan(config, operation, state, null, []);
      }

      const instruction: ShiftInstruction = assigned < oldOrder
        ? { delta: 1, range: [{ op: 'gte', value: assigned }, { op: 'lt', value: oldOrder }] }
        : { delta: -1, range: [{ op: 'gt', value: oldOrder }, { op: 'lte', value: assigned }] };
      return this.toPlan(config, operation, state, assigned, [instruction]);
    }

    const instructions: ShiftInstruction[] = [
      { delta: -1, range: [{ op: 'gte', value: oldOrder }] },
    ];

    if (newOrder === undefined) {
      const highest = await this.lookup.highestOrder(config, operation.collectionId, targetGroups);
      return this.toPlan(config, operation, state, highest + 1, instructions);
    }

    const assigned = await this.resolveRequestedOrder(config, operation.collectionId, newOrder, targetGroups, 1);
    instructions.push({ delta: 1, range: [{ op: 'gte', value: assigned }], groupValues: targetGroups });
    return this.toPlan(config, operation, state, assigned, instructions);
  }

  private async planDelete(config: SequenceConfig, operation: DeleteOperation): Promise<SequencePlan> {
    const { oldOrder, oldGroups } = await this.capture.captureOld(config, operation.collectionId, operation.recordId);
    return this.toPlan(config, operation, { oldOrder, oldGroups }, null, [
      { delta: -1, range: [{ op: 'gt', value: oldOrder }] },
    ]);
  }

  /**
   * `slack` is 1 when the record joins the group (it may take the slot after
   * the last one) and 0 when it already sits in it.
   */
  private async resolveRequestedOrder(
    config: SequenceConfig,
    collectionId: string,
    requested: number,
    groupValues: GroupValues | undefined,
    slack: 0 | 1
  ): Promise<number> {
    if (requested < config.startAt) {
      throw new ValidationError(`${config.orderField} must be at least ${config.startAt}`, {
        field: config.orderField,
        value: requested,
      });
    }
    const last = (await this.lookup.highestOrder(config, collectionId, groupValues)) + slack;
    return Math.min(requested, last);
  }

  /**
   * Inserts carry no persisted groups: group fields missing from the
   * payload will be stored empty, so they are scoped as null.
   */
  private completeGroups(config: SequenceConfig, groups: GroupValues | undefined): GroupValues | undefined {
    if (config.groupFields.length === 0) {
      return undefined;
    }
    const complete: GroupValues = {};
    for (const field of config.groupFields) {
      complete[field] = ownValue(groups, field);
    }
    return complete;
  }

  private toPlan(
    config: SequenceConfig,
    operation: SequenceOperation,
    state: OrderState,
    assignedOrder: number | null,
    instructions: ShiftInstruction[]
  ): SequencePlan {
    let payload: RecordData | null = null;
    if (operation.kind !== 'delete') {
      payload = { ...operation.payload };
      delete payload[config.orderField];
      // Unchanged updates keep the persisted order
      const order = assignedOrder ?? state.oldOrder;
      if (order !== undefined) {
        payload[config.orderField] = order;
      }
    }

    return { operation, config, state, assignedOrder, payload, instructions };
  }
}
