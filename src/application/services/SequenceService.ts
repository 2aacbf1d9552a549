import {
  GroupValues,
  RecordId,
  RecordQuery,
  SequenceCommitResult,
  SequenceConfig,
  SequenceOperation,
  SequencePlan,
} from '../../types';
import { ISequenceStore } from '../../domain/repositories/ISequenceStore';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError } from '../../domain/common/Errors';
import { StateCapture } from '../sequence/StateCapture';
import { HighestOrderLookup } from '../sequence/HighestOrderLookup';
import { PlanBuilder } from '../sequence/PlanBuilder';
import { ShiftExecutor } from '../sequence/ShiftExecutor';

/**
 * Keeps an integer order field contiguous per group across writes.
 *
 * Two phases around the host's own record write:
 *   plan()   before the write: reads current state, assigns the record's
 *            order and lists the sibling shifts
 *   commit() after the write: applies the shifts
 *
 * Operations touching the same group must not interleave between plan and
 * commit; serialising them (transaction, lock) is up to the caller.
 */
export class SequenceService {
  private lookup: HighestOrderLookup;
  private planner: PlanBuilder;
  private executor: ShiftExecutor;

  constructor(
    store: ISequenceStore,
    private logger: ILogger
  ) {
    this.lookup = new HighestOrderLookup(store);
    this.planner = new PlanBuilder(new StateCapture(store), this.lookup);
    this.executor = new ShiftExecutor(store, logger);
  }

  async plan(config: SequenceConfig, operation: SequenceOperation): Promise<SequencePlan> {
    const plan = await this.planner.build(config, operation);
    this.logger.debug(`Planned ${operation.kind}`, {
      collectionId: operation.collectionId,
      assignedOrder: plan.assignedOrder,
      shifts: plan.instructions.length,
    });
    return plan;
  }

  /**
   * Apply a plan's shifts once the record write has gone through.
   * @param recordId - ID the store gave the record; required for inserts
   * @throws {ValidationError} if an insert is committed without its record ID
   * @throws {StoreUpdateFailedError} if any shift failed
   */
  async commit(plan: SequencePlan, recordId?: RecordId): Promise<SequenceCommitResult> {
    const { operation } = plan;
    const id = operation.kind === 'insert' ? recordId : operation.recordId;
    if (id === undefined) {
      throw new ValidationError('Record ID is required to commit an insert', { collectionId: operation.collectionId });
    }

    const applied = await this.executor.execute(plan, id);
    return { collectionId: operation.collectionId, recordId: id, applied };
  }

  async highestOrder(config: SequenceConfig, collectionId: string, groupValues?: GroupValues): Promise<number> {
    return this.lookup.highestOrder(config, collectionId, groupValues);
  }

  /**
   * Sort by the order field, ascending, unless the query sorts already.
   */
  withDefaultSort(config: SequenceConfig, query: RecordQuery = {}): RecordQuery {
    if (query.sort) {
      return query;
    }
    return { ...query, sort: { field: config.orderField, direction: 'asc' } };
  }
}
