import { Filter, RecordId, SequencePlan, ShiftInstruction } from '../../types';
import { ISequenceStore } from '../../domain/repositories/ISequenceStore';
import { ILogger } from '../../domain/common/ILogger';
import { StoreUpdateFailedError } from '../../domain/common/Errors';
import { excludeRecord, groupConditions, rangeConditions } from '../../domain/sequence/conditions';

/**
 * Applies a plan's shift instructions as bulk updates on the store.
 */
export class ShiftExecutor {
  constructor(
    private store: ISequenceStore,
    private logger: ILogger
  ) {}

  /**
   * Group scope (the instruction's own, else the plan's old groups), then
   * the written record's exclusion, then the order range.
   */
  buildFilter(plan: SequencePlan, instruction: ShiftInstruction, recordId: RecordId): Filter {
    return [
      ...groupConditions(plan.config, instruction.groupValues ?? plan.state.oldGroups),
      ...excludeRecord(recordId),
      ...rangeConditions(plan.config, instruction.range),
    ];
  }

  /**
   * Every instruction is attempted even after a failure.
   * @returns Number of instructions applied
   * @throws {StoreUpdateFailedError} if the store rejected any of them
   */
  async execute(plan: SequencePlan, recordId: RecordId): Promise<number> {
    const { collectionId } = plan.operation;
    const failed: ShiftInstruction[] = [];

    for (const instruction of plan.instructions) {
      const filter = this.buildFilter(plan, instruction, recordId);
      const ok = await this.store.bulkUpdate(collectionId, filter, {
        field: plan.config.orderField,
        delta: instruction.delta,
      });

      if (ok) {
        this.logger.debug('Shift applied', { collectionId, recordId, delta: instruction.delta, filter });
      } else {
        this.logger.error('Shift failed', undefined, { collectionId, recordId, delta: instruction.delta, filter });
        failed.push(instruction);
      }
    }

    if (failed.length > 0) {
      throw new StoreUpdateFailedError(
        `${failed.length} of ${plan.instructions.length} shift(s) failed for record '${recordId}' in ${collectionId}`,
        { collectionId, recordId, failed }
      );
    }

    return plan.instructions.length;
  }
}
