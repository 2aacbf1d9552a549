import { GroupValues, RecordData, RecordId, SequenceConfig, SequencePlan, StoredRecord } from '../../types';
import { IRecordRepository } from '../../domain/repositories/IRecordRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { SequenceEventData, SequenceEventType } from '../../domain/events/SequenceEvents';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';
import { groupConditions } from '../../domain/sequence/conditions';
import { SequenceService } from './SequenceService';

/**
 * Application service for one collection whose records carry a sequence.
 * Runs plan, record write and commit in order for every mutation.
 */
export class SequencedCollection {
  constructor(
    readonly collectionId: string,
    readonly config: SequenceConfig,
    private recordRepo: IRecordRepository,
    private sequenceService: SequenceService,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {}

  async get(id: RecordId): Promise<StoredRecord> {
    const record = await this.recordRepo.findById(this.collectionId, id);
    if (!record) {
      throw new NotFoundError('Record', id);
    }
    return record;
  }

  /**
   * Records in sequence order, optionally restricted to one group.
   */
  async list(groupValues?: GroupValues): Promise<StoredRecord[]> {
    const filter = groupValues ? groupConditions(this.config, groupValues) : undefined;
    return this.recordRepo.findAll(
      this.collectionId,
      this.sequenceService.withDefaultSort(this.config, { filter })
    );
  }

  async create(payload: RecordData): Promise<StoredRecord> {
    const plan = await this.sequenceService.plan(this.config, {
      kind: 'insert',
      collectionId: this.collectionId,
      payload,
    });
    await this.announce(plan);

    const record = await this.recordRepo.insert(this.collectionId, plan.payload ?? payload);
    await this.commit(plan, record.id);

    await this.emit('record:created', { collectionId: this.collectionId, record });
    return record;
  }

  async update(id: RecordId, payload: RecordData): Promise<StoredRecord> {
    // Use the stored ID so '1' and 1 address the same record in shift filters
    const { id: recordId } = await this.get(id);
    const plan = await this.sequenceService.plan(this.config, {
      kind: 'update',
      collectionId: this.collectionId,
      recordId,
      payload,
    });
    await this.announce(plan);

    const record = await this.recordRepo.update(this.collectionId, recordId, plan.payload ?? payload);
    await this.commit(plan, recordId);

    await this.emit('record:updated', { collectionId: this.collectionId, record });
    return record;
  }

  async delete(id: RecordId): Promise<void> {
    const { id: recordId } = await this.get(id);
    const plan = await this.sequenceService.plan(this.config, {
      kind: 'delete',
      collectionId: this.collectionId,
      recordId,
    });
    await this.announce(plan);

    await this.recordRepo.delete(this.collectionId, recordId);
    await this.commit(plan, recordId);

    await this.emit('record:deleted', { collectionId: this.collectionId, id: recordId });
  }

  private async commit(plan: SequencePlan, id: RecordId): Promise<void> {
    if (plan.instructions.length === 0) {
      return;
    }
    const result = await this.sequenceService.commit(plan, id);
    this.logger.debug(`Shifted siblings of ${id}`, { applied: result.applied });
    await this.emit('sequence:shifted', result);
  }

  private async announce(plan: SequencePlan): Promise<void> {
    await this.emit('sequence:planned', {
      collectionId: this.collectionId,
      kind: plan.operation.kind,
      assignedOrder: plan.assignedOrder,
      instructions: plan.instructions,
    });
  }

  private async emit<T extends SequenceEventType>(type: T, data: SequenceEventData<T>): Promise<void> {
    await this.eventBus.emit(type, data);
  }
}
