import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { RecordId, StoredRecord } from '../../types';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError } from '../../domain/common/Errors';
import { CachedRecordRepository } from './CachedRecordRepository';

const storedRecordSchema = z
  .record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
  .and(z.object({ id: z.union([z.string(), z.number()]) }));

const collectionFileSchema = z.object({
  collectionId: z.string(),
  records: z.array(storedRecordSchema),
  updatedAt: z.number().optional(),
});

const SAFE_COLLECTION_ID = /^[a-zA-Z0-9_-]+$/;

/**
 * File system based implementation of IRecordRepository.
 * Stores each collection as one JSON file: {dataDir}/collections/{collectionId}.json
 */
export class FileSystemRecordRepository extends CachedRecordRepository {
  private collectionsDir: string;
  private initialized: boolean = false;

  constructor(
    dataDir: string,
    private idGenerator: IIdGenerator,
    logger: ILogger
  ) {
    super(logger);
    this.collectionsDir = path.join(dataDir, 'collections');
  }

  // Collection IDs become file names
  protected collection(collectionId: string): Map<string, StoredRecord> {
    if (!SAFE_COLLECTION_ID.test(collectionId)) {
      throw new ValidationError('Collection ID must be alphanumeric with hyphens/underscores only', { collectionId });
    }
    return super.collection(collectionId);
  }

  private filePath(collectionId: string): string {
    return path.join(this.collectionsDir, `${collectionId}.json`);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      await fs.mkdir(this.collectionsDir, { recursive: true });
      const files = await fs.readdir(this.collectionsDir);

      for (const file of files.filter(f => f.endsWith('.json'))) {
        await this.loadCollectionFile(path.join(this.collectionsDir, file));
      }

      this.logger.info(`Loaded ${this.collections.size} collections`);
      this.initialized = true;
    } catch (err) {
      this.logger.error('Failed to initialize record repository:', err instanceof Error ? err : new Error(String(err)));
      throw err;
    }
  }

  private async loadCollectionFile(filePath: string): Promise<void> {
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const data = collectionFileSchema.parse(JSON.parse(content));
      const records = this.collection(data.collectionId);
      for (const record of data.records) {
        records.set(String(record.id), record);
      }
    } catch (err) {
      this.logger.warn(`Failed to load collection file: ${filePath}`, { error: err instanceof Error ? err.message : String(err) });
    }
  }

  protected nextId(collectionId: string): RecordId {
    return this.idGenerator.generate(collectionId);
  }

  protected async persist(collectionId: string): Promise<void> {
    const data: z.infer<typeof collectionFileSchema> = {
      collectionId,
      records: Array.from(this.collection(collectionId).values()),
      updatedAt: Date.now(),
    };
    const fp = this.filePath(collectionId);
    await fs.mkdir(path.dirname(fp), { recursive: true });
    await fs.writeFile(fp, JSON.stringify(data, null, 2), 'utf-8');
  }
}
