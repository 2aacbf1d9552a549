import * as fs from 'fs/promises';
import * as path from 'path';
import { FileSystemRecordRepository } from '../../src/infrastructure/repositories/FileSystemRecordRepository';
import { TimestampIdGenerator } from '../../src/infrastructure/common/TimestampIdGenerator';
import { NotFoundError, ValidationError } from '../../src/domain/common/Errors';
import { TestDataDir, createMockLogger, createTestCollection, seed, sequenceOf } from '../helpers';

describe('FileSystemRecordRepository', () => {
  let repo: FileSystemRecordRepository;
  let testDataDir: TestDataDir;
  const idGenerator = new TimestampIdGenerator();

  beforeEach(async () => {
    testDataDir = new TestDataDir();
    repo = new FileSystemRecordRepository(testDataDir.getPath(), idGenerator, createMockLogger());
    await repo.initialize();
  });

  afterEach(async () => {
    await testDataDir.cleanup();
  });

  describe('insert', () => {
    it('should assign an ID and persist the collection file', async () => {
      const record = await repo.insert('items', { name: 'A', order: 0 });

      expect(String(record.id)).toMatch(/^items_\d+_[a-z0-9]+$/);

      const content = JSON.parse(
        await fs.readFile(path.join(testDataDir.getPath(), 'collections', 'items.json'), 'utf-8')
      );
      expect(content.collectionId).toBe('items');
      expect(content.records).toEqual([{ name: 'A', order: 0, id: record.id }]);
    });

    it('should reject collection IDs that are not safe file names', async () => {
      await expect(repo.insert('../escape', { name: 'A' })).rejects.toThrow(ValidationError);
    });
  });

  describe('initialize', () => {
    it('should load records written by an earlier instance', async () => {
      const a = await repo.insert('items', { name: 'A', order: 0 });
      await repo.insert('items', { name: 'B', order: 1 });

      const reloaded = new FileSystemRecordRepository(testDataDir.getPath(), idGenerator, createMockLogger());
      await reloaded.initialize();

      expect(await reloaded.findById('items', a.id)).toEqual({ name: 'A', order: 0, id: a.id });
      expect(await reloaded.findAll('items')).toHaveLength(2);
    });

    it('should skip files that are not collection files', async () => {
      await fs.writeFile(path.join(testDataDir.getPath(), 'collections', 'broken.json'), '{"records": "nope"}');
      const logger = createMockLogger();

      const reloaded = new FileSystemRecordRepository(testDataDir.getPath(), idGenerator, logger);
      await reloaded.initialize();

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(await reloaded.findAll('broken')).toEqual([]);
    });
  });

  describe('readField', () => {
    it('should return undefined for a missing record and null for a missing field', async () => {
      const record = await repo.insert('items', { name: 'A' });

      expect(await repo.readField('items', 'nope', 'name')).toBeUndefined();
      expect(await repo.readField('items', record.id, 'order')).toBeNull();
      expect(await repo.readField('items', record.id, 'name')).toBe('A');
    });
  });

  describe('bulkUpdate', () => {
    it('should increment only matching records and persist the change', async () => {
      const a = await repo.insert('items', { name: 'A', order: 0 });
      const b = await repo.insert('items', { name: 'B', order: 1 });
      const c = await repo.insert('items', { name: 'C', order: 2 });

      const ok = await repo.bulkUpdate('items', [
        { field: 'id', op: 'ne', value: a.id },
        { field: 'order', op: 'gte', value: 0 },
      ], { field: 'order', delta: 1 });

      expect(ok).toBe(true);
      const reloaded = new FileSystemRecordRepository(testDataDir.getPath(), idGenerator, createMockLogger());
      await reloaded.initialize();
      expect(await reloaded.readField('items', a.id, 'order')).toBe(0);
      expect(await reloaded.readField('items', b.id, 'order')).toBe(2);
      expect(await reloaded.readField('items', c.id, 'order')).toBe(3);
    });
  });

  describe('update / delete', () => {
    it('should merge fields and keep the ID', async () => {
      const a = await repo.insert('items', { name: 'A', order: 0 });

      const updated = await repo.update('items', a.id, { name: 'A2', id: 'other' });

      expect(updated).toEqual({ name: 'A2', order: 0, id: a.id });
    });

    it('should throw NotFoundError for missing records', async () => {
      await expect(repo.update('items', 'nope', { name: 'x' })).rejects.toThrow(NotFoundError);
      await expect(repo.delete('items', 'nope')).rejects.toThrow(NotFoundError);
    });
  });

  describe('as a sequence store', () => {
    it('should keep sequences across a reload', async () => {
      const { collection } = createTestCollection({ groupFields: 'listId' }, { repo });
      await seed(collection, ['A', 'B', 'C'], { listId: 'l1' });
      const [, b] = await collection.list({ listId: 'l1' });

      await collection.update(b.id, { order: 0 });

      const reloaded = new FileSystemRecordRepository(testDataDir.getPath(), idGenerator, createMockLogger());
      await reloaded.initialize();
      const { collection: again } = createTestCollection({ groupFields: 'listId' }, { repo: reloaded });
      expect(await sequenceOf(again, { listId: 'l1' })).toEqual(['B:0', 'A:1', 'C:2']);
    });
  });
});
