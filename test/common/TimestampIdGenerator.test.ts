import { TimestampIdGenerator } from '../../src/infrastructure/common/TimestampIdGenerator';

describe('TimestampIdGenerator', () => {
  const generator = new TimestampIdGenerator();

  it('should generate IDs of prefix, timestamp and random part', () => {
    const before = Date.now();
    const id = generator.generate('items');

    const [prefix, timestamp, random] = id.split('_');
    expect(prefix).toBe('items');
    expect(Number(timestamp)).toBeGreaterThanOrEqual(before);
    expect(random).toMatch(/^[a-z0-9]+$/);
  });

  it('should keep underscores in the prefix', () => {
    expect(generator.generate('todo_items')).toMatch(/^todo_items_\d+_[a-z0-9]+$/);
  });

  it('should generate distinct IDs', () => {
    expect(generator.generate('items')).not.toBe(generator.generate('items'));
  });
});
