import { resolveSequenceConfig } from '../../src/domain/sequence/SequenceConfig';
import { ConfigError } from '../../src/domain/common/Errors';

describe('resolveSequenceConfig', () => {
  it('should apply defaults', () => {
    expect(resolveSequenceConfig()).toEqual({ orderField: 'order', groupFields: [], startAt: 0 });
  });

  it('should treat a string as the order field', () => {
    expect(resolveSequenceConfig('position')).toEqual({ orderField: 'position', groupFields: [], startAt: 0 });
  });

  it('should accept a single group field as a string', () => {
    expect(resolveSequenceConfig({ groupFields: 'listId' }).groupFields).toEqual(['listId']);
  });

  it('should treat groupFields false as no groups', () => {
    expect(resolveSequenceConfig({ groupFields: false }).groupFields).toEqual([]);
  });

  it('should keep group field order and startAt', () => {
    const config = resolveSequenceConfig({ orderField: 'rank', groupFields: ['boardId', 'column'], startAt: 1 });

    expect(config).toEqual({ orderField: 'rank', groupFields: ['boardId', 'column'], startAt: 1 });
  });

  it('should return a frozen config', () => {
    const config = resolveSequenceConfig({ groupFields: ['listId'] });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.groupFields)).toBe(true);
  });

  it('should reject the order field as a group field', () => {
    expect(() => resolveSequenceConfig({ orderField: 'rank', groupFields: ['listId', 'rank'] }))
      .toThrow("Order field 'rank' cannot also be a group field");
  });

  it('should reject the default order field as a group field', () => {
    expect(() => resolveSequenceConfig({ groupFields: 'order' })).toThrow(ConfigError);
  });

  it('should reject field names that are not plain identifiers', () => {
    expect(() => resolveSequenceConfig('order; DROP TABLE items')).toThrow(ConfigError);
    expect(() => resolveSequenceConfig({ groupFields: ['list id'] })).toThrow(ConfigError);
    expect(() => resolveSequenceConfig({ orderField: '' })).toThrow(ConfigError);
  });

  it('should reject the record ID field as order or group field', () => {
    const message = "'id' is the record identity and cannot be sequenced or grouped on";

    expect(() => resolveSequenceConfig('id')).toThrow(message);
    expect(() => resolveSequenceConfig({ groupFields: ['listId', 'id'] })).toThrow(message);
  });

  it('should reject duplicate group fields', () => {
    expect(() => resolveSequenceConfig({ groupFields: ['listId', 'listId'] }))
      .toThrow('Group field listed more than once: listId');
  });

  it('should reject a non-integer startAt', () => {
    expect(() => resolveSequenceConfig({ startAt: 0.5 })).toThrow(ConfigError);
  });

  it('should list the failing paths in the error details', () => {
    let caught: unknown;
    try {
      resolveSequenceConfig({ groupFields: ['ok', '1bad'] });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: 'CONFIG_ERROR',
      statusCode: 500,
      details: [expect.objectContaining({ path: 'groupFields.1' })],
    });
  });
});
