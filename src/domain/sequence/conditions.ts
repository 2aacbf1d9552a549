import { FieldValue, Filter, GroupValues, RangeBound, RecordData, RecordId, SequenceConfig } from '../../types';
import { ValidationError } from '../common/Errors';
import { RECORD_ID_FIELD } from './SequenceConfig';

/**
 * A field's own value, or null when the record does not carry it. Inherited
 * properties such as `constructor` do not count.
 */
export function ownValue(data: Readonly<RecordData> | undefined, field: string): FieldValue {
  if (!data || !Object.prototype.hasOwnProperty.call(data, field)) {
    return null;
  }
  return data[field] ?? null;
}

/**
 * Equality conditions on every group field. Fields missing from
 * `groupValues` match null. Empty when the collection has no groups.
 */
export function groupConditions(config: SequenceConfig, groupValues: GroupValues | undefined): Filter {
  return config.groupFields.map(field => ({
    field,
    op: 'eq' as const,
    value: ownValue(groupValues, field),
  }));
}

export function rangeConditions(config: SequenceConfig, range: RangeBound[]): Filter {
  return range.map(bound => ({ field: config.orderField, op: bound.op, value: bound.value }));
}

/**
 * Excludes the record being written from a shift.
 */
export function excludeRecord(id: RecordId): Filter {
  return [{ field: RECORD_ID_FIELD, op: 'ne', value: id }];
}

export function groupsEqual(config: SequenceConfig, a: GroupValues | undefined, b: GroupValues | undefined): boolean {
  return config.groupFields.every(field => ownValue(a, field) === ownValue(b, field));
}

const INTEGER_STRING = /^-?\d+$/;

/**
 * Coerce an order value to an integer. Form input often carries numbers as
 * strings, so integer strings are accepted.
 * @throws {ValidationError} for anything that is not an integer
 */
export function toOrder(value: FieldValue, field: string): number {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  throw new ValidationError(`${field} must be an integer`, { field, value });
}
