import { Condition, FieldValue, Filter, RecordData, SortOrder } from '../../types';
import { ownValue } from '../../domain/sequence/conditions';

/**
 * Null sorts before everything; values of different types compare by type name.
 */
export function compareValues(a: FieldValue | undefined, b: FieldValue | undefined): number {
  const left = a ?? null;
  const right = b ?? null;
  if (left === right) return 0;
  if (left === null) return -1;
  if (right === null) return 1;
  if (typeof left === 'number' && typeof right === 'number') {
    return left < right ? -1 : 1;
  }
  if (typeof left !== typeof right) {
    return typeof left < typeof right ? -1 : 1;
  }
  return String(left) < String(right) ? -1 : 1;
}

function matchesCondition(record: RecordData, condition: Condition): boolean {
  const value = ownValue(record, condition.field);
  // Range comparisons never match null
  const comparable = value !== null && condition.value !== null;
  const cmp = compareValues(value, condition.value);

  switch (condition.op) {
    case 'eq':
      return value === condition.value;
    case 'ne':
      return value !== condition.value;
    case 'gt':
      return comparable && cmp > 0;
    case 'gte':
      return comparable && cmp >= 0;
    case 'lt':
      return comparable && cmp < 0;
    case 'lte':
      return comparable && cmp <= 0;
  }
}

export function matchesFilter(record: RecordData, filter: Filter = []): boolean {
  return filter.every(condition => matchesCondition(record, condition));
}

export function sortRecords<T extends RecordData>(records: T[], sort?: SortOrder): T[] {
  if (!sort) {
    return records;
  }
  const sign = sort.direction === 'desc' ? -1 : 1;
  return [...records].sort((a, b) => sign * compareValues(ownValue(a, sort.field), ownValue(b, sort.field)));
}
