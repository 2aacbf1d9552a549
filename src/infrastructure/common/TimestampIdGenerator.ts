import { IIdGenerator } from '../../domain/common/IIdGenerator';

/**
 * ID generator that uses timestamps and random strings.
 * Generates IDs in the format: {prefix}_{timestamp}_{random}
 */
export class TimestampIdGenerator implements IIdGenerator {
  generate(prefix: string): string {
    const timestamp = Date.now();
    const random = Math.random().toString(36).slice(2, 11);
    return `${prefix}_${timestamp}_${random}`;
  }
}
