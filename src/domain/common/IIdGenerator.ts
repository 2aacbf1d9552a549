/**
 * Interface for generating unique record IDs.
 */
export interface IIdGenerator {
  /**
   * Generate a unique ID with a prefix.
   * @param prefix - Prefix for the ID, usually derived from the collection
   * @example
   * generate('item') => 'item_1706884823456_a1b2c3'
   */
  generate(prefix: string): string;
}
