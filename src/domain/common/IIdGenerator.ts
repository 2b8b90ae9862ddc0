/**
 * Interface for generating unique IDs.
 */
export interface IIdGenerator {
  /**
   * Generate a unique ID with the given prefix.
   * @example
   * generate('task') => 'task_1706884823457_d4e5f6g7h'
   */
  generate(prefix: string): string;
}
