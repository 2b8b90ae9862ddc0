import { IIdGenerator } from '../../domain/common/IIdGenerator';

/**
 * IDs of the form {prefix}_{timestamp}_{random}.
 */
export class TimestampIdGenerator implements IIdGenerator {
  generate(prefix: string): string {
    const timestamp = Date.now();
    const random = Math.random().toString(36).substring(2, 11);
    return `${prefix}_${timestamp}_${random}`;
  }
}
