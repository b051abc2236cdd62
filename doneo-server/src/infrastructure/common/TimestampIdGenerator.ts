import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { SystemClock } from './SystemClock';

/**
 * Ids shaped `{prefix}_{epochMs}_{seq}{random}`.
 *
 * The sequence restarts every millisecond, so ids minted by one process sort
 * in creation order even when several land in the same tick.
 */
export class TimestampIdGenerator implements IIdGenerator {
  private lastTimestamp = -1;
  private sequence = 0;

  constructor(private clock: IClock = new SystemClock()) {}

  generate(prefix: string): string {
    const timestamp = this.clock.now();
    this.sequence = timestamp === this.lastTimestamp ? this.sequence + 1 : 0;
    this.lastTimestamp = timestamp;

    const random = Math.random().toString(36).slice(2, 8).padEnd(6, '0');
    return `${prefix}_${timestamp}_${this.sequence.toString(36)}${random}`;
  }
}
