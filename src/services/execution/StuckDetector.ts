/**
 * StuckDetector
 *
 * Counts consecutive occurrences of the same error (compared on a fixed-length
 * prefix). The first occurrence counts as 1, so with the default threshold the
 * third identical error in a row is reported as stuck.
 */

import { RETRY_LIMITS, STUCK_NOTE } from './constants/Timeouts';

export class StuckDetector {
  private lastSignature: string | null = null;
  private count = 0;

  constructor(
    private readonly signatureLength: number,
    private readonly threshold: number = RETRY_LIMITS.STUCK_THRESHOLD
  ) {}

  /**
   * Record an error and return how many times in a row it has been seen
   */
  record(error: string): number {
    const signature = error.substring(0, this.signatureLength);
    if (signature === this.lastSignature) {
      this.count++;
    } else {
      this.lastSignature = signature;
      this.count = 1;
    }
    return this.count;
  }

  get occurrences(): number {
    return this.count;
  }

  get isStuck(): boolean {
    return this.count >= this.threshold;
  }

  /**
   * Append the "completely different approach" demand once stuck
   */
  annotate(context: string): string {
    return this.isStuck ? `${context}${STUCK_NOTE(this.count)}` : context;
  }

  reset(): void {
    this.lastSignature = null;
    this.count = 0;
  }
}
