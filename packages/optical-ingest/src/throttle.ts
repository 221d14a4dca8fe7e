import { setTimeout as delay } from 'node:timers/promises';
import { DEFAULT_FETCH_DELAY_MS, DEFAULT_MAX_FILES } from './config';

export type SleepFunction = (ms: number) => Promise<void>;

export interface ThrottleOptions {
  delayMs?: number;
  maxFiles?: number;
  sleep?: SleepFunction;
}

const defaultSleep: SleepFunction = async (ms) => {
  await delay(ms);
};

/**
 * Paces per-file fetches with a fixed delay and caps the number of files a
 * single run may process.
 */
export class Throttle {
  readonly delayMs: number;
  readonly maxFiles: number;
  private readonly sleep: SleepFunction;
  private processed = 0;

  constructor(options: ThrottleOptions = {}) {
    const delayMs = options.delayMs ?? DEFAULT_FETCH_DELAY_MS;
    const maxFiles = options.maxFiles ?? DEFAULT_MAX_FILES;
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new Error('Throttle delayMs must be a non-negative number');
    }
    if (!Number.isInteger(maxFiles) || maxFiles < 0) {
      throw new Error('Throttle maxFiles must be a non-negative integer');
    }
    this.delayMs = delayMs;
    this.maxFiles = maxFiles;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get filesProcessed(): number {
    return this.processed;
  }

  get exhausted(): boolean {
    return this.processed >= this.maxFiles;
  }

  /**
   * Waits out the fetch delay and counts one file. Resolves `false` without
   * waiting once the ceiling has been reached.
   */
  async acquire(): Promise<boolean> {
    if (this.exhausted) {
      return false;
    }
    this.processed += 1;
    if (this.delayMs > 0) {
      await this.sleep(this.delayMs);
    }
    return true;
  }
}
