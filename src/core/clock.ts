import {setTimeout} from 'node:timers/promises'

/**
 * Time source for the supervisor. Tests substitute a virtual clock.
 */
export type Clock = {
  /** Milliseconds since an arbitrary origin. */
  now(): number;
  /** Resolves after `ms`, or rejects when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    await setTimeout(ms, undefined, {signal})
  }
}
