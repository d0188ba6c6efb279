import type { AxiosInstance } from 'axios';
import { DEFAULT_POLL_TIERS } from '../config/env';
import type { PollOptions, PollTier, Sleep } from '../types';
import { getStatusCode } from './http';

export class PollTimeoutError extends Error {
  readonly elapsedSeconds: number;
  readonly attempts: number;

  constructor(elapsedSeconds: number, attempts: number) {
    super(`Job still running after ${elapsedSeconds}s (${attempts} status checks)`);
    this.name = 'PollTimeoutError';
    this.elapsedSeconds = elapsedSeconds;
    this.attempts = attempts;
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Polling aborted');
}

export const delay: Sleep = (ms, maybeSignal) =>
  new Promise((resolve, reject) => {
    if (!maybeSignal) {
      setTimeout(() => resolve(), ms);
      return;
    }
    const signal = maybeSignal;
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(abortReason(signal));
    };
    const timeout = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });

// `counter` is elapsed seconds summed from previous sleeps, not a check count.
export function nextSleepSeconds(counter: number, tiers: PollTier[] = DEFAULT_POLL_TIERS): number {
  const tier = tiers.find((t) => t.below === undefined || counter < t.below);
  if (!tier) {
    throw new Error(`No poll tier covers ${counter}s; the last tier must have no upper bound`);
  }
  return tier.sleepSeconds;
}

// Resolves with the elapsed seconds once `url` answers `ok` or `error`.
export async function pollStatus(
  client: AxiosInstance,
  url: string,
  options: PollOptions
): Promise<number> {
  const tiers = options.tiers ?? DEFAULT_POLL_TIERS;
  const sleep = options.sleep ?? delay;
  const { signal, maxAttempts, maxWaitSeconds } = options;

  let counter = 0;
  let attempts = 0;

  while (true) {
    if (signal?.aborted) throw abortReason(signal);
    if (maxAttempts !== undefined && attempts >= maxAttempts) {
      throw new PollTimeoutError(counter, attempts);
    }

    const slp = nextSleepSeconds(counter, tiers);
    if (maxWaitSeconds !== undefined && counter + slp > maxWaitSeconds) {
      throw new PollTimeoutError(counter, attempts);
    }

    counter += slp;
    await sleep(slp * 1000, signal);

    attempts++;
    const status = await getStatusCode(client, url, signal);
    if (status === options.ok || status === options.error) {
      return counter;
    }
  }
}
