export interface PollOptions {
  attempts: number;
  intervalMs: number;
}

/** Raised on the polling side when the job did not finish in time; the job itself may still succeed */
export class PollTimeoutError extends Error {
  constructor(readonly attempts: number) {
    super(`Gave up after ${attempts} polls`);
    this.name = 'PollTimeoutError';
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Calls `fetch` until `isDone` accepts its value, waiting `intervalMs` between
 * calls. Throws PollTimeoutError after `attempts` calls.
 */
export async function pollUntil<T>(
  fetch: () => Promise<T>,
  isDone: (value: T) => boolean,
  { attempts, intervalMs }: PollOptions,
): Promise<T> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const value = await fetch();
    if (isDone(value)) return value;
    if (attempt < attempts) await sleep(intervalMs);
  }
  throw new PollTimeoutError(attempts);
}
