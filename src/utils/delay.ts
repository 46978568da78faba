export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function randomBetween(min: number, max: number, random: () => number = Math.random) {
  return min + random() * (max - min);
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so the
 * caller checks the signal itself after waking up.
 */
export const sleep: Sleep = (ms, signal) => {
  if (signal?.aborted) return Promise.resolve();
  return new Promise<void>(resolve => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
};

export function humanDelay(min = 800, max = 1800) {
  const delay = Math.floor(Math.random() * (max - min + 1)) + min;
  return sleep(delay);
}
