export interface Clock {
  now(): number;
  /**
   * Resolves after `ms`, or as soon as `signal` aborts. Resolves `true` when the full
   * delay elapsed and `false` when it was cut short. Never rejects.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}

/** Largest delay a single Node timer honors; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms, signal) {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      let remaining = Math.max(0, ms);
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = () => {
        clearTimeout(timer);
        resolve(false);
      };
      // Delays past the timer limit are slept in chunks.
      const schedule = () => {
        const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
        remaining -= step;
        timer = setTimeout(() => {
          if (remaining > 0) {
            schedule();
            return;
          }
          signal?.removeEventListener("abort", onAbort);
          resolve(true);
        }, step);
      };
      schedule();
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  },
};
