export const TIMED_OUT = Symbol("timed-out");

/** Settles with the promise, or with TIMED_OUT once `ms` elapse first. */
export const raceTimeout = async <T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> => {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<typeof TIMED_OUT>((resolve) => {
        timer = setTimeout(() => resolve(TIMED_OUT), ms);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const withTimeout = async <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
  const outcome = await raceTimeout(promise, ms);
  if (outcome === TIMED_OUT) {
    throw new Error(`${label} timed out after ${ms}ms`);
  }
  return outcome;
};
