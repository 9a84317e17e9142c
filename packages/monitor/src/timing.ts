/**
 * Bound a promise by a timeout. The timer is cleared as soon as either side
 * settles; a late rejection of `work` is observed by the race and dropped.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wait for `work` up to `ms`; resolves true if it settled in time
 */
export async function settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  const TIMED_OUT = Symbol('timed-out');
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });

  try {
    const outcome = await Promise.race([work.then(() => true, () => true), timeout]);
    return outcome !== TIMED_OUT;
  } finally {
    clearTimeout(timer);
  }
}
