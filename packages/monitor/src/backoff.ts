/**
 * Exponential backoff for reasoning-service failures
 *
 * A failed analysis round raises the backoff level and schedules the next
 * attempt; a success lowers the level one step at a time so a flapping
 * service is not hammered right after it recovers.
 */

export interface BackoffState {
  /** Current backoff level (0 = no backoff, increases on failures) */
  backoffLevel: number;
  /** Timestamp (ms) before which no new attempt is made */
  nextAttemptAfter: number;
  /** Consecutive failure count */
  consecutiveFailures: number;
  /** Last successful round timestamp */
  lastSuccessTime: number;
}

export interface BackoffConfig {
  /** Base delay in ms */
  baseDelay: number;
  /** Maximum delay in ms */
  maxDelay: number;
  /** Multiplier for each level */
  multiplier: number;
  /** Highest level the state can reach */
  maxLevel: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelay: 1000,
  maxDelay: 60000,
  multiplier: 2,
  maxLevel: 10,
};

export function initialBackoffState(): BackoffState {
  return {
    backoffLevel: 0,
    nextAttemptAfter: 0,
    consecutiveFailures: 0,
    lastSuccessTime: 0,
  };
}

/**
 * Delay for a backoff level, capped at maxDelay
 */
export function calculateBackoffDelay(backoffLevel: number, config: BackoffConfig = DEFAULT_BACKOFF): number {
  const delay = config.baseDelay * Math.pow(config.multiplier, backoffLevel);
  return Math.min(delay, config.maxDelay);
}

/**
 * Check whether the backoff delay has elapsed
 */
export function canAttempt(state: BackoffState, now: number = Date.now()): { allowed: boolean; waitMs: number; reason: string } {
  if (state.nextAttemptAfter > now) {
    const waitMs = state.nextAttemptAfter - now;
    return {
      allowed: false,
      waitMs,
      reason: `Backing off: retry in ${Math.ceil(waitMs / 1000)}s (level ${state.backoffLevel})`,
    };
  }

  return { allowed: true, waitMs: 0, reason: 'OK' };
}

/**
 * Record a successful round
 */
export function recordSuccess(state: BackoffState, now: number = Date.now()): BackoffState {
  return {
    ...state,
    backoffLevel: Math.max(0, state.backoffLevel - 1),
    consecutiveFailures: 0,
    lastSuccessTime: now,
    nextAttemptAfter: 0,
  };
}

/**
 * Record a failed round and schedule the next attempt
 */
export function recordFailure(
  state: BackoffState,
  now: number = Date.now(),
  config: BackoffConfig = DEFAULT_BACKOFF
): BackoffState {
  const newBackoffLevel = Math.min(state.backoffLevel + 1, config.maxLevel);

  return {
    ...state,
    backoffLevel: newBackoffLevel,
    consecutiveFailures: state.consecutiveFailures + 1,
    nextAttemptAfter: now + calculateBackoffDelay(newBackoffLevel, config),
  };
}

/**
 * Human-readable status for verbose output
 */
export function getBackoffSummary(state: BackoffState, now: number = Date.now()): string {
  const lines: string[] = [];

  if (state.consecutiveFailures > 0) {
    lines.push(`Consecutive failures: ${state.consecutiveFailures}`);
  }

  if (state.backoffLevel > 0) {
    lines.push(`Backoff level: ${state.backoffLevel}`);
  }

  if (state.nextAttemptAfter > now) {
    lines.push(`Next attempt in: ${Math.ceil((state.nextAttemptAfter - now) / 1000)}s`);
  }

  return lines.length > 0 ? lines.join(', ') : 'Healthy (no backoff)';
}
