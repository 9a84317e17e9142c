/**
 * Per-project set of currently active rule violations.
 *
 * A violation stays active while it was first seen inside the context
 * window (`firstSeenIndex >= currentIndex - K`). While active, the same
 * rule cannot raise a second alert.
 */

import type { RegisterOutcome, Violation } from './types.js';

/**
 * Split violations into those still inside the window and the ruleIds
 * that fell out of it
 */
export function expireViolations(
  violations: readonly Violation[],
  currentIndex: number,
  windowSize: number
): { kept: Violation[]; purged: string[] } {
  const threshold = currentIndex - windowSize;
  const kept: Violation[] = [];
  const purged: string[] = [];

  for (const violation of violations) {
    if (violation.firstSeenIndex < threshold) {
      purged.push(violation.ruleId);
    } else {
      kept.push(violation);
    }
  }

  return { kept, purged };
}

export class ViolationLedger {
  private readonly violations = new Map<string, Violation>();

  /**
   * Mark a rule as violated at `messageIndex`. Returns `duplicate` when the
   * rule is already active; the caller alerts only on `new`.
   */
  register(ruleId: string, messageIndex: number, suggestion?: string): RegisterOutcome {
    if (this.violations.has(ruleId)) {
      return 'duplicate';
    }

    this.violations.set(ruleId, {
      ruleId,
      firstSeenIndex: messageIndex,
      lastSeenIndex: messageIndex,
      suggestion,
    });
    return 'new';
  }

  /**
   * Record that an active violation recurred without re-alerting
   */
  touch(ruleId: string, messageIndex: number): void {
    const violation = this.violations.get(ruleId);
    if (!violation) return;
    violation.lastSeenIndex = Math.max(violation.lastSeenIndex, messageIndex);
  }

  /**
   * Drop violations first seen before `currentIndex - windowSize`.
   * Purged rules may register as `new` again afterwards.
   */
  expire(currentIndex: number, windowSize: number): string[] {
    const { purged } = expireViolations([...this.violations.values()], currentIndex, windowSize);
    for (const ruleId of purged) {
      this.violations.delete(ruleId);
    }
    return purged;
  }

  get(ruleId: string): Violation | undefined {
    const violation = this.violations.get(ruleId);
    return violation ? { ...violation } : undefined;
  }

  /**
   * Active violations, oldest registration first
   */
  active(): Violation[] {
    return [...this.violations.values()].map((violation) => ({ ...violation }));
  }

  get size(): number {
    return this.violations.size;
  }
}
