import { describe, it, expect } from 'vitest';
import { ViolationLedger, expireViolations } from '../src/violation-ledger.js';

describe('ViolationLedger', () => {
  describe('register', () => {
    it('returns new, then duplicate for the same rule before any expiry', () => {
      const ledger = new ViolationLedger();

      expect(ledger.register('r1', 5, 'split the function')).toBe('new');
      expect(ledger.register('r1', 6, 'split the function')).toBe('duplicate');
    });

    it('keeps the first registration on duplicate', () => {
      const ledger = new ViolationLedger();
      ledger.register('r1', 5, 'first');
      ledger.register('r1', 6, 'second');

      expect(ledger.get('r1')).toEqual({ ruleId: 'r1', firstSeenIndex: 5, lastSeenIndex: 5, suggestion: 'first' });
    });

    it('tracks different rules separately', () => {
      const ledger = new ViolationLedger();

      expect(ledger.register('r1', 5)).toBe('new');
      expect(ledger.register('r2', 5)).toBe('new');
      expect(ledger.size).toBe(2);
    });
  });

  describe('touch', () => {
    it('advances lastSeenIndex only', () => {
      const ledger = new ViolationLedger();
      ledger.register('r1', 5);
      ledger.touch('r1', 9);

      expect(ledger.get('r1')).toEqual({ ruleId: 'r1', firstSeenIndex: 5, lastSeenIndex: 9, suggestion: undefined });
    });

    it('never moves lastSeenIndex backwards', () => {
      const ledger = new ViolationLedger();
      ledger.register('r1', 5);
      ledger.touch('r1', 9);
      ledger.touch('r1', 7);

      expect(ledger.get('r1')?.lastSeenIndex).toBe(9);
    });

    it('ignores unknown rules', () => {
      const ledger = new ViolationLedger();
      ledger.touch('missing', 3);

      expect(ledger.size).toBe(0);
    });
  });

  describe('expire', () => {
    it('removes a violation once firstSeenIndex < currentIndex - K, after which it registers as new', () => {
      const ledger = new ViolationLedger();
      ledger.register('r1', 5);

      // 5 < 8 - 3 is false
      expect(ledger.expire(8, 3)).toEqual([]);
      expect(ledger.register('r1', 8)).toBe('duplicate');

      // 5 < 9 - 3
      expect(ledger.expire(9, 3)).toEqual(['r1']);
      expect(ledger.register('r1', 9)).toBe('new');
    });

    it('does not extend a violation because it was touched', () => {
      const ledger = new ViolationLedger();
      ledger.register('r1', 2);
      ledger.touch('r1', 10);

      expect(ledger.expire(13, 10)).toEqual(['r1']);
    });

    it('only purges the old entries', () => {
      const ledger = new ViolationLedger();
      ledger.register('old', 1);
      ledger.register('recent', 20);

      expect(ledger.expire(25, 10)).toEqual(['old']);
      expect(ledger.active().map((v) => v.ruleId)).toEqual(['recent']);
    });
  });

  it('hands out copies', () => {
    const ledger = new ViolationLedger();
    ledger.register('r1', 5);
    const [copy] = ledger.active();
    if (copy) copy.firstSeenIndex = 100;

    expect(ledger.get('r1')?.firstSeenIndex).toBe(5);
  });
});

describe('expireViolations', () => {
  it('splits at the threshold', () => {
    const { kept, purged } = expireViolations(
      [
        { ruleId: 'a', firstSeenIndex: 2, lastSeenIndex: 2 },
        { ruleId: 'b', firstSeenIndex: 3, lastSeenIndex: 4 },
      ],
      13,
      10
    );

    expect(purged).toEqual(['a']);
    expect(kept.map((v) => v.ruleId)).toEqual(['b']);
  });
});
