import { describe, expect, it } from 'vitest';
import { SyncProgress } from '../progress';

describe('SyncProgress', () => {
  it('starts indeterminate', () => {
    const progress = new SyncProgress();
    expect(progress.isIndeterminate).toBe(true);
    expect(progress.isFinished).toBe(false);
    expect(progress.fractionCompleted).toBe(0);
  });

  it('weights children by their pending units', () => {
    const progress = new SyncProgress(10);
    const big = progress.createChild(8, 4);
    const small = progress.createChild(2);

    big.advance(2);
    expect(progress.fractionCompleted).toBeCloseTo(0.4);

    small.complete();
    expect(progress.completedUnitCount).toBe(2);
    expect(progress.fractionCompleted).toBeCloseTo(0.6);

    big.advance(2);
    expect(progress.completedUnitCount).toBe(10);
    expect(progress.isFinished).toBe(true);
  });

  it('credits a finished child only once', () => {
    const progress = new SyncProgress(3);
    const child = progress.createChild(1);
    child.complete();
    child.complete();
    expect(progress.completedUnitCount).toBe(1);
  });

  it('notifies listeners of child progress and stops after unsubscribe', () => {
    const progress = new SyncProgress(2);
    const child = progress.createChild(2, 2);
    const seen: number[] = [];
    const off = progress.onChange((p) => seen.push(p.fractionCompleted));

    child.advance();
    off();
    child.advance();

    expect(seen).toEqual([0.5]);
    expect(progress.isFinished).toBe(true);
  });
});
