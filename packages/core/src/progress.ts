/**
 * @studycache/core - Weighted progress reporting
 *
 * A progress node counts units of work. Children are attached with a weight
 * ("pending units") and contribute that many units to their parent in
 * proportion to their own completion. A total of -1 means "not yet known".
 */

export type ProgressListener = (progress: SyncProgress) => void;

interface AttachedChild {
  child: SyncProgress;
  pendingUnitCount: number;
}

export class SyncProgress {
  private _totalUnitCount: number;
  private _completedUnitCount = 0;
  private readonly children = new Set<AttachedChild>();
  private readonly listeners = new Set<ProgressListener>();

  constructor(totalUnitCount = -1) {
    this._totalUnitCount = totalUnitCount;
  }

  get totalUnitCount(): number {
    return this._totalUnitCount;
  }

  set totalUnitCount(value: number) {
    this._totalUnitCount = value;
    this.changed();
  }

  get completedUnitCount(): number {
    return this._completedUnitCount;
  }

  set completedUnitCount(value: number) {
    this._completedUnitCount = value;
    this.changed();
  }

  get isIndeterminate(): boolean {
    return this._totalUnitCount < 0;
  }

  get isFinished(): boolean {
    return (
      this._totalUnitCount >= 0 &&
      this._completedUnitCount >= this._totalUnitCount
    );
  }

  /**
   * Completed share in [0, 1], including partially completed children.
   */
  get fractionCompleted(): number {
    if (this._totalUnitCount <= 0) {
      return this.isFinished ? 1 : 0;
    }
    let units = this._completedUnitCount;
    for (const { child, pendingUnitCount } of this.children) {
      units += child.fractionCompleted * pendingUnitCount;
    }
    return Math.min(1, units / this._totalUnitCount);
  }

  /**
   * Attach a child that accounts for `pendingUnitCount` of this node's units.
   */
  createChild(pendingUnitCount: number, totalUnitCount = -1): SyncProgress {
    const child = new SyncProgress(totalUnitCount);
    const attached: AttachedChild = { child, pendingUnitCount };
    this.children.add(attached);
    child.onChange(() => {
      if (!child.isFinished || !this.children.has(attached)) {
        this.changed();
        return;
      }
      this.children.delete(attached);
      this.completedUnitCount = this._completedUnitCount + pendingUnitCount;
    });
    return child;
  }

  /**
   * Increment completed units by one.
   */
  advance(units = 1): void {
    this.completedUnitCount = this._completedUnitCount + units;
  }

  /**
   * Mark all units complete. An indeterminate node becomes 1/1.
   */
  complete(): void {
    if (this._totalUnitCount < 0) {
      this._totalUnitCount = 1;
    }
    this.completedUnitCount = this._totalUnitCount;
  }

  onChange(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private changed(): void {
    for (const listener of this.listeners) {
      listener(this);
    }
  }
}
