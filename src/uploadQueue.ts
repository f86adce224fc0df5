import {
  FailureKind,
  ProductRecord,
  QueueCounts,
  QueueItem,
  QueueSnapshotEntry,
  UploadStatus
} from './types.js';

export type QueueListener = (item: QueueSnapshotEntry) => void;

function freezeEntry(item: QueueItem): QueueSnapshotEntry {
  return Object.freeze({
    id: item.id,
    record: item.record,
    status: Object.freeze({ ...item.status }),
    warnings: Object.freeze([...item.warnings]),
    attempts: item.attempts
  });
}

/**
 * Ordered, in-memory list of products waiting to be uploaded. Items only
 * change state through nextPending / markSucceeded / markFailed.
 */
export class UploadQueue {
  private items: QueueItem[] = [];
  private sequence = 0;
  private listeners = new Set<QueueListener>();

  enqueue(records: readonly ProductRecord[]): QueueSnapshotEntry[] {
    const added: QueueItem[] = records.map(record => {
      this.sequence += 1;
      return {
        id: `item-${this.sequence}`,
        record,
        status: { state: 'pending' },
        warnings: [],
        attempts: 0
      };
    });
    this.items.push(...added);
    return added.map(freezeEntry);
  }

  /**
   * Claims the earliest pending item. Claiming and marking in-progress happen
   * in one synchronous step, so concurrent workers never share an item.
   */
  nextPending(): QueueSnapshotEntry | null {
    const item = this.items.find(candidate => candidate.status.state === 'pending');
    if (!item) {
      return null;
    }
    item.status = { state: 'in_progress', startedAt: new Date() };
    item.attempts += 1;
    this.emit(item);
    return freezeEntry(item);
  }

  markSucceeded(id: string, remoteId: number): boolean {
    return this.finish(id, { state: 'succeeded', remoteId, completedAt: new Date() });
  }

  markFailed(id: string, reason: string, kind: FailureKind = 'unknown'): boolean {
    return this.finish(id, { state: 'failed', reason, kind, completedAt: new Date() });
  }

  addWarning(id: string, message: string): void {
    const item = this.items.find(candidate => candidate.id === id);
    if (!item) {
      return;
    }
    item.warnings.push(message);
    this.emit(item);
  }

  /**
   * Puts failed items back to pending while they have attempts left.
   * Returns how many were re-queued.
   */
  requeueFailed(maxAttempts: number): number {
    let requeued = 0;
    for (const item of this.items) {
      if (item.status.state === 'failed' && item.attempts < maxAttempts) {
        item.status = { state: 'pending' };
        requeued += 1;
        this.emit(item);
      }
    }
    return requeued;
  }

  get(id: string): QueueSnapshotEntry | undefined {
    const item = this.items.find(candidate => candidate.id === id);
    return item ? freezeEntry(item) : undefined;
  }

  snapshot(): QueueSnapshotEntry[] {
    return this.items.map(freezeEntry);
  }

  counts(): QueueCounts {
    const counts: QueueCounts = { total: this.items.length, pending: 0, inProgress: 0, succeeded: 0, failed: 0 };
    for (const item of this.items) {
      switch (item.status.state) {
        case 'pending':
          counts.pending += 1;
          break;
        case 'in_progress':
          counts.inProgress += 1;
          break;
        case 'succeeded':
          counts.succeeded += 1;
          break;
        case 'failed':
          counts.failed += 1;
          break;
      }
    }
    return counts;
  }

  get size(): number {
    return this.items.length;
  }

  /** Drops succeeded and failed items. */
  clearFinished(): number {
    const before = this.items.length;
    this.items = this.items.filter(item => item.status.state === 'pending' || item.status.state === 'in_progress');
    return before - this.items.length;
  }

  /** Drops everything that is not currently uploading. */
  clear(): number {
    const before = this.items.length;
    this.items = this.items.filter(item => item.status.state === 'in_progress');
    return before - this.items.length;
  }

  onChange(listener: QueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private finish(id: string, status: UploadStatus): boolean {
    const item = this.items.find(candidate => candidate.id === id);
    if (!item || item.status.state !== 'in_progress') {
      return false;
    }
    item.status = status;
    this.emit(item);
    return true;
  }

  private emit(item: QueueItem): void {
    if (this.listeners.size === 0) {
      return;
    }
    const entry = freezeEntry(item);
    for (const listener of this.listeners) {
      listener(entry);
    }
  }
}
