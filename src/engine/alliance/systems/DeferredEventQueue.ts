// ─────────────────────────────────────────────
//  Deferred Event Queue — reactions that must wait one tick
//  FIFO, drained once per tick. The queue is swapped out before the
//  drain, so anything enqueued while draining runs next tick.
// ─────────────────────────────────────────────

import { Logger } from '@/engine/utils/Logger';

export interface DeferredAction {
  label: string;
  run: () => void;
}

export interface DrainReport {
  ran: number;
  failed: number;
}

export class DeferredEventQueue {
  private pending: DeferredAction[] = [];

  enqueue(label: string, run: () => void): void {
    this.pending.push({ label, run });
  }

  get size(): number {
    return this.pending.length;
  }

  /** Labels of queued actions, oldest first. */
  peekLabels(): string[] {
    return this.pending.map(a => a.label);
  }

  /** Run everything queued before this call. A throwing action does not stop the rest. */
  drain(): DrainReport {
    const batch = this.pending;
    this.pending = [];

    let failed = 0;
    for (const action of batch) {
      try {
        action.run();
      } catch (err) {
        failed++;
        Logger.log(`Deferred action '${action.label}' failed: ${Logger.describe(err)}`, 'error');
      }
    }
    return { ran: batch.length, failed };
  }
}
