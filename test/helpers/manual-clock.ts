import type { Clock } from '@/lib/clock';
import { CancelledError } from '@/lib/errors';

interface PendingSleep {
  wakeAt: number;
  resolve: () => void;
}

/**
 * Deterministic clock. With `autoAdvance` every sleep moves time forward
 * and resolves on the next microtask; otherwise sleeps wait for `advance()`.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;
  private pending: PendingSleep[] = [];

  constructor(
    start = Date.parse('2024-05-01T09:00:00.000Z'),
    private readonly autoAdvance = true
  ) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError({ message: 'Sleep aborted' }));
        return;
      }

      const entry: PendingSleep = { wakeAt: this.current + ms, resolve };

      signal?.addEventListener(
        'abort',
        () => {
          this.pending = this.pending.filter(p => p !== entry);
          reject(new CancelledError({ message: 'Sleep aborted' }));
        },
        { once: true }
      );

      if (this.autoAdvance) {
        queueMicrotask(() => {
          if (signal?.aborted) return;
          this.current = Math.max(this.current, entry.wakeAt);
          resolve();
        });
        return;
      }

      this.pending.push(entry);
    });
  }

  advance(ms: number): void {
    this.current += ms;
    const due = this.pending.filter(p => p.wakeAt <= this.current);
    this.pending = this.pending.filter(p => p.wakeAt > this.current);
    for (const sleep of due) sleep.resolve();
  }

  get pendingSleeps(): number {
    return this.pending.length;
  }
}
