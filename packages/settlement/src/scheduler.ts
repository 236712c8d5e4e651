/**
 * @multiledger/settlement — Deferred call scheduling.
 *
 * The saga's phases run in separate turns: the transfer commits, then the
 * notification runs, then the resolution. Anything else the host does may
 * interleave between them.
 */

export interface ScheduledCall {
  /** Shown in logs */
  readonly label: string;
  readonly run: () => Promise<void> | void;
}

export interface CallScheduler {
  schedule(call: ScheduledCall): void;
}

/**
 * FIFO queue drained on demand.
 *
 * Calls scheduled while draining join the back of the queue and run in
 * the same drain.
 */
export class QueueCallScheduler implements CallScheduler {
  private readonly _queue: ScheduledCall[] = [];
  private _draining = false;

  schedule(call: ScheduledCall): void {
    this._queue.push(call);
  }

  get pending(): number {
    return this._queue.length;
  }

  get labels(): readonly string[] {
    return this._queue.map((c) => c.label);
  }

  /**
   * Run queued calls one at a time until none are left.
   * Returns how many ran. A call that throws stops the drain; the rest
   * stay queued.
   */
  async drain(): Promise<number> {
    if (this._draining) {
      throw new Error("QueueCallScheduler is already draining");
    }
    this._draining = true;
    let ran = 0;
    try {
      let next = this._queue.shift();
      while (next !== undefined) {
        await next.run();
        ran++;
        next = this._queue.shift();
      }
    } finally {
      this._draining = false;
    }
    return ran;
  }
}
