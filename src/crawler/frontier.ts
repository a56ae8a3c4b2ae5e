import type { WorkItem } from '../types.js';

/**
 * Lifecycle of a frontier.
 *
 * - `running`: items are queued, or nothing has been taken yet
 * - `draining`: the queue is empty but items are still in flight
 * - `terminated`: the queue is empty and nothing is in flight; final
 */
export type FrontierState = 'running' | 'draining' | 'terminated';

type Waiter = (item: WorkItem | undefined) => void;

/**
 * Depth-bounded FIFO work queue shared by all crawl workers.
 *
 * Every item handed out by `pop` or `take` stays in flight until the
 * worker calls `complete`. The frontier terminates only when the queue is
 * empty and no item is in flight, so a worker that is still pushing the
 * children of its current item keeps the crawl alive.
 */
export class Frontier {
  private items: WorkItem[] = [];
  private inFlight = 0;
  private closed = false;
  private terminated = false;
  private waiters: Waiter[] = [];

  constructor(readonly maxDepth: number) {}

  /**
   * Whether an item at `depth` would be accepted by `push`.
   */
  accepts(depth: number): boolean {
    return depth >= 0 && depth <= this.maxDepth;
  }

  /**
   * Enqueue an item. Items beyond `maxDepth`, and any item offered after
   * the frontier was closed or terminated, are dropped.
   *
   * @returns true if the item was accepted
   */
  push(item: WorkItem): boolean {
    if (this.closed || this.terminated || !this.accepts(item.depth)) {
      return false;
    }

    // The queue is empty whenever a worker is waiting
    const waiter = this.waiters.shift();
    if (waiter) {
      this.inFlight++;
      waiter(item);
      return true;
    }

    this.items.push(item);
    return true;
  }

  /**
   * Remove and return the oldest queued item, marking it in flight.
   */
  pop(): WorkItem | undefined {
    const item = this.items.shift();
    if (item) {
      this.inFlight++;
    }
    return item;
  }

  /**
   * Wait for the next item.
   *
   * Resolves immediately when an item is queued, waits while the queue is
   * empty but other items are in flight, and resolves `undefined` once the
   * frontier has terminated.
   */
  take(): Promise<WorkItem | undefined> {
    const item = this.pop();
    if (item) {
      return Promise.resolve(item);
    }
    if (this.settle()) {
      return Promise.resolve(undefined);
    }
    return new Promise<WorkItem | undefined>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Mark one in-flight item as finished. Call after its children were pushed.
   */
  complete(): void {
    if (this.inFlight === 0) {
      throw new Error('Frontier.complete() called with no item in flight');
    }
    this.inFlight--;
    this.settle();
  }

  /**
   * Stop handing out work. Queued items are discarded; the frontier
   * terminates once the items already in flight complete.
   */
  close(): void {
    this.closed = true;
    this.items = [];
    this.settle();
  }

  /**
   * True when the queue is empty and no item is in flight.
   */
  isDrained(): boolean {
    return this.items.length === 0 && this.inFlight === 0;
  }

  get state(): FrontierState {
    if (this.terminated) {
      return 'terminated';
    }
    return this.items.length === 0 && this.inFlight > 0 ? 'draining' : 'running';
  }

  /** Number of queued items, not counting those in flight. */
  get size(): number {
    return this.items.length;
  }

  /** Number of items handed out and not yet completed. */
  get active(): number {
    return this.inFlight;
  }

  /**
   * Terminate if drained, releasing every waiting worker.
   *
   * @returns whether the frontier is terminated
   */
  private settle(): boolean {
    if (!this.terminated && this.isDrained()) {
      this.terminated = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter(undefined);
      }
    }
    return this.terminated;
  }
}
