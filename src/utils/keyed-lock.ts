/**
 * FIFO lock over string keys.
 *
 * `acquire(keys)` enqueues one ticket on every key synchronously, so tickets
 * are ordered on each key by call order. A ticket is granted once it is at
 * the head of all of its queues. Because a ticket joins all of its queues in
 * one step, the oldest waiting ticket is always at the head of each of its
 * queues and multi-key acquisition cannot deadlock.
 */

interface Ticket {
  keys: string[];
  granted: boolean;
  grant: () => void;
}

export type ReleaseFn = () => void;

export class KeyedLock {
  private readonly queues: Map<string, Ticket[]> = new Map();

  /**
   * Wait until every key is held by the caller. Duplicate keys are ignored.
   */
  acquire(keys: readonly string[]): Promise<ReleaseFn> {
    const unique = Array.from(new Set(keys));

    return new Promise<ReleaseFn>((resolve) => {
      const ticket: Ticket = {
        keys: unique,
        granted: false,
        grant: () => resolve(() => this.release(ticket)),
      };

      for (const key of unique) {
        const queue = this.queues.get(key);
        if (queue) {
          queue.push(ticket);
        } else {
          this.queues.set(key, [ticket]);
        }
      }

      this.tryGrant(ticket);
    });
  }

  /**
   * Run `task` while holding every key.
   */
  async withLock<T>(keys: readonly string[], task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(keys);
    try {
      return await task();
    } finally {
      release();
    }
  }

  /** Keys with a holder or waiters */
  getActiveKeyCount(): number {
    return this.queues.size;
  }

  isLocked(key: string): boolean {
    return this.queues.get(key)?.[0]?.granted ?? false;
  }

  private tryGrant(ticket: Ticket): void {
    if (ticket.granted) return;
    const atHead = ticket.keys.every((key) => this.queues.get(key)?.[0] === ticket);
    if (atHead) {
      ticket.granted = true;
      ticket.grant();
    }
  }

  private release(ticket: Ticket): void {
    if (!ticket.granted) return;
    ticket.granted = false;

    const next: Ticket[] = [];
    for (const key of ticket.keys) {
      const queue = this.queues.get(key);
      if (!queue) continue;
      const index = queue.indexOf(ticket);
      if (index >= 0) queue.splice(index, 1);
      if (queue.length === 0) {
        this.queues.delete(key);
      } else if (queue[0]) {
        next.push(queue[0]);
      }
    }

    for (const waiting of next) {
      this.tryGrant(waiting);
    }
  }
}
