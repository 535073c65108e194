/**
 * Single-consumer handoff queue between a producer (a socket handler, or the caller) and the
 * loop that drains it.
 *
 * `push` never blocks: it returns false once the queue holds `capacity` items, and the
 * producer is expected to pause until `onDrain` fires.
 */
export class MessageQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T) => void> = [];
  private full = false;

  constructor(
    readonly capacity = 100,
    private readonly onDrain?: () => void
  ) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    this.items.push(item);
    if (this.items.length >= this.capacity) {
      this.full = true;
      return false;
    }
    return true;
  }

  /**
   * Resolves with the oldest item. If `signal` fires first the take is withdrawn and the
   * returned promise never settles, so no item is lost to an abandoned consumer.
   */
  take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) return new Promise<T>(() => undefined);

    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      if (this.full && this.items.length < this.capacity) {
        this.full = false;
        this.onDrain?.();
      }
      return Promise.resolve(item);
    }

    return new Promise<T>((resolve) => {
      const waiter = (item: T) => {
        signal?.removeEventListener("abort", withdraw);
        resolve(item);
      };
      const withdraw = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
      };
      signal?.addEventListener("abort", withdraw, { once: true });
      this.waiters.push(waiter);
    });
  }
}
