type Waiter<T> = (value: T | null) => void;

export interface BoundedChannelOptions {
  capacity: number;
  /** Called on every `logEvery`-th eviction with the running drop count. */
  onDropMilestone?: (dropCount: number) => void;
  logEvery?: number;
}

/**
 * Fixed-capacity FIFO between the capture callback and the chunk pump.
 * `push` never blocks: at capacity the oldest frame is evicted to admit the new one.
 */
export class BoundedChannel<T extends { length: number }> {
  readonly capacity: number;
  #slots: Array<T | undefined>;
  #head = 0;
  #size = 0;
  #dropCount = 0;
  #waiters: Waiter<T>[] = [];
  readonly #logEvery: number;
  readonly #onDropMilestone: ((dropCount: number) => void) | undefined;

  constructor(options: BoundedChannelOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new Error(`channel capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.#slots = new Array<T | undefined>(options.capacity);
    this.#logEvery = Math.max(1, options.logEvery ?? 10);
    this.#onDropMilestone = options.onDropMilestone;
  }

  get size(): number {
    return this.#size;
  }

  get dropCount(): number {
    return this.#dropCount;
  }

  push(item: T): void {
    if (item.length === 0) return;
    if (this.#tryInsert(item)) return;

    this.#dropCount += 1;
    this.#tryShift();
    // If the retry still fails the frame is lost; the milestone log below is the only trace.
    this.#tryInsert(item);
    if (this.#dropCount % this.#logEvery === 0) {
      this.#onDropMilestone?.(this.#dropCount);
    }
  }

  tryShift(): T | null {
    return this.#tryShift();
  }

  /**
   * Oldest queued item, waiting up to `timeoutMs` for one to arrive.
   * Resolves `null` on timeout or once `signal` aborts.
   */
  next(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
    const ready = this.#tryShift();
    if (ready !== null) return Promise.resolve(ready);
    if (signal?.aborted) return Promise.resolve(null);

    return new Promise<T | null>((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      const settle: Waiter<T> = (value) => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.#waiters.indexOf(settle);
        if (index >= 0) this.#waiters.splice(index, 1);
        resolve(value);
      };
      const onAbort = () => settle(null);
      timer = setTimeout(() => settle(null), Math.max(0, timeoutMs));
      signal?.addEventListener('abort', onAbort, { once: true });
      this.#waiters.push(settle);
    });
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let offset = 0; offset < this.#size; offset += 1) {
      const item = this.#slots[(this.#head + offset) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  #tryInsert(item: T): boolean {
    const waiter = this.#waiters[0];
    if (waiter) {
      // A parked consumer implies an empty queue; hand the item over directly.
      waiter(item);
      return true;
    }
    if (this.#size >= this.capacity) return false;
    this.#slots[(this.#head + this.#size) % this.capacity] = item;
    this.#size += 1;
    return true;
  }

  #tryShift(): T | null {
    if (this.#size === 0) return null;
    const item = this.#slots[this.#head];
    this.#slots[this.#head] = undefined;
    this.#head = (this.#head + 1) % this.capacity;
    this.#size -= 1;
    return item ?? null;
  }
}
