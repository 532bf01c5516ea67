const settled = (): void => undefined;

/** Registers work the key must wait for, beyond the task's own promise. */
export type HoldKey = (work: Promise<unknown>) => void;

/**
 * Runs tasks that share a key one after another, in submission order.
 * Tasks under different keys do not wait for each other.
 *
 * A task may `hold` the key on promises it stopped awaiting (a call that lost
 * a timeout race, say); the next task for the key starts only once those have
 * settled too. The caller still gets the task's own result as soon as it is
 * ready.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: (hold: HoldKey) => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const held: Promise<void>[] = [];
    const hold: HoldKey = (work) => {
      held.push(work.then(settled, settled));
    };

    const next = previous.then(() => task(hold));
    const tail = next.then(settled, settled).then(() => Promise.all(held)).then(settled);

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return next;
  }

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}
