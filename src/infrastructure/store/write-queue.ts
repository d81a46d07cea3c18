/**
 * Serializes async writes issued from one process.
 *
 * Each task starts only after the previous one settled, so records are
 * stamped and written in the same order. A rejected task is reported to
 * its own caller and does not stall the tasks queued behind it.
 */
export class WriteQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}
