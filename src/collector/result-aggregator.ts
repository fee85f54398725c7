/**
 * Append-only result collection owned by one collection run.
 *
 * `add` is the only mutation and runs to completion without yielding, so
 * concurrent workers never interleave inside it.
 */
export class ResultAggregator<T> {
  private readonly items: T[] = [];

  add(item: T): void {
    this.items.push(item);
  }

  get size(): number {
    return this.items.length;
  }

  /** Copy of everything collected so far. */
  snapshot(): T[] {
    return [...this.items];
  }
}
