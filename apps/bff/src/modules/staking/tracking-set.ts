/**
 * Enumeration-only membership set. Iteration order is not part of the contract.
 */
export class TrackingSet<T> {
  private readonly members: Set<T>;

  constructor(initial: Iterable<T> = []) {
    this.members = new Set(initial);
  }

  /** Returns false when the value was already tracked. */
  add(value: T): boolean {
    if (this.members.has(value)) {
      return false;
    }
    this.members.add(value);
    return true;
  }

  /** Returns false when the value was not tracked. */
  remove(value: T): boolean {
    return this.members.delete(value);
  }

  has(value: T): boolean {
    return this.members.has(value);
  }

  get size(): number {
    return this.members.size;
  }

  values(): T[] {
    return Array.from(this.members);
  }
}
