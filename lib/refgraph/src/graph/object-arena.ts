/**
 * Gives every object it sees a stable integer index.
 * Two values are the same object exactly when their indices are equal.
 */
export class ObjectArena {
  private readonly indices = new WeakMap<object, number>();
  private nextIndex = 0;

  indexOf(object: object): number {
    const existing = this.indices.get(object);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.nextIndex++;
    this.indices.set(object, index);
    return index;
  }

  same(left: object, right: object): boolean {
    return this.indexOf(left) === this.indexOf(right);
  }
}
