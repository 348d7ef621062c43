/**
 * Item Multiset
 *
 * Counts units per item id. Iteration follows first-insertion order so
 * results built from it are deterministic.
 */

export class ItemMultiset {
  private readonly counts = new Map<string, number>();
  private units = 0;

  static from(ids: Iterable<string>): ItemMultiset {
    const multiset = new ItemMultiset();
    for (const id of ids) {
      multiset.add(id);
    }
    return multiset;
  }

  /** Total number of units */
  get size(): number {
    return this.units;
  }

  add(id: string, quantity = 1): void {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new RangeError(`Quantity must be a positive integer, got ${quantity}`);
    }
    this.counts.set(id, this.count(id) + quantity);
    this.units += quantity;
  }

  /**
   * Remove one unit of `id`. Returns false when no unit is present.
   */
  remove(id: string): boolean {
    const current = this.count(id);
    if (current === 0) {
      return false;
    }

    if (current === 1) {
      this.counts.delete(id);
    } else {
      this.counts.set(id, current - 1);
    }
    this.units -= 1;
    return true;
  }

  count(id: string): number {
    return this.counts.get(id) ?? 0;
  }

  has(id: string): boolean {
    return this.counts.has(id);
  }

  distinctIds(): string[] {
    return [...this.counts.keys()];
  }

  entries(): Array<[string, number]> {
    return [...this.counts.entries()];
  }

  /**
   * True when every id here appears in `other` at least as many times
   */
  isSubMultisetOf(other: ItemMultiset): boolean {
    for (const [id, count] of this.counts) {
      if (other.count(id) < count) {
        return false;
      }
    }
    return true;
  }

  /**
   * Units left over after taking `other` away from this multiset:
   * Σ max(0, this[id] - other[id])
   */
  differenceSum(other: ItemMultiset): number {
    let leftover = 0;
    for (const [id, count] of this.counts) {
      leftover += Math.max(0, count - other.count(id));
    }
    return leftover;
  }
}
