export type SlotLookup<T> =
  | { state: 'occupied'; value: T }
  | { state: 'vacant' }
  | { state: 'unallocated' };

/**
 * Indexed storage whose holes are refilled lowest-index first, so the table
 * stays as long as the peak number of simultaneous entries and never shrinks.
 */
export class SlotTable<T> {
  private readonly slots: Array<T | undefined> = [];

  insert(value: T): number {
    const hole = this.slots.findIndex((slot) => slot === undefined);
    if (hole !== -1) {
      this.slots[hole] = value;
      return hole;
    }
    this.slots.push(value);
    return this.slots.length - 1;
  }

  lookup(index: number): SlotLookup<T> {
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) return { state: 'unallocated' };
    const value = this.slots[index];
    return value === undefined ? { state: 'vacant' } : { state: 'occupied', value };
  }

  clear(index: number): T | undefined {
    const value = this.slots[index];
    if (value !== undefined) this.slots[index] = undefined;
    return value;
  }

  occupied(): T[] {
    return this.slots.filter((slot): slot is T => slot !== undefined);
  }

  get length(): number { return this.slots.length; }
}
