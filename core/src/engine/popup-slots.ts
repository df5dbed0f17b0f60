/**
 * Popup Slots
 *
 * Bounded assignment of visible notifications to on-screen slots.
 * Slot indices live in [0, capacity); the lowest free index is always
 * handed out first; an id holds at most one slot and a slot at most one id.
 */

export interface SlotAssignment {
  id: number;
  slot: number;
}

export class PopupSlots {
  private occupants: Array<number | null>;
  private slotById = new Map<number, number>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`popup capacity must be a positive integer, got ${capacity}`);
    }
    this.occupants = new Array<number | null>(capacity).fill(null);
  }

  get size(): number {
    return this.slotById.size;
  }

  hasFree(): boolean {
    return this.slotById.size < this.capacity;
  }

  slotOf(id: number): number | undefined {
    return this.slotById.get(id);
  }

  /**
   * Give `id` the lowest free slot. Returns the slot it already holds if any,
   * or null when every slot is taken.
   */
  acquire(id: number): number | null {
    const held = this.slotById.get(id);
    if (held !== undefined) return held;

    const slot = this.occupants.indexOf(null);
    if (slot === -1) return null;

    this.occupants[slot] = id;
    this.slotById.set(id, slot);
    return slot;
  }

  /** Free the slot held by `id`. Returns the freed slot, or null. */
  release(id: number): number | null {
    const slot = this.slotById.get(id);
    if (slot === undefined) return null;

    this.occupants[slot] = null;
    this.slotById.delete(id);
    return slot;
  }

  /** Current assignments ordered by slot. */
  entries(): SlotAssignment[] {
    const result: SlotAssignment[] = [];
    this.occupants.forEach((id, slot) => {
      if (id !== null) result.push({ id, slot });
    });
    return result;
  }
}
