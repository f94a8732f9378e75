/**
 * Reclaimable reference to a built menu.
 *
 * The slot never keeps its value alive: whoever displays the menu holds it
 * strongly, and once nobody does the garbage collector may reclaim it. A
 * reclaimed or discarded slot reads as empty and the owner rebuilds.
 */
export class MenuSlot<T extends object> {
  private ref: WeakRef<T> | undefined;

  get(): T | undefined {
    const value = this.ref?.deref();
    if (value === undefined) this.ref = undefined;
    return value;
  }

  set(value: T): void {
    this.ref = new WeakRef(value);
  }

  discard(): void {
    this.ref = undefined;
  }

  get isEmpty(): boolean {
    return this.get() === undefined;
  }
}
