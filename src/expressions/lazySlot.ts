/**
 * A value built on first use and kept for the owner's lifetime.
 */
export class LazySlot<T> {
  private slot?: { value: T };

  constructor(private readonly init: () => T) {}

  get(): T {
    if (!this.slot) {
      this.slot = { value: this.init() };
    }
    return this.slot.value;
  }

  get initialized(): boolean {
    return this.slot !== undefined;
  }
}
