import { describe, expect, it, vi } from 'vitest';
import { LazySlot } from '../src/expressions/lazySlot';

describe('LazySlot', () => {
  it('builds its value once, on first use', () => {
    const init = vi.fn(() => ({ built: true }));
    const slot = new LazySlot(init);
    expect(slot.initialized).toBe(false);
    expect(init).not.toHaveBeenCalled();

    const first = slot.get();
    expect(slot.get()).toBe(first);
    expect(slot.initialized).toBe(true);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('stays empty when the builder throws', () => {
    const slot = new LazySlot((): number => {
      throw new Error('not yet');
    });
    expect(() => slot.get()).toThrow('not yet');
    expect(slot.initialized).toBe(false);
  });
});
