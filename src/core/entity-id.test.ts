import { describe, test, expect } from 'vitest';
import { EntityIdAllocator } from './entity-id';
import { INDEX_BITS } from './constants';

describe('EntityIdAllocator', () => {
  test('hands out the lowest free index first', () => {
    const allocator = new EntityIdAllocator();
    const a = allocator.allocate();
    const b = allocator.allocate();
    allocator.allocate();

    allocator.free(b);
    allocator.free(a);

    expect(allocator.allocate()).toBe((1 << INDEX_BITS) | 0);
    expect(allocator.allocate()).toBe((1 << INDEX_BITS) | 1);
  });

  test('invalidates freed ids', () => {
    const allocator = new EntityIdAllocator();
    const a = allocator.allocate();

    allocator.free(a);
    const reused = allocator.allocate();

    expect(allocator.isValid(a)).toBe(false);
    expect(allocator.isValid(reused)).toBe(true);
    expect(reused).toBe(1 << INDEX_BITS);
  });

  test('ignores double frees', () => {
    const allocator = new EntityIdAllocator();
    const a = allocator.allocate();

    allocator.free(a);
    allocator.free(a);

    // the slot is released once, so the next two ids use different slots
    expect(allocator.allocate()).toBe(1 << INDEX_BITS);
    expect(allocator.allocate()).toBe(1);
  });

  test('never validates an index it has not handed out', () => {
    const allocator = new EntityIdAllocator();

    expect(allocator.isValid(0)).toBe(false);
  });
});
