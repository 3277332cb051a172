import { describe, it, expect } from 'vitest';

import { fixedArray, record, scalar, slice, text, wrapped } from '../model/typeDescriptor.js';
import { SimPointer, simulateRoundTrip } from './abiSimulation.js';

describe('ABI round trip', () => {
  it('carries an empty slice as a non-null pointer with zero length', () => {
    const { slots, decoded } = simulateRoundTrip(slice(scalar('i32')), []);
    expect(decoded).toEqual([]);
    expect(slots[1]).toBe(0);
    expect(slots[0]).toBeInstanceOf(SimPointer);
    expect(slots[0] instanceof SimPointer && slots[0].address).not.toBeNull();
  });

  it('carries slice contents', () => {
    expect(simulateRoundTrip(slice(scalar('i32')), [3, -1, 7]).decoded).toEqual([3, -1, 7]);
  });

  it('carries zero-length and multi-byte text', () => {
    expect(simulateRoundTrip(text(), '').decoded).toBe('');

    const { slots, decoded } = simulateRoundTrip(text(), 'héllo');
    expect(decoded).toBe('héllo');
    expect(slots[1]).toBe(6);
  });

  it('exposes every index of a fixed array', () => {
    const values = Array.from({ length: 16 }, (_, i) => i * 2);
    const { decoded, lowered } = simulateRoundTrip(fixedArray(scalar('u8'), 16), values);
    expect(lowered).toHaveLength(1);
    expect(Array.isArray(decoded) && decoded[15]).toBe(30);
    expect(decoded).toEqual(values);
  });

  it('rejects a fixed array of the wrong length', () => {
    expect(() => simulateRoundTrip(fixedArray(scalar('u8'), 4), [1, 2, 3])).toThrow(
      'array: expected 4 elements, got 3',
    );
  });

  it('distinguishes None from an empty optional slice', () => {
    const type = wrapped('optional', slice(scalar('u8')));
    const none = simulateRoundTrip(type, null);
    const empty = simulateRoundTrip(type, []);

    expect(none.decoded).toBeNull();
    expect(none.slots[0] instanceof SimPointer && none.slots[0].address).toBeNull();
    expect(empty.decoded).toEqual([]);
  });

  it('carries optional scalars through the presence flag', () => {
    const type = wrapped('optional', scalar('u32'));
    expect(simulateRoundTrip(type, null).slots).toEqual([false, 0]);
    expect(simulateRoundTrip(type, null).decoded).toBeNull();
    expect(simulateRoundTrip(type, 7).decoded).toBe(7);
  });

  it('carries records by value and behind optional pointers', () => {
    const layouts = new Map([['Point', 'c' as const]]);
    const p = { x: 1.5, y: -2 };
    expect(simulateRoundTrip(record('Point'), p, layouts).decoded).toEqual(p);
    expect(simulateRoundTrip(wrapped('optional', record('Point')), p, layouts).decoded).toEqual(p);
    expect(simulateRoundTrip(wrapped('optional', record('Point')), null, layouts).decoded).toBeNull();
  });

  it('carries references by pointer', () => {
    expect(simulateRoundTrip(wrapped('reference', scalar('u64')), 42n).decoded).toBe(42n);
  });
});
