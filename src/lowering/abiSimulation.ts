import type { TypeDescriptor } from '../model/typeDescriptor.js';
import { EMPTY_LAYOUTS, type LayoutRegistry } from './layouts.js';
import { lower, type LoweredSlot, type ParamRecipe } from './lower.js';

/**
 * In-memory model of the boundary: recipes are executed against a fake
 * address space so the host → foreign encoding can be checked without a
 * compiler.
 */

export type HostValue =
  | number
  | bigint
  | boolean
  | string
  | null
  | readonly HostValue[]
  | { readonly [field: string]: HostValue };

export class SimPointer {
  constructor(readonly address: number | null) {}
}

export type SlotValue = HostValue | SimPointer;

export class SimulatedMemory {
  private readonly regions = new Map<number, readonly HostValue[]>();
  private next = 0x1000;

  alloc(values: readonly HostValue[]): SimPointer {
    const address = this.next;
    // keep every region at a distinct, non-null address, including empty ones
    this.next += Math.max(values.length, 1) * 8;
    this.regions.set(address, [...values]);
    return new SimPointer(address);
  }

  read(ptr: SimPointer, length: number): HostValue[] {
    if (ptr.address === null) throw new RangeError('null pointer dereference');
    const region = this.regions.get(ptr.address);
    if (!region) throw new RangeError(`dangling pointer 0x${ptr.address.toString(16)}`);
    if (length > region.length) {
      throw new RangeError(`read of ${length} elements past a region of ${region.length}`);
    }
    return region.slice(0, length);
  }
}

function asArray(value: HostValue, what: string): readonly HostValue[] {
  if (!Array.isArray(value)) throw new TypeError(`${what}: expected an array`);
  return value;
}

function asString(value: HostValue, what: string): string {
  if (typeof value !== 'string') throw new TypeError(`${what}: expected a string`);
  return value;
}

function asPointer(slot: SlotValue | undefined): SimPointer {
  if (!(slot instanceof SimPointer)) throw new TypeError('expected a pointer slot');
  return slot;
}

function asLength(slot: SlotValue | undefined): number {
  if (typeof slot !== 'number') throw new TypeError('expected a length slot');
  return slot;
}

function hostValue(slot: SlotValue | undefined): HostValue {
  if (slot === undefined || slot instanceof SimPointer) throw new TypeError('expected a value slot');
  return slot;
}

const utf8 = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function encodeSequence(type: TypeDescriptor, value: HostValue, mem: SimulatedMemory): SlotValue[] {
  if (type.kind === 'text') {
    const bytes = [...utf8.encode(asString(value, 'text'))];
    return [mem.alloc(bytes), bytes.length];
  }
  const items = asArray(value, 'slice');
  return [mem.alloc(items), items.length];
}

function decodeSequence(type: TypeDescriptor, ptr: SimPointer, len: number, mem: SimulatedMemory): HostValue {
  const cells = mem.read(ptr, len);
  if (type.kind !== 'text') return cells;
  const bytes = cells.map((c) => {
    if (typeof c !== 'number') throw new TypeError('text byte expected');
    return c;
  });
  return utf8Decoder.decode(new Uint8Array(bytes));
}

function innerOf(type: TypeDescriptor): TypeDescriptor {
  return type.kind === 'wrapped' ? type.inner : type;
}

/** Host side: what the generated wrapper passes for `value`. */
export function encodeWithRecipe(recipe: ParamRecipe, value: HostValue, mem: SimulatedMemory): SlotValue[] {
  const { type } = recipe;
  switch (recipe.shape) {
    case 'direct':
      return [value];
    case 'ptr-len':
      return encodeSequence(type, value, mem);
    case 'array-ptr': {
      const items = asArray(value, 'array');
      if (type.kind === 'fixed-array' && items.length !== type.length) {
        throw new TypeError(`array: expected ${type.length} elements, got ${items.length}`);
      }
      return [mem.alloc(items)];
    }
    case 'ref-ptr':
      return [mem.alloc([value])];
    case 'nullable-ptr':
      return [value === null ? new SimPointer(null) : mem.alloc([value])];
    case 'nullable-ptr-len':
      return value === null ? [new SimPointer(null), 0] : encodeSequence(innerOf(type), value, mem);
    case 'present-value':
      return value === null ? [false, 0] : [true, value];
  }
}

/** Callee side: what the foreign function sees through `calleeView`. */
export function decodeWithRecipe(recipe: ParamRecipe, slots: readonly SlotValue[], mem: SimulatedMemory): HostValue {
  const { type } = recipe;
  switch (recipe.shape) {
    case 'direct':
      return hostValue(slots[0]);
    case 'ptr-len':
      return decodeSequence(type, asPointer(slots[0]), asLength(slots[1]), mem);
    case 'array-ptr':
      return mem.read(asPointer(slots[0]), type.kind === 'fixed-array' ? type.length : 0);
    case 'ref-ptr':
      return mem.read(asPointer(slots[0]), 1)[0];
    case 'nullable-ptr': {
      const ptr = asPointer(slots[0]);
      return ptr.address === null ? null : mem.read(ptr, 1)[0];
    }
    case 'nullable-ptr-len': {
      const ptr = asPointer(slots[0]);
      return ptr.address === null ? null : decodeSequence(innerOf(type), ptr, asLength(slots[1]), mem);
    }
    case 'present-value':
      return slots[0] === true ? hostValue(slots[1]) : null;
  }
}

export type RoundTrip = {
  lowered: LoweredSlot[];
  slots: SlotValue[];
  decoded: HostValue;
};

/** Encodes `value` as the wrapper would and decodes it as the callee would. */
export function simulateRoundTrip(
  type: TypeDescriptor,
  value: HostValue,
  layouts: LayoutRegistry = EMPTY_LAYOUTS,
): RoundTrip {
  const { lowered, recipe } = lower(type, { name: 'x', layouts });
  const mem = new SimulatedMemory();
  const slots = encodeWithRecipe(recipe, value, mem);
  if (slots.length !== lowered.length) {
    throw new Error(`recipe produced ${slots.length} slots for ${lowered.length} lowered parameters`);
  }
  return { lowered, slots, decoded: decodeWithRecipe(recipe, slots, mem) };
}
