export {
  lower,
  lowerReturn,
  lowerSignature,
  expectedZigSignature,
  RET_OUT,
} from './lower.js';
export type {
  LoweredSignature,
  LoweredSlot,
  LowerContext,
  ParamRecipe,
  ParamShape,
  ReturnRecipe,
} from './lower.js';
export { layoutsOf, hasFixedLayout, EMPTY_LAYOUTS } from './layouts.js';
export type { LayoutRegistry } from './layouts.js';
export { simulateRoundTrip, SimPointer, SimulatedMemory } from './abiSimulation.js';
export type { HostValue, RoundTrip, SlotValue } from './abiSimulation.js';
export { zigType } from './zigTypes.js';
