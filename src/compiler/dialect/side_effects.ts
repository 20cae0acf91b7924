/**
 * Side-effect records for builtins and user functions
 */

import type { EffectCategory } from "./instructions.js";

export interface SideEffects {
  /** Can be moved or duplicated as long as its arguments are. */
  movable: boolean;
  /** Can be removed if its result is unused. */
  sideEffectFree: boolean;
  /** Can be removed if its result is unused and msize is never read. */
  sideEffectFreeIfNoMSize: boolean;
  invalidatesStorage: boolean;
  invalidatesMemory: boolean;
}

export const NO_SIDE_EFFECTS: Readonly<SideEffects> = {
  movable: true,
  sideEffectFree: true,
  sideEffectFreeIfNoMSize: true,
  invalidatesStorage: false,
  invalidatesMemory: false,
};

export const WORST_SIDE_EFFECTS: Readonly<SideEffects> = {
  movable: false,
  sideEffectFree: false,
  sideEffectFreeIfNoMSize: false,
  invalidatesStorage: true,
  invalidatesMemory: true,
};

export function combineSideEffects(a: SideEffects, b: SideEffects): SideEffects {
  return {
    movable: a.movable && b.movable,
    sideEffectFree: a.sideEffectFree && b.sideEffectFree,
    sideEffectFreeIfNoMSize: a.sideEffectFreeIfNoMSize && b.sideEffectFreeIfNoMSize,
    invalidatesStorage: a.invalidatesStorage || b.invalidatesStorage,
    invalidatesMemory: a.invalidatesMemory || b.invalidatesMemory,
  };
}

export function sideEffectsEqual(a: SideEffects, b: SideEffects): boolean {
  return (
    a.movable === b.movable &&
    a.sideEffectFree === b.sideEffectFree &&
    a.sideEffectFreeIfNoMSize === b.sideEffectFreeIfNoMSize &&
    a.invalidatesStorage === b.invalidatesStorage &&
    a.invalidatesMemory === b.invalidatesMemory
  );
}

const effects = (
  movable: boolean,
  sideEffectFree: boolean,
  sideEffectFreeIfNoMSize: boolean,
  invalidatesStorage: boolean,
  invalidatesMemory: boolean,
): SideEffects => ({
  movable,
  sideEffectFree,
  sideEffectFreeIfNoMSize,
  invalidatesStorage,
  invalidatesMemory,
});

export function sideEffectsOfCategory(category: EffectCategory): SideEffects {
  switch (category) {
    case "pure":
    case "stack":
      return { ...NO_SIDE_EFFECTS };
    case "state":
    case "msize":
      return effects(false, true, true, false, false);
    case "memoryRead":
      return effects(false, false, true, false, false);
    case "memoryWrite":
      return effects(false, false, false, false, true);
    case "storageWrite":
      return effects(false, false, false, true, false);
    case "log":
    case "terminate":
      return effects(false, false, false, false, false);
    case "call":
      return effects(false, false, false, true, true);
    case "staticcall":
      return effects(false, false, false, false, true);
    case "create":
      return effects(false, false, false, true, false);
    case "control":
      return { ...WORST_SIDE_EFFECTS };
  }
}
