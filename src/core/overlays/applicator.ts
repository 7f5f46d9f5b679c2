/**
 * Overlay application: a left fold of pure patch functions over a base set.
 *
 * Each overlay sees the set produced by the overlays before it and returns a
 * patch. Patch attributes replace existing top-level attributes wholesale, so
 * when two overlays define the same name the later one wins.
 */
import type { PackageAttr, PackageSet, PackageSetPatch } from '../packages/types.js';

export type Overlay = (prev: PackageSet) => PackageSetPatch;

/**
 * Apply overlays in order. Errors thrown by an overlay propagate unchanged.
 */
export function applyOverlays(base: PackageSet, overlays: readonly Overlay[]): PackageSet {
  return overlays.reduce<PackageSet>(
    (prev, overlay) => Object.freeze({ ...prev, ...overlay(prev) }),
    Object.freeze({ ...base })
  );
}

/**
 * Collapse a list of overlays into a single overlay with the same result.
 */
export function composeOverlays(overlays: readonly Overlay[]): Overlay {
  return (prev) => {
    const result = applyOverlays(prev, overlays);
    const patch: Record<string, PackageAttr> = {};
    for (const [name, value] of Object.entries(result)) {
      if (prev[name] !== value) patch[name] = value;
    }
    return patch;
  };
}

/**
 * An overlay that always contributes the same attributes.
 */
export function overlayFromPatch(patch: PackageSetPatch): Overlay {
  const frozen = Object.freeze({ ...patch });
  return () => frozen;
}
