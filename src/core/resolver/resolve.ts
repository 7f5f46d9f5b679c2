import { applyOverlays } from '../overlays/applicator.js';
import type { PackageSet } from '../packages/types.js';
import type { PlatformIdentifier } from '../platforms/selector.js';
import type { SourceRegistry } from '../sources/registry.js';
import type { PackageResolver, PackageSelection } from './types.js';

/**
 * Resolve the package set for one platform: the base set of
 * `selection.packageSet` with the overlays of `selection.overlays` folded
 * over it in order.
 */
export function resolvePackages(
  resolver: PackageResolver,
  registry: SourceRegistry,
  selection: PackageSelection,
  platform: PlatformIdentifier
): PackageSet {
  const base = resolver.packageSet(registry.resolve(selection.packageSet), platform);
  const overlays = selection.overlays.map((identifier) =>
    resolver.overlay(registry.resolve(identifier), platform)
  );
  return applyOverlays(base, overlays);
}
