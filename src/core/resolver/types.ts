import type { Overlay } from '../overlays/applicator.js';
import type { Package, PackageSet } from '../packages/types.js';
import type { PlatformIdentifier } from '../platforms/selector.js';
import type { SourceReference } from '../sources/registry.js';

/**
 * The package database an evaluation runs against.
 *
 * Implementations own fetching, revision pinning and building. Evaluation
 * calls them synchronously and never catches what they throw.
 */
export interface PackageResolver {
  /** Base package set supplied by `source` for `platform`. */
  packageSet(source: SourceReference, platform: PlatformIdentifier): PackageSet;
  /** Overlay supplied by `source` for `platform`. */
  overlay(source: SourceReference, platform: PlatformIdentifier): Overlay;
  /** Directory holding the package's shared libraries, if it has one. */
  libraryOutputPath(pkg: Package): string | undefined;
}

export interface PackageSelection {
  /** Source identifier supplying the base set. */
  readonly packageSet: string;
  /** Source identifiers supplying overlays, in application order. */
  readonly overlays: readonly string[];
}
