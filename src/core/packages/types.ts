/**
 * Package set types.
 *
 * A package set is a tree of attribute sets whose leaves are packages
 * (`xorg.libX11`, `toolchain.stable."1.80.1".default`). Packages are opaque
 * to the evaluator; only the resolver interprets their outputs.
 */

/** A resolved, buildable package as handed out by a resolver. */
export interface Package {
  readonly type: 'derivation';
  /** Attribute path the package was declared at, e.g. `xorg.libX11`. */
  readonly attrPath: string;
  readonly name: string;
  readonly version?: string;
  /** Output name → store directory. */
  readonly outputs: Readonly<Record<string, string>>;
  /** Output selected by the reference (`freetype.dev` selects `dev`). */
  readonly outputName: string;
  /** False for packages that ship no shared libraries. */
  readonly hasLibraries: boolean;
}

export type PackageAttr = Package | PackageSet;

/** Read-only mapping from attribute name to package or nested set. */
export interface PackageSet {
  readonly [name: string]: PackageAttr;
}

/** Attributes an overlay adds or replaces. */
export type PackageSetPatch = PackageSet;

/** Package as it appears in an evaluated environment. */
export interface PackageRef {
  readonly attrPath: string;
  readonly name: string;
  readonly version?: string;
  readonly outputName: string;
  readonly path: string | undefined;
}

export function isPackage(value: PackageAttr): value is Package {
  return value.type === 'derivation';
}
