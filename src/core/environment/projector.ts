/**
 * Environment projection: from a resolved package set and a shell
 * declaration to the environment a shell would expose. Computes a
 * specification only; nothing is built or written.
 */
import { DescriptorError, ErrorCodes } from '../../utils/errors.js';
import { lookupPackage } from '../packages/attr-path.js';
import type { Package, PackageRef, PackageSet } from '../packages/types.js';
import { pathSeparatorFor, type PlatformIdentifier } from '../platforms/selector.js';

export const DEFAULT_LIBRARY_PATH_VARIABLE = 'LD_LIBRARY_PATH';

export type LibraryOutputPath = (pkg: Package) => string | undefined;

export interface ShellDeclaration {
  /** Tools used while the shell itself is built or used (linker, analyzer). */
  readonly nativeBuildInputs: readonly string[];
  /** Runtime dependencies of what is developed inside the shell. */
  readonly buildInputs: readonly string[];
  /** Variable receiving the library search path. */
  readonly libraryPathVariable?: string;
  /** Literal extra variables. */
  readonly env?: Readonly<Record<string, string>>;
}

export interface ProjectionContext {
  readonly name: string;
  readonly platform: PlatformIdentifier;
  readonly libraryOutputPath: LibraryOutputPath;
}

export interface EnvironmentSpec {
  readonly name: string;
  readonly platform: PlatformIdentifier;
  readonly nativeBuildInputs: readonly PackageRef[];
  readonly buildInputs: readonly PackageRef[];
  readonly variables: Readonly<Record<string, string>>;
}

/**
 * Library directories of `packages`, in order, joined by `separator`.
 * Packages without a library directory contribute nothing. Duplicates are kept.
 */
export function makeLibraryPath(
  packages: readonly Package[],
  libraryOutputPath: LibraryOutputPath,
  separator: string = ':'
): string {
  return packages
    .map((pkg) => libraryOutputPath(pkg))
    .filter((dir): dir is string => dir !== undefined && dir.length > 0)
    .join(separator);
}

export function projectEnvironment(
  packages: PackageSet,
  shell: ShellDeclaration,
  context: ProjectionContext
): EnvironmentSpec {
  const nativeBuildInputs = shell.nativeBuildInputs.map((attrPath) => lookupPackage(packages, attrPath));
  const buildInputs = shell.buildInputs.map((attrPath) => lookupPackage(packages, attrPath));
  const refs = (attrPaths: readonly string[], resolved: readonly Package[]): readonly PackageRef[] =>
    Object.freeze(resolved.map((pkg, index) => toPackageRef(attrPaths[index], pkg)));

  const libraryPathVariable = shell.libraryPathVariable ?? DEFAULT_LIBRARY_PATH_VARIABLE;
  const env = shell.env ?? {};
  if (Object.prototype.hasOwnProperty.call(env, libraryPathVariable)) {
    throw new DescriptorError(
      ErrorCodes.VARIABLE_CONFLICT,
      `Shell '${context.name}' sets '${libraryPathVariable}' explicitly, but it holds the derived library path`,
      { shell: context.name, variable: libraryPathVariable }
    );
  }

  const variables: Record<string, string> = {
    [libraryPathVariable]: makeLibraryPath(buildInputs, context.libraryOutputPath, pathSeparatorFor(context.platform)),
    ...env,
  };

  return Object.freeze({
    name: context.name,
    platform: context.platform,
    nativeBuildInputs: refs(shell.nativeBuildInputs, nativeBuildInputs),
    buildInputs: refs(shell.buildInputs, buildInputs),
    variables: Object.freeze(variables),
  });
}

function toPackageRef(attrPath: string, pkg: Package): PackageRef {
  return Object.freeze({
    attrPath,
    name: pkg.name,
    ...(pkg.version !== undefined ? { version: pkg.version } : {}),
    outputName: pkg.outputName,
    path: pkg.outputs[pkg.outputName],
  });
}
