/**
 * Attribute paths: dotted references into a nested package set.
 *
 *   pkg-config
 *   xorg.libX11
 *   freetype.dev                       (output selection)
 *   toolchain.stable."1.80.1".default  (quoted segment containing dots)
 */
import { ResolutionError, ErrorCodes } from '../../utils/errors.js';
import { isPackage, type Package, type PackageSet } from './types.js';

const BARE_SEGMENT = /^[A-Za-z0-9_'+-]+$/;

/**
 * Split an attribute path into its segments, unquoting quoted segments.
 */
export function parseAttrPath(input: string): string[] {
  const segments: string[] = [];
  let i = 0;

  const fail = (reason: string): never => {
    throw new ResolutionError(
      ErrorCodes.INVALID_ATTR_PATH,
      `Invalid attribute path '${input}': ${reason}`,
      { attrPath: input, position: i }
    );
  };

  if (input.length === 0) fail('empty path');

  while (i < input.length) {
    let segment = '';
    if (input[i] === '"') {
      i++;
      let closed = false;
      while (i < input.length) {
        const ch = input[i];
        if (ch === '\\') {
          if (i + 1 >= input.length) fail('dangling escape');
          segment += input[i + 1];
          i += 2;
          continue;
        }
        if (ch === '"') {
          closed = true;
          i++;
          break;
        }
        segment += ch;
        i++;
      }
      if (!closed) fail('unterminated quoted segment');
    } else {
      const start = i;
      while (i < input.length && input[i] !== '.') i++;
      segment = input.slice(start, i);
      if (segment.length === 0) fail('empty segment');
      if (!BARE_SEGMENT.test(segment)) fail(`segment '${segment}' must be quoted`);
    }

    segments.push(segment);

    if (i < input.length) {
      if (input[i] !== '.') fail(`unexpected '${input[i]}'`);
      i++;
      if (i === input.length) fail('trailing dot');
    }
  }

  return segments;
}

/**
 * Join segments back into a path, quoting where needed.
 */
export function formatAttrPath(segments: readonly string[]): string {
  return segments
    .map((s) => (BARE_SEGMENT.test(s) ? s : `"${s.replace(/["\\]/g, '\\$&')}"`))
    .join('.');
}

/**
 * Look up a package by attribute path.
 *
 * A trailing segment naming one of the package's outputs selects that output
 * (`freetype.dev`). Anything that does not end on a package is undefined.
 */
export function lookupPackage(packages: PackageSet, attrPath: string): Package {
  const segments = parseAttrPath(attrPath);
  let current: PackageSet = packages;

  for (let index = 0; index < segments.length; index++) {
    const segment = segments[index];
    const value = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;

    if (value === undefined) {
      throw undefinedPackage(attrPath, formatAttrPath(segments.slice(0, index + 1)));
    }

    if (isPackage(value)) {
      const rest = segments.slice(index + 1);
      if (rest.length === 0) return value;
      if (rest.length === 1 && Object.prototype.hasOwnProperty.call(value.outputs, rest[0])) {
        return { ...value, outputName: rest[0] };
      }
      throw undefinedPackage(attrPath, formatAttrPath(segments.slice(0, index + 2)));
    }

    current = value;
  }

  throw new ResolutionError(
    ErrorCodes.UNDEFINED_PACKAGE,
    `Attribute '${attrPath}' is a package set, not a package`,
    { attrPath }
  );
}

function undefinedPackage(attrPath: string, missing: string): ResolutionError {
  return new ResolutionError(
    ErrorCodes.UNDEFINED_PACKAGE,
    `Undefined package '${attrPath}' (attribute '${missing}' is missing)`,
    { attrPath, missing }
  );
}
