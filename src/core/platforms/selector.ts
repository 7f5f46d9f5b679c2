/**
 * Per-platform fan-out.
 */
import { DescriptorError, ErrorCodes } from '../../utils/errors.js';

/** Opaque OS+architecture key, e.g. `x86_64-linux`. */
export type PlatformIdentifier = string;

/** Platforms evaluated when a descriptor does not list its own. */
export const DEFAULT_PLATFORMS: readonly PlatformIdentifier[] = Object.freeze([
  'x86_64-linux',
  'aarch64-linux',
  'x86_64-darwin',
  'aarch64-darwin',
]);

/**
 * Evaluate once per platform, in enumeration order, into a fresh mapping.
 * Each call receives only its platform identifier.
 */
export function forEachPlatform<T>(
  platforms: readonly PlatformIdentifier[],
  evaluate: (platform: PlatformIdentifier) => T
): Record<PlatformIdentifier, T> {
  const results: Record<PlatformIdentifier, T> = {};
  for (const platform of platforms) {
    if (Object.prototype.hasOwnProperty.call(results, platform)) {
      throw new DescriptorError(
        ErrorCodes.DUPLICATE_PLATFORM,
        `Platform '${platform}' is listed more than once`,
        { platform, platforms: [...platforms] }
      );
    }
    results[platform] = evaluate(platform);
  }
  return results;
}

/**
 * Platform identifier of the running process.
 */
export function currentPlatform(
  arch: string = process.arch,
  os: string = process.platform
): PlatformIdentifier {
  const cpu = arch === 'x64' ? 'x86_64'
    : arch === 'arm64' ? 'aarch64'
    : arch === 'ia32' ? 'i686'
    : arch;
  const system = os === 'win32' ? 'windows' : os;
  return `${cpu}-${system}`;
}

/**
 * Separator for search-path variables on a platform.
 */
export function pathSeparatorFor(platform: PlatformIdentifier): string {
  return platform.endsWith('-windows') ? ';' : ':';
}
