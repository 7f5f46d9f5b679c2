/**
 * Descriptor evaluation: registry → per-platform package sets → dev shells.
 *
 * Single pass and synchronous. Any error aborts the whole evaluation; there
 * is no partial output.
 */
import { descriptorRegistry, toShellDeclaration } from '../descriptor/loader.js';
import type { Descriptor } from '../descriptor/schema.js';
import { projectEnvironment, type EnvironmentSpec } from '../environment/projector.js';
import { aggregateOutputs, type DescriptorOutputs } from '../outputs/aggregator.js';
import { forEachPlatform, type PlatformIdentifier } from '../platforms/selector.js';
import { resolvePackages } from '../resolver/resolve.js';
import type { PackageResolver } from '../resolver/types.js';

export interface EvaluateOptions {
  /**
   * Evaluate only these of the descriptor's platforms. Platforms the
   * descriptor does not list are ignored.
   */
  platforms?: readonly PlatformIdentifier[];
  /** Evaluate only these dev shells. */
  shells?: readonly string[];
}

export function evaluateDescriptor(
  descriptor: Descriptor,
  resolver: PackageResolver,
  options: EvaluateOptions = {}
): DescriptorOutputs {
  const registry = descriptorRegistry(descriptor);
  const selection = { packageSet: descriptor.packages, overlays: descriptor.overlays };

  const platforms = options.platforms
    ? descriptor.platforms.filter((p) => options.platforms?.includes(p))
    : descriptor.platforms;
  const shellNames = Object.keys(descriptor.devShells)
    .filter((name) => !options.shells || options.shells.includes(name));

  const perPlatform = forEachPlatform(platforms, (platform) => {
    const packages = resolvePackages(resolver, registry, selection, platform);
    const shells: Record<string, EnvironmentSpec> = {};
    for (const name of shellNames) {
      shells[name] = projectEnvironment(packages, toShellDeclaration(descriptor.devShells[name]), {
        name,
        platform,
        libraryOutputPath: (pkg) => resolver.libraryOutputPath(pkg),
      });
    }
    return shells;
  });

  return aggregateOutputs(perPlatform);
}
