/**
 * Output assembly: platform → devShells → name → environment.
 */
import type { EnvironmentSpec } from '../environment/projector.js';
import type { PlatformIdentifier } from '../platforms/selector.js';

export interface PlatformOutputs {
  readonly devShells: Readonly<Record<string, EnvironmentSpec>>;
}

export type DescriptorOutputs = Readonly<Record<PlatformIdentifier, PlatformOutputs>>;

export interface OutputEntry {
  readonly platform: PlatformIdentifier;
  readonly kind: 'devShells';
  readonly name: string;
}

export function aggregateOutputs(
  perPlatform: Readonly<Record<PlatformIdentifier, Readonly<Record<string, EnvironmentSpec>>>>
): DescriptorOutputs {
  const outputs: Record<PlatformIdentifier, PlatformOutputs> = {};
  for (const [platform, devShells] of Object.entries(perPlatform)) {
    outputs[platform] = Object.freeze({ devShells: Object.freeze({ ...devShells }) });
  }
  return Object.freeze(outputs);
}

/**
 * Look up one dev shell. A missing platform or name yields `undefined`.
 */
export function getDevShell(
  outputs: DescriptorOutputs,
  platform: PlatformIdentifier,
  name: string
): EnvironmentSpec | undefined {
  if (!Object.prototype.hasOwnProperty.call(outputs, platform)) return undefined;
  const shells = outputs[platform].devShells;
  return Object.prototype.hasOwnProperty.call(shells, name) ? shells[name] : undefined;
}

export function listOutputs(outputs: DescriptorOutputs): OutputEntry[] {
  return Object.entries(outputs).flatMap(([platform, { devShells }]) =>
    Object.keys(devShells).map((name) => ({ platform, kind: 'devShells' as const, name }))
  );
}
