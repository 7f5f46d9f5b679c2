/**
 * Tests for output aggregation and lookup.
 */
import { describe, it, expect } from 'vitest';
import { aggregateOutputs, getDevShell, listOutputs } from '../../../../src/core/outputs/aggregator.js';
import type { EnvironmentSpec } from '../../../../src/core/environment/projector.js';

function spec(name: string, platform: string): EnvironmentSpec {
  return { name, platform, nativeBuildInputs: [], buildInputs: [], variables: { LD_LIBRARY_PATH: '' } };
}

describe('aggregateOutputs', () => {
  const outputs = aggregateOutputs({
    'x86_64-linux': { default: spec('default', 'x86_64-linux'), ci: spec('ci', 'x86_64-linux') },
    'aarch64-darwin': { default: spec('default', 'aarch64-darwin') },
  });

  it('should key dev shells by platform and name', () => {
    expect(Object.keys(outputs)).toEqual(['x86_64-linux', 'aarch64-darwin']);
    expect(outputs['x86_64-linux'].devShells.ci.name).toBe('ci');
    expect(outputs['aarch64-darwin'].devShells.default.platform).toBe('aarch64-darwin');
  });

  it('should freeze the structure', () => {
    expect(Object.isFrozen(outputs)).toBe(true);
    expect(Object.isFrozen(outputs['x86_64-linux'].devShells)).toBe(true);
  });

  describe('getDevShell', () => {
    it('should find an existing output', () => {
      expect(getDevShell(outputs, 'x86_64-linux', 'default')?.platform).toBe('x86_64-linux');
    });

    it('should return undefined for an unknown platform', () => {
      expect(getDevShell(outputs, 'riscv64-linux', 'default')).toBeUndefined();
    });

    it('should return undefined for an unknown shell', () => {
      expect(getDevShell(outputs, 'aarch64-darwin', 'ci')).toBeUndefined();
    });
  });

  describe('listOutputs', () => {
    it('should list every platform and shell', () => {
      expect(listOutputs(outputs)).toEqual([
        { platform: 'x86_64-linux', kind: 'devShells', name: 'default' },
        { platform: 'x86_64-linux', kind: 'devShells', name: 'ci' },
        { platform: 'aarch64-darwin', kind: 'devShells', name: 'default' },
      ]);
    });
  });
});
