/**
 * Tests for the show command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createShowCommand } from '../../../../src/cli/commands/show.js';
import { testConfig, testProject, testResolver } from '../../../helpers/project.js';

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    cyan: (s: string) => s,
    green: (s: string) => s,
  },
}));

vi.mock('../../../../src/cli/project.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/cli/project.js')>();
  return { ...actual, loadProject: vi.fn(), loadResolver: vi.fn() };
});

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    success: vi.fn(),
  },
}));

import { loadProject, loadResolver } from '../../../../src/cli/project.js';
import { logger } from '../../../../src/utils/logger.js';

describe('show command', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    vi.mocked(loadProject).mockResolvedValue(testProject());
    vi.mocked(loadResolver).mockResolvedValue(testResolver());
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  it('should create a command with correct name', () => {
    expect(createShowCommand().name()).toBe('show');
  });

  it('should list outputs as JSON', async () => {
    await createShowCommand().parseAsync(['node', 'test', '--json']);

    expect(JSON.parse(consoleLogSpy.mock.calls[0][0])).toEqual([
      { platform: 'x86_64-linux', kind: 'devShells', name: 'default' },
      { platform: 'aarch64-darwin', kind: 'devShells', name: 'default' },
    ]);
  });

  it('should print a tree by default', async () => {
    await createShowCommand().parseAsync(['node', 'test']);

    expect(consoleLogSpy).toHaveBeenCalledWith([
      'x86_64-linux',
      '  devShells.default (1 native, 1 build inputs)',
      'aarch64-darwin',
      '  devShells.default (1 native, 1 build inputs)',
    ].join('\n'));
  });

  it('should use the configured output format', async () => {
    vi.mocked(loadProject).mockResolvedValue(testProject(testConfig({ output: { format: 'json' } })));

    await createShowCommand().parseAsync(['node', 'test']);

    expect(JSON.parse(consoleLogSpy.mock.calls[0][0])).toHaveLength(2);
  });

  it('should print nothing when evaluation fails', async () => {
    vi.mocked(loadResolver).mockResolvedValue({
      ...testResolver(),
      packageSet: () => {
        throw new Error('catalog unavailable');
      },
    });

    try {
      await createShowCommand().parseAsync(['node', 'test']);
    } catch {
      // Expected
    }

    expect(logger.error).toHaveBeenCalledWith('catalog unavailable');
    expect(processExitSpy).toHaveBeenCalledWith(1);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });
});
