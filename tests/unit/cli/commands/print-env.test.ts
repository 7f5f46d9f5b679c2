/**
 * Tests for the print-env command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createPrintEnvCommand } from '../../../../src/cli/commands/print-env.js';
import { testConfig, testProject, testResolver } from '../../../helpers/project.js';

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

describe('print-env command', () => {
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
    expect(createPrintEnvCommand().name()).toBe('print-env');
  });

  it('should not offer JSON output', () => {
    const optionNames = createPrintEnvCommand().options.map((opt) => opt.long);
    expect(optionNames).not.toContain('--json');
    expect(optionNames).toContain('--platform');
  });

  it('should print export statements', async () => {
    await createPrintEnvCommand().parseAsync(['node', 'test', '-p', 'x86_64-linux']);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      "export LD_LIBRARY_PATH='/store/expat/lib'\nexport CC='clang'"
    );
  });

  it('should use the configured default shell', async () => {
    vi.mocked(loadProject).mockResolvedValue(testProject(testConfig({ default_shell: 'ci' })));

    try {
      await createPrintEnvCommand().parseAsync(['node', 'test', '-p', 'x86_64-linux']);
    } catch {
      // Expected
    }

    expect(logger.error).toHaveBeenCalledWith('No such output: x86_64-linux.devShells.ci');
    expect(processExitSpy).toHaveBeenCalledWith(1);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });
});
