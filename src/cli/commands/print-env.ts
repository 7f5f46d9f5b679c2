import { Command } from 'commander';
import { evaluateDescriptor } from '../../core/evaluation/evaluator.js';
import { getDevShell } from '../../core/outputs/aggregator.js';
import { currentPlatform } from '../../core/platforms/selector.js';
import { logger as log } from '../../utils/logger.js';
import { formatShellExports } from '../formatters/shell.js';
import { loadProject, loadResolver, withProjectOptions, type ProjectOptions } from '../project.js';

/**
 * Create the print-env command: shell exports for `eval "$(devshell print-env)"`.
 */
export function createPrintEnvCommand(): Command {
  return withProjectOptions(
    new Command('print-env')
      .description('Print a dev shell\'s variables as shell export statements')
      .argument('[shell]', 'Dev shell name (default: from config)')
      .option('-p, --platform <id>', 'Platform identifier (default: current platform)')
  ).action(async (shell: string | undefined, options: PrintEnvOptions) => {
    try {
      await runPrintEnv(shell, options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

interface PrintEnvOptions extends ProjectOptions {
  platform?: string;
}

async function runPrintEnv(shell: string | undefined, options: PrintEnvOptions): Promise<void> {
  const project = await loadProject(options);
  const resolver = await loadResolver(project);

  const platform = options.platform ?? currentPlatform();
  const name = shell ?? project.config.default_shell;

  const outputs = evaluateDescriptor(project.descriptor, resolver, { platforms: [platform], shells: [name] });
  const spec = getDevShell(outputs, platform, name);

  if (!spec) {
    log.error(`No such output: ${platform}.devShells.${name}`);
    process.exit(1);
  }

  console.log(formatShellExports(spec));
}
