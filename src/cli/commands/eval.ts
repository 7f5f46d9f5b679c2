import { Command } from 'commander';
import { evaluateDescriptor } from '../../core/evaluation/evaluator.js';
import { getDevShell } from '../../core/outputs/aggregator.js';
import { currentPlatform } from '../../core/platforms/selector.js';
import { logger as log } from '../../utils/logger.js';
import { formatEnvironment } from '../formatters/human.js';
import { loadProject, loadResolver, wantsJson, withProjectOptions, type ProjectOptions } from '../project.js';

/**
 * Create the eval command.
 */
export function createEvalCommand(): Command {
  return withProjectOptions(
    new Command('eval')
      .description('Evaluate one dev shell for a platform')
      .argument('[shell]', 'Dev shell name (default: from config)')
      .option('-p, --platform <id>', 'Platform identifier (default: current platform)')
      .option('--json', 'Output as JSON')
  ).action(async (shell: string | undefined, options: EvalOptions) => {
    try {
      await runEval(shell, options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

interface EvalOptions extends ProjectOptions {
  platform?: string;
  json?: boolean;
}

async function runEval(shell: string | undefined, options: EvalOptions): Promise<void> {
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

  if (wantsJson(project, options.json)) {
    console.log(JSON.stringify(spec, null, 2));
    return;
  }

  console.log(formatEnvironment(spec));
}
