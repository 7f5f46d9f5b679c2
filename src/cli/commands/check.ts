import { Command } from 'commander';
import { evaluateDescriptor } from '../../core/evaluation/evaluator.js';
import { listOutputs } from '../../core/outputs/aggregator.js';
import { logger as log } from '../../utils/logger.js';
import { loadProject, loadResolver, withProjectOptions, type ProjectOptions } from '../project.js';

/**
 * Create the check command: evaluate every output of every platform.
 */
export function createCheckCommand(): Command {
  return withProjectOptions(
    new Command('check')
      .description('Evaluate every dev shell on every platform')
  ).action(async (options: ProjectOptions) => {
    try {
      await runCheck(options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

async function runCheck(options: ProjectOptions): Promise<void> {
  const project = await loadProject(options);
  const resolver = await loadResolver(project);
  const outputs = evaluateDescriptor(project.descriptor, resolver);

  const entries = listOutputs(outputs);
  for (const entry of entries) {
    log.debug(`Evaluated ${entry.platform}.${entry.kind}.${entry.name}`);
  }
  log.success(
    `Evaluated ${entries.length} dev shell(s) on ${Object.keys(outputs).length} platform(s)`
  );
}
