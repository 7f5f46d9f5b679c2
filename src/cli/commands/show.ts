import { Command } from 'commander';
import { evaluateDescriptor } from '../../core/evaluation/evaluator.js';
import { listOutputs } from '../../core/outputs/aggregator.js';
import { logger as log } from '../../utils/logger.js';
import { formatOutputs } from '../formatters/human.js';
import { loadProject, loadResolver, wantsJson, withProjectOptions, type ProjectOptions } from '../project.js';

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  return withProjectOptions(
    new Command('show')
      .description('List the outputs of the descriptor for every platform')
      .option('--json', 'Output as JSON')
  ).action(async (options: ShowOptions) => {
    try {
      await runShow(options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

interface ShowOptions extends ProjectOptions {
  json?: boolean;
}

async function runShow(options: ShowOptions): Promise<void> {
  const project = await loadProject(options);
  const resolver = await loadResolver(project);
  const outputs = evaluateDescriptor(project.descriptor, resolver);

  if (wantsJson(project, options.json)) {
    console.log(JSON.stringify(listOutputs(outputs), null, 2));
    return;
  }

  console.log(formatOutputs(outputs));
}
