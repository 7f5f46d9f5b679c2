import { Command } from 'commander';
import { descriptorSources } from '../../core/descriptor/loader.js';
import { logger as log } from '../../utils/logger.js';
import { formatMetadata } from '../formatters/human.js';
import { loadProject, wantsJson, withProjectOptions, type ProjectOptions } from '../project.js';

/**
 * Create the metadata command. Reads the descriptor only; nothing is resolved.
 */
export function createMetadataCommand(): Command {
  return withProjectOptions(
    new Command('metadata')
      .description('Show the descriptor\'s description and inputs')
      .option('--json', 'Output as JSON')
  ).action(async (options: MetadataOptions) => {
    try {
      await runMetadata(options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

interface MetadataOptions extends ProjectOptions {
  json?: boolean;
}

async function runMetadata(options: MetadataOptions): Promise<void> {
  const project = await loadProject(options);
  const { descriptor } = project;

  if (wantsJson(project, options.json)) {
    console.log(JSON.stringify({
      description: descriptor.description,
      inputs: descriptorSources(descriptor),
      packages: descriptor.packages,
      overlays: descriptor.overlays,
      platforms: descriptor.platforms,
    }, null, 2));
    return;
  }

  console.log(formatMetadata(descriptor));
}
