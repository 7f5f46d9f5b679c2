/**
 * Shared loading for CLI commands: config, descriptor and resolver.
 */
import * as path from 'node:path';
import type { Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { descriptorRegistry, getDescriptorPath, loadDescriptor } from '../core/descriptor/loader.js';
import type { Descriptor } from '../core/descriptor/schema.js';
import { loadCatalogResolver } from '../core/resolver/catalog-resolver.js';
import type { PackageResolver } from '../core/resolver/types.js';
import { logger as log } from '../utils/logger.js';

export interface ProjectOptions {
  descriptor?: string;
  config: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface Project {
  root: string;
  config: Config;
  descriptorPath: string;
  descriptor: Descriptor;
}

/**
 * Add the options every command takes.
 */
export function withProjectOptions(command: Command): Command {
  return command
    .option('-d, --descriptor <path>', 'Path to the descriptor file (default: from config)')
    .option('-c, --config <path>', 'Path to config file', '.devshell/config.yaml')
    .option('--verbose', 'Log debug output')
    .option('--quiet', 'Only log errors');
}

export async function loadProject(options: ProjectOptions): Promise<Project> {
  const root = process.cwd();
  const config = await loadConfig(root, options.config);

  log.setLevel(options.verbose ? 'debug' : options.quiet ? 'error' : config.log_level);

  const descriptorPath = getDescriptorPath(root, options.descriptor ?? config.descriptor);
  log.debug(`Loading descriptor ${descriptorPath}`);
  const descriptor = await loadDescriptor(descriptorPath);

  return { root, config, descriptorPath, descriptor };
}

export async function loadResolver(project: Project): Promise<PackageResolver> {
  return loadCatalogResolver(descriptorRegistry(project.descriptor), {
    projectRoot: project.root,
    descriptorDir: path.dirname(project.descriptorPath),
    catalogs: project.config.catalogs,
  });
}

export function wantsJson(project: Project, json: boolean | undefined): boolean {
  return json ?? project.config.output.format === 'json';
}
