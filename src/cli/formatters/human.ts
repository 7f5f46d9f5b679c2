/**
 * Human-readable output for the CLI.
 */
import chalk from 'chalk';
import type { Descriptor } from '../../core/descriptor/schema.js';
import type { EnvironmentSpec } from '../../core/environment/projector.js';
import { listOutputs, type DescriptorOutputs } from '../../core/outputs/aggregator.js';
import type { PackageRef } from '../../core/packages/types.js';

export function formatEnvironment(spec: EnvironmentSpec): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`devShells.${spec.name}`) + chalk.dim(` (${spec.platform})`));

  const section = (title: string, packages: readonly PackageRef[]): void => {
    lines.push('');
    lines.push(chalk.dim(`${title}:`));
    if (packages.length === 0) {
      lines.push('  (none)');
      return;
    }
    for (const pkg of packages) {
      const version = pkg.version ? ` ${pkg.version}` : '';
      lines.push(`  • ${chalk.cyan(pkg.attrPath)}${version}${pkg.path ? chalk.dim(`  ${pkg.path}`) : ''}`);
    }
  };

  section('Native build inputs', spec.nativeBuildInputs);
  section('Build inputs', spec.buildInputs);

  lines.push('');
  lines.push(chalk.dim('Variables:'));
  for (const [name, value] of Object.entries(spec.variables)) {
    lines.push(`  ${name}=${value}`);
  }

  return lines.join('\n');
}

/**
 * Tree of outputs, grouped by platform.
 */
export function formatOutputs(outputs: DescriptorOutputs): string {
  const lines: string[] = [];
  let platform: string | undefined;

  for (const entry of listOutputs(outputs)) {
    if (entry.platform !== platform) {
      platform = entry.platform;
      lines.push(chalk.bold(platform));
    }
    const spec = outputs[entry.platform].devShells[entry.name];
    lines.push(
      `  ${entry.kind}.${chalk.green(entry.name)}` +
        chalk.dim(` (${spec.nativeBuildInputs.length} native, ${spec.buildInputs.length} build inputs)`)
    );
  }

  return lines.length > 0 ? lines.join('\n') : chalk.dim('No outputs');
}

export function formatMetadata(descriptor: Descriptor): string {
  const lines: string[] = [];
  if (descriptor.description) {
    lines.push(descriptor.description);
    lines.push('');
  }

  lines.push(chalk.dim('Inputs:'));
  const inputs = Object.entries(descriptor.inputs);
  if (inputs.length === 0) lines.push('  (none)');
  for (const [identifier, input] of inputs) {
    const origin = input.follows !== undefined
      ? `follows ${input.follows}`
      : `${input.url ?? ''}${input.rev ? chalk.dim(` @ ${input.rev}`) : ''}`;
    lines.push(`  • ${chalk.cyan(identifier)}: ${origin}`);
    for (const [nested, link] of Object.entries(input.inputs)) {
      lines.push(`      ${nested} follows ${link.follows}`);
    }
  }

  lines.push('');
  lines.push(`${chalk.dim('Package set:')} ${descriptor.packages}`);
  lines.push(`${chalk.dim('Overlays:')} ${descriptor.overlays.length > 0 ? descriptor.overlays.join(', ') : '(none)'}`);
  lines.push(`${chalk.dim('Platforms:')} ${descriptor.platforms.join(', ')}`);

  return lines.join('\n');
}
