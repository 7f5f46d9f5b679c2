import type { EnvironmentSpec } from '../../core/environment/projector.js';

/**
 * Quote a value for a POSIX shell.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * `export NAME='value'` lines for every variable of an environment.
 */
export function formatShellExports(spec: EnvironmentSpec): string {
  return Object.entries(spec.variables)
    .map(([name, value]) => `export ${name}=${shellQuote(value)}`)
    .join('\n');
}
