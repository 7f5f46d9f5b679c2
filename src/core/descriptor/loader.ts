import * as path from 'node:path';
import {
  DescriptorError,
  ErrorCodes,
  SystemError,
  fileExists,
  loadYamlWithSchema,
  parseYamlWithSchema,
} from '../../utils/index.js';
import type { ShellDeclaration } from '../environment/projector.js';
import { createSourceRegistry, type SourceReference, type SourceRegistry } from '../sources/registry.js';
import { DescriptorSchema, type Descriptor, type ShellSpec } from './schema.js';

export const DEFAULT_DESCRIPTOR_PATH = 'devshell.yaml';

/**
 * Load and validate a descriptor file.
 */
export async function loadDescriptor(filePath: string): Promise<Descriptor> {
  if (!(await fileExists(filePath))) {
    throw new DescriptorError(
      ErrorCodes.INVALID_DESCRIPTOR,
      `Descriptor not found: ${filePath}`,
      { path: filePath }
    );
  }

  try {
    return checkReferences(await loadYamlWithSchema(filePath, DescriptorSchema));
  } catch (error) {
    throw asDescriptorError(error, filePath);
  }
}

/**
 * Validate descriptor content already in memory.
 */
export function parseDescriptor(content: string): Descriptor {
  try {
    return checkReferences(parseYamlWithSchema(content, DescriptorSchema));
  } catch (error) {
    throw asDescriptorError(error);
  }
}

/**
 * The package set and every overlay must name a declared input.
 */
function checkReferences(descriptor: Descriptor): Descriptor {
  const declared = Object.keys(descriptor.inputs);
  for (const identifier of [descriptor.packages, ...descriptor.overlays]) {
    if (!declared.includes(identifier)) {
      throw new DescriptorError(
        ErrorCodes.UNKNOWN_INPUT,
        `'${identifier}' is not a declared input (declared: ${declared.join(', ') || 'none'})`,
        { identifier, declared }
      );
    }
  }
  return descriptor;
}

function asDescriptorError(error: unknown, filePath?: string): unknown {
  if (error instanceof SystemError) {
    return new DescriptorError(ErrorCodes.INVALID_DESCRIPTOR, error.message, {
      ...error.details,
      ...(filePath ? { path: filePath } : {}),
      cause: error.code,
    });
  }
  return error;
}

/**
 * Source references declared by a descriptor, in declaration order.
 */
export function descriptorSources(descriptor: Descriptor): SourceReference[] {
  return Object.entries(descriptor.inputs).map(([identifier, input]) => ({
    identifier,
    ...(input.url !== undefined ? { locator: input.url } : {}),
    ...(input.rev !== undefined ? { revision: input.rev } : {}),
    ...(input.follows !== undefined ? { follows: input.follows } : {}),
  }));
}

export function descriptorRegistry(descriptor: Descriptor): SourceRegistry {
  return createSourceRegistry(descriptorSources(descriptor));
}

export function toShellDeclaration(shell: ShellSpec): ShellDeclaration {
  return {
    nativeBuildInputs: shell.nativeBuildInputs,
    buildInputs: shell.buildInputs,
    libraryPathVariable: shell.library_path_variable,
    env: shell.env,
  };
}

/**
 * Resolve a descriptor path against the project root.
 */
export function getDescriptorPath(projectRoot: string, descriptorPath: string = DEFAULT_DESCRIPTOR_PATH): string {
  return path.resolve(projectRoot, descriptorPath);
}
