/**
 * Schema for the environment descriptor (devshell.yaml).
 */
import { z } from 'zod';
import { DEFAULT_PLATFORMS } from '../platforms/selector.js';
import { DEFAULT_LIBRARY_PATH_VARIABLE } from '../environment/projector.js';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Follows link of an input's own dependency; recorded, not evaluated. */
export const NestedInputSchema = z.object({
  follows: z.string().min(1),
});

export const InputSchema = z.object({
  url: z.string().min(1).optional(),
  rev: z.string().min(1).optional(),
  follows: z.string().min(1).optional(),
  inputs: z.record(z.string(), NestedInputSchema).default({}),
}).refine(
  (input) => (input.url === undefined) !== (input.follows === undefined),
  { message: 'an input needs exactly one of url or follows' }
).refine(
  (input) => input.rev === undefined || input.url !== undefined,
  { message: 'rev requires url' }
);

/** Scalars are accepted for convenience (`RUST_BACKTRACE: 1`). */
const VariableValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const ShellSchema = z.strictObject({
  nativeBuildInputs: z.array(z.string().min(1)).default([]),
  buildInputs: z.array(z.string().min(1)).default([]),
  library_path_variable: z.string().regex(VARIABLE_NAME, 'invalid variable name')
    .default(DEFAULT_LIBRARY_PATH_VARIABLE),
  env: z.record(z.string().regex(VARIABLE_NAME, 'invalid variable name'), VariableValueSchema).default({}),
});

export const DescriptorSchema = z.strictObject({
  /** Free text; no effect on evaluation. */
  description: z.string().default(''),
  inputs: z.record(z.string(), InputSchema).default({}),
  platforms: z.array(z.string().min(1)).min(1).default([...DEFAULT_PLATFORMS]),
  /** Input supplying the base package set. */
  packages: z.string().min(1),
  /** Inputs supplying overlays, applied in order. */
  overlays: z.array(z.string().min(1)).default([]),
  devShells: z.record(z.string(), ShellSchema).default({}),
});

export type InputDeclaration = z.infer<typeof InputSchema>;
export type ShellSpec = z.infer<typeof ShellSchema>;
export type Descriptor = z.infer<typeof DescriptorSchema>;
