/**
 * Tests for descriptor loading and validation.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  descriptorRegistry,
  descriptorSources,
  getDescriptorPath,
  loadDescriptor,
  parseDescriptor,
  toShellDeclaration,
} from '../../../../src/core/descriptor/loader.js';
import { DescriptorError, ErrorCodes } from '../../../../src/utils/errors.js';
import { captureError, captureRejection } from '../../../helpers/errors.js';

const MINIMAL = `
inputs:
  pkgs: { url: "github:example/pkgs" }
packages: pkgs
`;

describe('parseDescriptor', () => {
  it('should apply defaults', () => {
    const descriptor = parseDescriptor(MINIMAL);

    expect(descriptor.description).toBe('');
    expect(descriptor.platforms).toEqual(['x86_64-linux', 'aarch64-linux', 'x86_64-darwin', 'aarch64-darwin']);
    expect(descriptor.overlays).toEqual([]);
    expect(descriptor.devShells).toEqual({});
    expect(descriptor.inputs.pkgs.inputs).toEqual({});
  });

  it('should parse a full descriptor', () => {
    const descriptor = parseDescriptor(`
description: A basic shell
inputs:
  pkgs: { url: "github:example/pkgs/unstable", rev: abc123 }
  utils: { url: "github:example/utils" }
  toolchain-overlay:
    url: "github:example/toolchain-overlay"
    inputs:
      pkgs: { follows: pkgs }
platforms: [x86_64-linux]
packages: pkgs
overlays: [toolchain-overlay]
devShells:
  default:
    nativeBuildInputs: [pkg-config, lld]
    buildInputs:
      - 'toolchain.stable."1.80.1".default'
      - expat
    env:
      RUST_BACKTRACE: 1
`);

    expect(descriptor.description).toBe('A basic shell');
    expect(descriptor.platforms).toEqual(['x86_64-linux']);
    expect(descriptor.overlays).toEqual(['toolchain-overlay']);
    expect(descriptor.devShells.default).toEqual({
      nativeBuildInputs: ['pkg-config', 'lld'],
      buildInputs: ['toolchain.stable."1.80.1".default', 'expat'],
      library_path_variable: 'LD_LIBRARY_PATH',
      env: { RUST_BACKTRACE: '1' },
    });
    expect(descriptor.inputs['toolchain-overlay'].inputs).toEqual({ pkgs: { follows: 'pkgs' } });
  });

  it('should reject a package set that is not a declared input', () => {
    const error = captureError(() => parseDescriptor(`
inputs:
  pkgs: { url: "github:example/pkgs" }
packages: other
`), DescriptorError);

    expect(error.code).toBe(ErrorCodes.UNKNOWN_INPUT);
    expect(error.message).toBe("'other' is not a declared input (declared: pkgs)");
  });

  it('should reject overlays that are not declared inputs', () => {
    const error = captureError(() => parseDescriptor(`${MINIMAL}overlays: [missing]\n`), DescriptorError);
    expect(error.code).toBe(ErrorCodes.UNKNOWN_INPUT);
  });

  it('should require exactly one of url or follows', () => {
    const error = captureError(() => parseDescriptor(`
inputs:
  pkgs: { url: "github:example/pkgs", follows: other }
packages: pkgs
`), DescriptorError);

    expect(error.code).toBe(ErrorCodes.INVALID_DESCRIPTOR);
    expect(error.message).toContain('an input needs exactly one of url or follows');
  });

  it('should reject invalid variable names', () => {
    const error = captureError(() => parseDescriptor(`${MINIMAL}devShells:
  default:
    env: { "NOT-VALID": x }
`), DescriptorError);

    expect(error.code).toBe(ErrorCodes.INVALID_DESCRIPTOR);
  });

  it('should reject misspelled shell keys', () => {
    const error = captureError(() => parseDescriptor(`${MINIMAL}devShells:
  default:
    buildinputs: [expat]
`), DescriptorError);

    expect(error.code).toBe(ErrorCodes.INVALID_DESCRIPTOR);
    expect(error.message).toContain('devShells.default: ');
    expect(error.message).toContain('"buildinputs"');
  });

  it('should reject unknown top-level keys', () => {
    const error = captureError(() => parseDescriptor(`${MINIMAL}devshells: {}
`), DescriptorError);

    expect(error.code).toBe(ErrorCodes.INVALID_DESCRIPTOR);
    expect(error.message).toContain('"devshells"');
  });

  it('should reject a missing package set', () => {
    expect(() => parseDescriptor('inputs: {}\n')).toThrow(DescriptorError);
  });

  it('should reject duplicate input identifiers', () => {
    const error = captureError(() => parseDescriptor(`
inputs:
  pkgs: { url: "github:example/a" }
  pkgs: { url: "github:example/b" }
packages: pkgs
`), DescriptorError);

    expect(error.code).toBe(ErrorCodes.INVALID_DESCRIPTOR);
    expect(error.details?.cause).toBe(ErrorCodes.PARSE_ERROR);
  });
});

describe('descriptorSources', () => {
  it('should map inputs to source references in declaration order', () => {
    const descriptor = parseDescriptor(`
inputs:
  pkgs: { url: "github:example/pkgs", rev: abc123 }
  stable: { follows: pkgs }
packages: pkgs
`);

    expect(descriptorSources(descriptor)).toEqual([
      { identifier: 'pkgs', locator: 'github:example/pkgs', revision: 'abc123' },
      { identifier: 'stable', follows: 'pkgs' },
    ]);
    expect(descriptorRegistry(descriptor).resolve('stable').identifier).toBe('pkgs');
  });
});

describe('toShellDeclaration', () => {
  it('should map the library path variable name', () => {
    const descriptor = parseDescriptor(`${MINIMAL}devShells:
  default:
    buildInputs: [expat]
    library_path_variable: DYLD_LIBRARY_PATH
`);

    expect(toShellDeclaration(descriptor.devShells.default)).toEqual({
      nativeBuildInputs: [],
      buildInputs: ['expat'],
      libraryPathVariable: 'DYLD_LIBRARY_PATH',
      env: {},
    });
  });
});

describe('loadDescriptor', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `devshell-descriptor-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should load a descriptor file', async () => {
    await writeFile(join(testDir, 'devshell.yaml'), MINIMAL);

    const descriptor = await loadDescriptor(getDescriptorPath(testDir));

    expect(descriptor.packages).toBe('pkgs');
  });

  it('should fail for a missing file', async () => {
    const filePath = getDescriptorPath(testDir);
    const error = await captureRejection(loadDescriptor(filePath), DescriptorError);

    expect(error.code).toBe(ErrorCodes.INVALID_DESCRIPTOR);
    expect(error.message).toBe(`Descriptor not found: ${filePath}`);
  });

  it('should include the file path in validation errors', async () => {
    const filePath = join(testDir, 'shell.yaml');
    await writeFile(filePath, 'inputs: {}\n');

    const error = await captureRejection(loadDescriptor(filePath), DescriptorError);

    expect(error.message).toContain(`(file: ${filePath})`);
    expect(error.details?.path).toBe(filePath);
  });
});

describe('getDescriptorPath', () => {
  it('should default to devshell.yaml in the project root', () => {
    expect(getDescriptorPath('/project')).toBe('/project/devshell.yaml');
  });

  it('should resolve a custom path', () => {
    expect(getDescriptorPath('/project', 'env/shell.yaml')).toBe('/project/env/shell.yaml');
  });
});
