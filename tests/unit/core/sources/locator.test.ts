/**
 * Tests for source locator parsing.
 */
import { describe, it, expect } from 'vitest';
import { parseLocator, formatLocator } from '../../../../src/core/sources/locator.js';
import { ResolutionError, ErrorCodes } from '../../../../src/utils/errors.js';
import { captureError } from '../../../helpers/errors.js';

describe('parseLocator', () => {
  it('should parse github locators with a ref', () => {
    expect(parseLocator('github:example/pkgs/unstable')).toEqual({
      type: 'github',
      owner: 'example',
      repo: 'pkgs',
      ref: 'unstable',
    });
  });

  it('should parse github locators without a ref', () => {
    expect(parseLocator('github:example/utils')).toEqual({ type: 'github', owner: 'example', repo: 'utils' });
  });

  it('should parse path locators', () => {
    expect(parseLocator('path:./catalogs/pkgs')).toEqual({ type: 'path', path: './catalogs/pkgs' });
  });

  it('should parse http(s) URLs', () => {
    expect(parseLocator('https://example.com/pkgs.tar.gz')).toEqual({
      type: 'url',
      url: 'https://example.com/pkgs.tar.gz',
    });
  });

  it.each([
    ['github:example', /expected github:owner\/repo\[\/ref\]/],
    ['github:a/b/c/d', /expected github:owner\/repo\[\/ref\]/],
    ['github:a//b', /expected github:owner\/repo\[\/ref\]/],
    ['path:', /empty path/],
    ['ftp://example.com/x', /unsupported scheme/],
  ])('should reject %s', (locator, message) => {
    const error = captureError(() => parseLocator(locator), ResolutionError);
    expect(error.code).toBe(ErrorCodes.INVALID_LOCATOR);
    expect(error.message).toMatch(message);
  });
});

describe('formatLocator', () => {
  it('should omit a missing github ref', () => {
    expect(formatLocator({ type: 'github', owner: 'example', repo: 'utils' })).toBe('github:example/utils');
  });

  it('should prefix paths', () => {
    expect(formatLocator({ type: 'path', path: './catalogs' })).toBe('path:./catalogs');
  });
});
