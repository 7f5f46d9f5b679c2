/**
 * Source locators.
 *
 *   github:owner/repo[/ref]
 *   path:./relative/dir
 *   https://host/archive.tar.gz
 */
import { ResolutionError, ErrorCodes } from '../../utils/errors.js';

export type Locator =
  | { readonly type: 'github'; readonly owner: string; readonly repo: string; readonly ref?: string }
  | { readonly type: 'path'; readonly path: string }
  | { readonly type: 'url'; readonly url: string };

export function parseLocator(locator: string): Locator {
  const invalid = (reason: string): ResolutionError =>
    new ResolutionError(
      ErrorCodes.INVALID_LOCATOR,
      `Invalid source locator '${locator}': ${reason}`,
      { locator }
    );

  if (locator.startsWith('github:')) {
    const parts = locator.slice('github:'.length).split('/');
    if (parts.length < 2 || parts.length > 3 || parts.some((p) => p.length === 0)) {
      throw invalid('expected github:owner/repo[/ref]');
    }
    const [owner, repo, ref] = parts;
    return ref === undefined ? { type: 'github', owner, repo } : { type: 'github', owner, repo, ref };
  }

  if (locator.startsWith('path:')) {
    const path = locator.slice('path:'.length);
    if (path.length === 0) throw invalid('empty path');
    return { type: 'path', path };
  }

  if (/^https?:\/\//.test(locator)) {
    return { type: 'url', url: locator };
  }

  throw invalid('unsupported scheme');
}

export function formatLocator(locator: Locator): string {
  switch (locator.type) {
    case 'github':
      return `github:${locator.owner}/${locator.repo}${locator.ref ? `/${locator.ref}` : ''}`;
    case 'path':
      return `path:${locator.path}`;
    case 'url':
      return locator.url;
  }
}
