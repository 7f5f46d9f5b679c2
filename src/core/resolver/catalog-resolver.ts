/**
 * A PackageResolver backed by local YAML catalogs.
 *
 * Catalogs are loaded once, up front; everything after that is synchronous
 * and pure. Sources without a catalog only fail when they are demanded.
 */
import * as path from 'node:path';
import { ResolutionError, ErrorCodes, fileExists, isDirectory, loadYamlWithSchema, logger } from '../../utils/index.js';
import type { Overlay } from '../overlays/applicator.js';
import { formatAttrPath, lookupPackage } from '../packages/attr-path.js';
import type { Package, PackageAttr, PackageSet } from '../packages/types.js';
import type { PlatformIdentifier } from '../platforms/selector.js';
import { parseLocator } from '../sources/locator.js';
import type { SourceReference, SourceRegistry } from '../sources/registry.js';
import {
  ALL_PLATFORMS,
  CatalogSchema,
  isCatalogAlias,
  isCatalogPackage,
  type Catalog,
  type CatalogAttrSet,
  type PlatformTable,
} from './catalog-schema.js';
import type { PackageResolver } from './types.js';

export const CATALOG_FILE_NAME = 'catalog.yaml';

const PATH_SCHEME = 'path:';

export interface CatalogResolverOptions {
  /** Where each source's catalog was looked for; used in error messages. */
  locations?: ReadonlyMap<string, string>;
}

export class CatalogResolver implements PackageResolver {
  private readonly locations: ReadonlyMap<string, string>;

  constructor(
    private readonly catalogs: ReadonlyMap<string, Catalog>,
    options: CatalogResolverOptions = {}
  ) {
    this.locations = options.locations ?? new Map();
  }

  packageSet(source: SourceReference, platform: PlatformIdentifier): PackageSet {
    const table = this.section(source, 'packages');
    const attrs = selectPlatform(table, platform);
    // Aliases in a base set point at the set's own (non-alias) packages.
    const withoutAliases = buildAttrSet(attrs, [], undefined);
    return buildAttrSet(attrs, [], withoutAliases);
  }

  overlay(source: SourceReference, platform: PlatformIdentifier): Overlay {
    const attrs = selectPlatform(this.section(source, 'overlay'), platform);
    return (prev) => buildAttrSet(attrs, [], prev);
  }

  libraryOutputPath(pkg: Package): string | undefined {
    if (!pkg.hasLibraries) return undefined;
    const root = pkg.outputs.lib ?? pkg.outputs.out;
    return root === undefined ? undefined : path.posix.join(root, 'lib');
  }

  private section(source: SourceReference, key: 'packages' | 'overlay'): PlatformTable {
    const catalog = this.catalogs.get(source.identifier);
    const location = this.locations.get(source.identifier);

    if (!catalog) {
      throw new ResolutionError(
        ErrorCodes.UNRESOLVABLE_SOURCE,
        location
          ? `Cannot resolve source '${source.identifier}': no catalog at ${location}`
          : `Cannot resolve source '${source.identifier}' (${source.locator ?? 'no locator'}): no catalog configured`,
        { identifier: source.identifier, locator: source.locator, location }
      );
    }

    if (source.revision !== undefined && catalog.revision !== source.revision) {
      throw new ResolutionError(
        ErrorCodes.REVISION_MISMATCH,
        `Source '${source.identifier}' is pinned to revision ${source.revision}, ` +
          `but its catalog has ${catalog.revision ?? 'no revision'}`,
        { identifier: source.identifier, pinned: source.revision, available: catalog.revision }
      );
    }

    const table = catalog[key];
    if (!table) {
      throw new ResolutionError(
        ErrorCodes.UNRESOLVABLE_SOURCE,
        `Source '${source.identifier}' provides no ${key === 'packages' ? 'package set' : 'overlay'}`,
        { identifier: source.identifier, section: key }
      );
    }
    return table;
  }
}

function selectPlatform(table: PlatformTable, platform: PlatformIdentifier): CatalogAttrSet {
  return { ...(table[ALL_PLATFORMS] ?? {}), ...(table[platform] ?? {}) };
}

/**
 * Convert catalog entries into a frozen package set. Aliases are looked up
 * in `aliasTarget`; when it is undefined they are left out.
 */
function buildAttrSet(
  attrs: CatalogAttrSet,
  prefix: readonly string[],
  aliasTarget: PackageSet | undefined
): PackageSet {
  const result: Record<string, PackageAttr> = {};

  for (const [name, entry] of Object.entries(attrs)) {
    const segments = [...prefix, name];

    if (isCatalogAlias(entry)) {
      if (aliasTarget !== undefined) {
        result[name] = lookupPackage(aliasTarget, entry.alias);
      }
    } else if (isCatalogPackage(entry)) {
      const outputNames = Object.keys(entry.outputs);
      const pkg: Package = {
        type: 'derivation',
        attrPath: formatAttrPath(segments),
        name: entry.name ?? name,
        ...(entry.version !== undefined ? { version: entry.version } : {}),
        outputs: Object.freeze({ ...entry.outputs }),
        outputName: entry.default_output ?? outputNames[0] ?? 'out',
        hasLibraries: entry.libraries ?? true,
      };
      result[name] = Object.freeze(pkg);
    } else {
      result[name] = buildAttrSet(entry, segments, aliasTarget);
    }
  }

  return Object.freeze(result);
}

export interface LoadCatalogsOptions {
  projectRoot: string;
  /** Directory `path:` locators are relative to (default: the project root). */
  descriptorDir?: string;
  /** Source identifier → catalog file, relative to the project root. */
  catalogs?: Readonly<Record<string, string>>;
}

/**
 * Load the catalog of every source that has one.
 *
 * `path:` locators point at a catalog file or a directory holding
 * `catalog.yaml`, relative to the descriptor; any source can instead be
 * mapped to a file explicitly. Other locators are left to whoever resolves
 * them and are not parsed here. Follows aliases have no catalog of their own.
 */
export async function loadCatalogResolver(
  registry: SourceRegistry,
  options: LoadCatalogsOptions
): Promise<CatalogResolver> {
  const log = logger.child('catalog');
  const catalogs = new Map<string, Catalog>();
  const locations = new Map<string, string>();

  for (const identifier of registry.identifiers()) {
    const reference = registry.get(identifier);
    if (!reference || reference.follows !== undefined) continue;

    const location = await locateCatalog(reference, options);
    if (location === undefined) {
      log.debug(`No catalog for source '${identifier}'`);
      continue;
    }
    locations.set(identifier, location);

    if (!(await fileExists(location))) {
      log.debug(`Catalog for '${identifier}' not found at ${location}`);
      continue;
    }

    log.debug(`Loading catalog for '${identifier}' from ${location}`);
    catalogs.set(identifier, await loadYamlWithSchema(location, CatalogSchema));
  }

  return new CatalogResolver(catalogs, { locations });
}

async function locateCatalog(
  reference: SourceReference,
  options: LoadCatalogsOptions
): Promise<string | undefined> {
  const mapped = options.catalogs?.[reference.identifier];
  if (mapped !== undefined) {
    return path.resolve(options.projectRoot, mapped);
  }

  if (reference.locator === undefined || !reference.locator.startsWith(PATH_SCHEME)) return undefined;
  const locator = parseLocator(reference.locator);
  if (locator.type !== 'path') return undefined;

  const target = path.resolve(options.descriptorDir ?? options.projectRoot, locator.path);
  return (await isDirectory(target)) ? path.join(target, CATALOG_FILE_NAME) : target;
}
