/**
 * Schema for package catalogs: local YAML files holding a pre-resolved
 * package set and/or overlay, per platform.
 *
 *   revision: 3f2a9c1
 *   packages:
 *     "*":
 *       expat: { version: "2.6.2", outputs: { out: /store/expat-2.6.2 } }
 *       xorg:
 *         libX11: { outputs: { out: /store/libX11-1.8.9 } }
 *   overlay:
 *     x86_64-linux:
 *       lld: { alias: llvmPackages.lld }
 */
import { z } from 'zod';

export interface CatalogPackage {
  outputs: Record<string, string>;
  name?: string;
  version?: string;
  /** False for packages that ship no shared libraries. */
  libraries?: boolean;
  /** Output selected when the package is referenced without one. */
  default_output?: string;
}

export interface CatalogAlias {
  /** Attribute path of the package this entry stands for. */
  alias: string;
}

export interface CatalogAttrSet {
  [name: string]: CatalogEntry;
}

export type CatalogEntry = CatalogPackage | CatalogAlias | CatalogAttrSet;

export const CatalogPackageSchema = z.strictObject({
  outputs: z.record(z.string(), z.string()),
  name: z.string().optional(),
  version: z.string().optional(),
  libraries: z.boolean().optional(),
  default_output: z.string().optional(),
}).refine(
  (pkg) => pkg.default_output === undefined || Object.prototype.hasOwnProperty.call(pkg.outputs, pkg.default_output),
  { message: 'default_output must name one of the outputs' }
);

export const CatalogAliasSchema = z.strictObject({
  alias: z.string().min(1),
});

export const CatalogEntrySchema: z.ZodType<CatalogEntry> = z.lazy(() =>
  z.union([CatalogPackageSchema, CatalogAliasSchema, CatalogAttrSetSchema])
);

export const CatalogAttrSetSchema: z.ZodType<CatalogAttrSet> = z.lazy(() =>
  z.record(z.string(), CatalogEntrySchema)
);

/** Platform identifier (or "*" for every platform) → attribute set. */
export const PlatformTableSchema = z.record(z.string(), CatalogAttrSetSchema);

export const CatalogSchema = z.object({
  /** Revision the catalog was produced from. */
  revision: z.string().optional(),
  packages: PlatformTableSchema.optional(),
  overlay: PlatformTableSchema.optional(),
});

export type Catalog = z.infer<typeof CatalogSchema>;
export type PlatformTable = z.infer<typeof PlatformTableSchema>;

export const ALL_PLATFORMS = '*';

export function isCatalogPackage(entry: CatalogEntry): entry is CatalogPackage {
  if (!('outputs' in entry)) return false;
  const outputs = entry.outputs;
  return typeof outputs === 'object' && outputs !== null && !Array.isArray(outputs)
    && Object.values(outputs).every((v) => typeof v === 'string');
}

export function isCatalogAlias(entry: CatalogEntry): entry is CatalogAlias {
  return 'alias' in entry && typeof entry.alias === 'string';
}
