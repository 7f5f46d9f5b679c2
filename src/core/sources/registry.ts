/**
 * Source registry: the named external sources a descriptor declares.
 *
 * The registry is an immutable value passed into evaluation. Beyond
 * identifier uniqueness nothing is validated here; locators and revisions
 * are the resolver's business and fail there.
 */
import { RegistryError, ErrorCodes } from '../../utils/errors.js';

export interface SourceReference {
  readonly identifier: string;
  /** Origin of the source; absent for pure `follows` aliases. */
  readonly locator?: string;
  readonly revision?: string;
  /** Identifier of another source this one stands for. */
  readonly follows?: string;
}

export type SourceDeclaration = Omit<SourceReference, 'identifier'>;

export interface SourceRegistry {
  get(identifier: string): SourceReference | undefined;
  /** Identifiers in declaration order. */
  identifiers(): readonly string[];
  /**
   * The reference that actually supplies `identifier`, following `follows`
   * links. Throws when the identifier or a link target is unknown.
   */
  resolve(identifier: string): SourceReference;
}

/**
 * Build a registry from a list of references or an identifier → declaration map.
 */
export function createSourceRegistry(
  references: readonly SourceReference[] | Readonly<Record<string, SourceDeclaration>>
): SourceRegistry {
  const list: SourceReference[] = isReferenceList(references)
    ? [...references]
    : Object.entries(references).map(([identifier, declaration]) => ({ ...declaration, identifier }));

  const entries = new Map<string, SourceReference>();
  for (const reference of list) {
    if (entries.has(reference.identifier)) {
      throw new RegistryError(
        ErrorCodes.DUPLICATE_SOURCE,
        `Source '${reference.identifier}' is declared more than once`,
        { identifier: reference.identifier }
      );
    }
    entries.set(reference.identifier, Object.freeze({ ...reference }));
  }

  const order = Object.freeze([...entries.keys()]);

  const registry: SourceRegistry = {
    get: (identifier) => entries.get(identifier),
    identifiers: () => order,
    resolve: (identifier) => {
      const chain: string[] = [];
      let current = identifier;
      for (;;) {
        const reference = entries.get(current);
        if (!reference) {
          throw new RegistryError(
            ErrorCodes.UNKNOWN_SOURCE,
            chain.length === 0
              ? `Unknown source '${identifier}'`
              : `Source '${chain[chain.length - 1]}' follows unknown source '${current}'`,
            { identifier, chain: [...chain, current] }
          );
        }
        if (reference.follows === undefined) return reference;
        chain.push(current);
        if (chain.includes(reference.follows)) {
          throw new RegistryError(
            ErrorCodes.CIRCULAR_FOLLOWS,
            `Circular follows: ${[...chain, reference.follows].join(' → ')}`,
            { identifier, chain: [...chain, reference.follows] }
          );
        }
        current = reference.follows;
      }
    },
  };

  return Object.freeze(registry);
}

function isReferenceList(
  value: readonly SourceReference[] | Readonly<Record<string, SourceDeclaration>>
): value is readonly SourceReference[] {
  return Array.isArray(value);
}
