/**
 * Case-insensitive alias lookup tables.
 */

import { AliasConflictError } from "./errors";

// [canonical, aliases] pairs, in registration order
export type AliasGroups<C extends string = string> = ReadonlyArray<readonly [C, Iterable<string>]>;

export class AliasTable<C extends string = string> {
  private readonly lookup: ReadonlyMap<string, C>;
  readonly canonicalNames: readonly C[];

  constructor(lookup: ReadonlyMap<string, C>, canonicalNames: readonly C[]) {
    this.lookup = lookup;
    this.canonicalNames = canonicalNames;
  }

  /**
   * Resolve a user token to its canonical name.
   * Tries the trimmed token as typed, then lower-cased.
   */
  resolve(token: string | undefined | null): C | undefined {
    if (!token) return undefined;
    const stripped = token.trim();
    if (!stripped) return undefined;
    return this.lookup.get(stripped) ?? this.lookup.get(stripped.toLowerCase());
  }

  has(token: string): boolean {
    return this.resolve(token) !== undefined;
  }

  get size(): number {
    return this.lookup.size;
  }
}

/**
 * Build a lookup from canonical name -> aliases.
 * The canonical name itself is not an alias unless listed.
 * Every alias is stored as given and lower-cased. Registering one alias under
 * two canonical names throws AliasConflictError.
 */
export function buildAliasTable<C extends string>(groups: AliasGroups<C>): AliasTable<C> {
  const lookup = new Map<string, C>();
  const canonicalNames: C[] = [];

  const register = (alias: string, canonical: C): void => {
    const existing = lookup.get(alias);
    if (existing !== undefined && existing !== canonical) {
      throw new AliasConflictError(alias, existing, canonical);
    }
    lookup.set(alias, canonical);
  };

  for (const [canonical, aliases] of groups) {
    if (!canonicalNames.includes(canonical)) canonicalNames.push(canonical);
    for (const alias of aliases) {
      register(alias, canonical);
      register(alias.toLowerCase(), canonical);
    }
  }

  return new AliasTable(lookup, Object.freeze(canonicalNames));
}
