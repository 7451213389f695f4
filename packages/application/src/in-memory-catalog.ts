import type {
  CatalogEntrySet,
  CatalogLookup,
  CatalogLookupResult,
  CatalogQuery,
} from "@shellmsg/contracts";

function scopeKey(domain: string, locale: string): string {
  return `${domain}\u0000${locale}`;
}

/**
 * Read-only catalog built once from a list of entry sets.
 *
 * When several sets cover the same domain and locale, the earlier set wins
 * for keys present in both; later sets only fill gaps.
 */
export class InMemoryCatalog implements CatalogLookup {
  private readonly scopes = new Map<string, Map<string, string>>();

  constructor(entrySets: readonly CatalogEntrySet[] = []) {
    for (const entrySet of entrySets) {
      const key = scopeKey(entrySet.domain, entrySet.locale);
      const messages = this.scopes.get(key) ?? new Map<string, string>();

      for (const [msgid, translation] of entrySet.messages) {
        if (translation.length === 0 || messages.has(msgid)) continue;
        messages.set(msgid, translation);
      }

      this.scopes.set(key, messages);
    }
  }

  lookup(query: CatalogQuery): CatalogLookupResult {
    const message = this.scopes
      .get(scopeKey(query.domain, query.locale))
      ?.get(query.key);

    if (message === undefined) {
      return { found: false };
    }

    return { found: true, message, locale: query.locale };
  }

  hasScope(domain: string, locale: string): boolean {
    return this.scopes.has(scopeKey(domain, locale));
  }

  get size(): number {
    let total = 0;
    for (const messages of this.scopes.values()) {
      total += messages.size;
    }
    return total;
  }
}
