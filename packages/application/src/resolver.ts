import type {
  CatalogLookup,
  CatalogLookupResult,
  LocaleContext,
  MessageKey,
} from "@shellmsg/contracts";
import {
  formatMessage,
  summarizeUnknownError,
  SystemClock,
  type Clock,
  type FormatArgument,
} from "@shellmsg/shared";

import {
  NoopTranslationEventLogger,
  recordTranslationEvent,
  type TranslationEventLogger,
} from "./event-logger.js";

export const DEFAULT_MESSAGE_DOMAIN = "fish";

export interface TranslationResolver {
  resolve(key: MessageKey): string;
  format(template: MessageKey, ...args: FormatArgument[]): string;
}

export interface TranslationResolverDeps {
  context: LocaleContext;
  /** Absent or null when the program runs without catalog support. */
  catalog?: CatalogLookup | null;
  domain?: string;
  logger?: TranslationEventLogger;
  clock?: Clock;
}

export class IdentityTranslationResolver implements TranslationResolver {
  resolve(key: MessageKey): string {
    return key;
  }

  format(template: MessageKey, ...args: FormatArgument[]): string {
    return formatMessage(template, ...args);
  }
}

export class CatalogTranslationResolver implements TranslationResolver {
  private readonly resolved = new Map<MessageKey, string>();

  constructor(
    private readonly catalog: CatalogLookup,
    private readonly context: LocaleContext,
    private readonly domain: string,
    private readonly logger: TranslationEventLogger,
    private readonly clock: Clock,
  ) {}

  resolve(key: MessageKey): string {
    // The empty msgid holds a catalog's header, never a translation.
    if (key.length === 0) return key;

    const cached = this.resolved.get(key);
    if (cached !== undefined) return cached;

    const message = this.lookupAcrossCandidates(key);
    this.resolved.set(key, message);
    return message;
  }

  format(template: MessageKey, ...args: FormatArgument[]): string {
    return formatMessage(this.resolve(template), ...args);
  }

  private lookupAcrossCandidates(key: MessageKey): string {
    for (const locale of this.context.candidates) {
      const result = this.safeLookup(key, locale);
      if (result.found && result.message.length > 0) {
        recordTranslationEvent(this.logger, this.clock, "message.resolved", {
          key,
          domain: this.domain,
          locale: result.locale,
        });
        return result.message;
      }
    }

    recordTranslationEvent(this.logger, this.clock, "message.fallback", {
      key,
      domain: this.domain,
      candidates: this.context.candidates.join(":"),
    });
    return key;
  }

  private safeLookup(key: MessageKey, locale: string): CatalogLookupResult {
    try {
      return this.catalog.lookup({ domain: this.domain, locale, key });
    } catch (error) {
      const summary = summarizeUnknownError(error);
      recordTranslationEvent(this.logger, this.clock, "catalog.lookup_failed", {
        key,
        domain: this.domain,
        locale,
        code: summary.code,
        message: summary.message,
      });
      return { found: false };
    }
  }
}

export function createTranslationResolver(
  deps: TranslationResolverDeps,
): TranslationResolver {
  if (!deps.catalog) {
    return new IdentityTranslationResolver();
  }

  return new CatalogTranslationResolver(
    deps.catalog,
    deps.context,
    deps.domain ?? DEFAULT_MESSAGE_DOMAIN,
    deps.logger ?? new NoopTranslationEventLogger(),
    deps.clock ?? new SystemClock(),
  );
}
