export type MessageKey = string;

export type LocaleSource = "LC_ALL" | "LC_MESSAGES" | "LANG";

export interface LocaleContext {
  readonly locale: string | null;
  readonly source: LocaleSource | null;
  readonly languages: readonly string[];
  readonly candidates: readonly string[];
}

export interface ParsedLocaleName {
  language: string;
  territory?: string;
  codeset?: string;
  modifier?: string;
}

export type TranslationSupport = "enabled" | "disabled";

export interface CatalogQuery {
  domain: string;
  locale: string;
  key: MessageKey;
}

export type CatalogLookupResult =
  | { found: true; message: string; locale: string }
  | { found: false };

export interface CatalogLookup {
  lookup(query: CatalogQuery): CatalogLookupResult;
}

export type CatalogFileFormat = "mo" | "json";

export interface CatalogEntrySet {
  domain: string;
  locale: string;
  messages: ReadonlyMap<MessageKey, string>;
}

// Structured trace events

export type TranslationEventName =
  | "catalog.loaded"
  | "catalog.skipped"
  | "catalog.lookup_failed"
  | "message.resolved"
  | "message.fallback"
  | "config.invalid";

export interface TranslationEvent {
  name: TranslationEventName;
  occurredAt: string;
  metadata: Record<string, string>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitStatus: number;
}

export * from "./schemas/index.js";
