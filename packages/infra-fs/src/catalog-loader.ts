import { readFileSync } from "node:fs";
import { join } from "node:path";
import {
  AppError,
  CatalogReadError,
  InMemoryCatalog,
  NoopTranslationEventLogger,
  recordTranslationEvent,
  type TranslationEventLogger,
} from "@shellmsg/application";
import type {
  CatalogEntrySet,
  CatalogFileFormat,
  LocaleContext,
} from "@shellmsg/contracts";
import { SystemClock, type Clock } from "@shellmsg/shared";

import { parseJsonCatalog } from "./json-catalog.js";
import { parseMoFile } from "./mo-file.js";

export interface CatalogFileLocation {
  format: CatalogFileFormat;
  path: string;
}

export interface FileSystemCatalogOptions {
  catalogDir: string;
  domain: string;
  context: LocaleContext;
  logger?: TranslationEventLogger;
  clock?: Clock;
}

const MISSING_FILE_CODES = new Set(["ENOENT", "ENOTDIR"]);

export function catalogFileLocations(
  catalogDir: string,
  locale: string,
  domain: string,
): CatalogFileLocation[] {
  return [
    {
      format: "mo",
      path: join(catalogDir, locale, "LC_MESSAGES", `${domain}.mo`),
    },
    { format: "json", path: join(catalogDir, locale, `${domain}.json`) },
  ];
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    MISSING_FILE_CODES.has(error.code)
  );
}

function readCatalogFile(path: string): Buffer | null {
  try {
    return readFileSync(path);
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw new CatalogReadError(
      `${path}: catalog file could not be read`,
      { source: path },
      error,
    );
  }
}

function parseCatalogFile(
  location: CatalogFileLocation,
  locale: string,
  contents: Buffer,
): Map<string, string> {
  if (location.format === "mo") {
    return parseMoFile(contents, location.path).messages;
  }
  return parseJsonCatalog(contents.toString("utf8"), location.path, locale);
}

/**
 * Reads every catalog file for the context's candidate locales and freezes
 * the result into an in-memory catalog. Missing files are skipped quietly;
 * unreadable or malformed files are skipped and reported to the logger.
 */
export function loadFileSystemCatalog(
  options: FileSystemCatalogOptions,
): InMemoryCatalog {
  const logger = options.logger ?? new NoopTranslationEventLogger();
  const clock = options.clock ?? new SystemClock();
  const entrySets: CatalogEntrySet[] = [];

  for (const locale of options.context.candidates) {
    for (const location of catalogFileLocations(
      options.catalogDir,
      locale,
      options.domain,
    )) {
      try {
        const contents = readCatalogFile(location.path);
        if (!contents) continue;

        const messages = parseCatalogFile(location, locale, contents);
        entrySets.push({ domain: options.domain, locale, messages });
        recordTranslationEvent(logger, clock, "catalog.loaded", {
          path: location.path,
          format: location.format,
          domain: options.domain,
          locale,
          entries: String(messages.size),
        });
      } catch (error) {
        if (!(error instanceof AppError)) throw error;

        recordTranslationEvent(logger, clock, "catalog.skipped", {
          path: location.path,
          format: location.format,
          domain: options.domain,
          locale,
          code: error.code,
          message: error.message,
        });
      }
    }
  }

  return new InMemoryCatalog(entrySets);
}
