import { CatalogFormatError } from "@shellmsg/application";
import { jsonCatalogFileSchema } from "@shellmsg/contracts";

import { parseOrThrowFormatError } from "./validation.js";

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogFormatError(`${source}: invalid JSON - ${reason}`, {
      source,
    });
  }
}

function sameLocale(left: string, right: string): boolean {
  const normalize = (locale: string) => locale.replace(/-/g, "_").toLowerCase();
  return normalize(left) === normalize(right);
}

/**
 * Parses a JSON catalog. When `expectedLocale` is given, a declared
 * `language` naming another locale rejects the file.
 */
export function parseJsonCatalog(
  text: string,
  source = "<json>",
  expectedLocale?: string,
): Map<string, string> {
  const file = parseOrThrowFormatError(
    jsonCatalogFileSchema,
    parseJson(text, source),
    source,
  );

  if (
    expectedLocale !== undefined &&
    file.language !== undefined &&
    !sameLocale(file.language, expectedLocale)
  ) {
    throw new CatalogFormatError(
      `${source}: catalog language ${file.language} does not match locale ${expectedLocale}`,
      { source, language: file.language, locale: expectedLocale },
    );
  }

  const messages = new Map<string, string>();
  for (const [msgid, translation] of Object.entries(file.messages)) {
    // The empty msgid is the catalog header slot, never a message.
    if (msgid.length === 0 || translation.length === 0) continue;
    messages.set(msgid, translation);
  }
  return messages;
}
