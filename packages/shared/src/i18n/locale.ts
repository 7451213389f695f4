import type {
  LocaleContext,
  LocaleSource,
  ParsedLocaleName,
} from "@shellmsg/contracts";

// language[_territory][.codeset][@modifier]
const LOCALE_NAME_REGEX =
  /^([A-Za-z]{2,8})(?:_([A-Za-z0-9]{2,8}))?(?:\.([A-Za-z0-9_-]+))?(?:@([A-Za-z0-9_-]+))?$/;

const LOCALE_SOURCES: readonly LocaleSource[] = [
  "LC_ALL",
  "LC_MESSAGES",
  "LANG",
];

function readEnvValue(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function isUntranslatedLocale(name: string): boolean {
  return name === "C" || name === "POSIX" || name.startsWith("C.");
}

export function parseLocaleName(input: string): ParsedLocaleName | null {
  const match = LOCALE_NAME_REGEX.exec(input.trim());
  if (!match) return null;

  const [, language, territory, codeset, modifier] = match;
  if (!language) return null;

  return {
    language,
    ...(territory !== undefined ? { territory } : {}),
    ...(codeset !== undefined ? { codeset } : {}),
    ...(modifier !== undefined ? { modifier } : {}),
  };
}

export function expandLocaleCandidates(parsed: ParsedLocaleName): string[] {
  const { language, territory, modifier } = parsed;
  const candidates: string[] = [];

  if (territory !== undefined && modifier !== undefined) {
    candidates.push(`${language}_${territory}@${modifier}`);
  }
  if (territory !== undefined) {
    candidates.push(`${language}_${territory}`);
  }
  if (modifier !== undefined) {
    candidates.push(`${language}@${modifier}`);
  }
  candidates.push(language);

  return candidates;
}

export function parseLanguageList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(":")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function uniqueInOrder(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Captures the message-locale environment as an immutable snapshot.
 *
 * `LC_ALL` overrides `LC_MESSAGES`, which overrides `LANG`. `LANGUAGE` only
 * takes part once the selected locale enables translation at all.
 */
export function resolveLocaleContext(
  env: NodeJS.ProcessEnv = process.env,
): LocaleContext {
  let locale: string | null = null;
  let source: LocaleSource | null = null;

  for (const name of LOCALE_SOURCES) {
    const value = readEnvValue(env, name);
    if (value) {
      locale = value;
      source = name;
      break;
    }
  }

  const parsed =
    locale !== null && !isUntranslatedLocale(locale)
      ? parseLocaleName(locale)
      : null;

  const languages = parsed
    ? parseLanguageList(readEnvValue(env, "LANGUAGE"))
    : [];

  const preferred = languages.flatMap((entry) => {
    const parsedEntry = parseLocaleName(entry);
    return parsedEntry ? expandLocaleCandidates(parsedEntry) : [];
  });

  const candidates = parsed
    ? uniqueInOrder([...preferred, ...expandLocaleCandidates(parsed)])
    : [];

  return Object.freeze({
    locale,
    source,
    languages: Object.freeze(languages),
    candidates: Object.freeze(candidates),
  });
}
