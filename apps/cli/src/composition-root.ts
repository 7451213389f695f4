import {
  AppError,
  createTranslationResolver,
  IdentityTranslationResolver,
  NoopTranslationEventLogger,
  recordTranslationEvent,
  type TranslationEventLogger,
  type TranslationResolver,
} from "@shellmsg/application";
import type { CatalogLookup, LocaleContext } from "@shellmsg/contracts";
import { loadFileSystemCatalog } from "@shellmsg/infra-fs";
import {
  resolveLocaleContext,
  summarizeUnknownError,
  SystemClock,
  type Clock,
} from "@shellmsg/shared";

import {
  isTraceRequested,
  resolveCliRuntimeConfig,
  type CliRuntimeConfig,
} from "./config.js";
import { ConsoleTranslationEventLogger } from "./trace-logger.js";

export interface CliCompositionRootDeps {
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  logger?: TranslationEventLogger;
}

export interface CliCompositionRoot {
  config: CliRuntimeConfig | null;
  context: LocaleContext;
  logger: TranslationEventLogger;
  resolver: TranslationResolver;
}

function loadCatalog(
  config: CliRuntimeConfig,
  context: LocaleContext,
  logger: TranslationEventLogger,
  clock: Clock,
): CatalogLookup | null {
  if (config.translationSupport === "disabled") {
    return null;
  }

  try {
    return loadFileSystemCatalog({
      catalogDir: config.catalogDir,
      domain: config.domain,
      context,
      logger,
      clock,
    });
  } catch (error) {
    const summary = summarizeUnknownError(error);
    recordTranslationEvent(logger, clock, "catalog.skipped", {
      path: config.catalogDir,
      domain: config.domain,
      code: summary.code,
      message: summary.message,
    });
    return null;
  }
}

export function createCliCompositionRoot(
  deps: CliCompositionRootDeps = {},
): CliCompositionRoot {
  const env = deps.env ?? process.env;
  const clock = deps.clock ?? new SystemClock();
  const logger =
    deps.logger ??
    (isTraceRequested(env)
      ? new ConsoleTranslationEventLogger()
      : new NoopTranslationEventLogger());
  const context = resolveLocaleContext(env);

  let config: CliRuntimeConfig;
  try {
    config = resolveCliRuntimeConfig(env);
  } catch (error) {
    if (!(error instanceof AppError)) throw error;

    recordTranslationEvent(logger, clock, "config.invalid", {
      code: error.code,
      message: error.message,
    });
    return {
      config: null,
      context,
      logger,
      resolver: new IdentityTranslationResolver(),
    };
  }

  const catalog = loadCatalog(config, context, logger, clock);

  return {
    config,
    context,
    logger,
    resolver: createTranslationResolver({
      context,
      catalog,
      domain: config.domain,
      logger,
      clock,
    }),
  };
}
