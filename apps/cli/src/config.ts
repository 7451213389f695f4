import { fileURLToPath } from "node:url";
import {
  ConfigurationError,
  DEFAULT_MESSAGE_DOMAIN,
} from "@shellmsg/application";
import {
  cliRuntimeEnvSchema,
  formatSchemaIssues,
  type TranslationSupport,
} from "@shellmsg/contracts";

export interface CliRuntimeConfig {
  translationSupport: TranslationSupport;
  catalogDir: string;
  domain: string;
}

export const DEFAULT_CATALOG_DIR = fileURLToPath(
  new URL("../catalogs", import.meta.url),
);

export function resolveCliRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
): CliRuntimeConfig {
  const parsed = cliRuntimeEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid runtime configuration - ${formatSchemaIssues(parsed.error.issues, "env")}`,
    );
  }

  return {
    translationSupport: parsed.data.SHELLMSG_NLS,
    catalogDir: parsed.data.SHELLMSG_CATALOG_DIR ?? DEFAULT_CATALOG_DIR,
    domain: DEFAULT_MESSAGE_DOMAIN,
  };
}

/** Reads the trace flag alone, so a bad value elsewhere can still be traced. */
export function isTraceRequested(env: NodeJS.ProcessEnv = process.env): boolean {
  const parsed = cliRuntimeEnvSchema.shape.SHELLMSG_TRACE.safeParse(
    env.SHELLMSG_TRACE,
  );
  return parsed.success && parsed.data;
}
