import { z } from "zod";

import { translationSupportSchema } from "./common.js";

const optionalEnvValue = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const optionalKeywordEnvValue = optionalEnvValue.transform((value) =>
  value?.toLowerCase(),
);

const booleanFlagSchema = optionalKeywordEnvValue.pipe(
  z
    .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
    .optional()
    .transform((value) =>
      value === undefined ? false : ["1", "true", "yes", "on"].includes(value),
    ),
);

export const cliRuntimeEnvSchema = z
  .object({
    SHELLMSG_NLS: optionalKeywordEnvValue.pipe(
      translationSupportSchema.default("enabled"),
    ),
    SHELLMSG_CATALOG_DIR: optionalEnvValue,
    SHELLMSG_TRACE: booleanFlagSchema,
  })
  .passthrough();

export type CliRuntimeEnv = z.infer<typeof cliRuntimeEnvSchema>;
