import {
  IdentityTranslationResolver,
  runUnderscoreCommand,
  type TranslationResolver,
} from "@shellmsg/application";
import type { CommandResult } from "@shellmsg/contracts";

import {
  createCliCompositionRoot,
  type CliCompositionRootDeps,
} from "./composition-root.js";

export function runCli(
  args: readonly string[],
  deps: CliCompositionRootDeps = {},
): CommandResult {
  let resolver: TranslationResolver;
  try {
    resolver = createCliCompositionRoot(deps).resolver;
  } catch {
    resolver = new IdentityTranslationResolver();
  }
  return runUnderscoreCommand(args, { resolver });
}
