import type { CommandResult } from "@shellmsg/contracts";

import { toCommandErrorResult } from "./command-errors.js";
import { UsageError } from "./errors.js";
import type { TranslationResolver } from "./resolver.js";

export const UNDERSCORE_COMMAND_NAME = "_";

export const EXPECTED_ONE_ARGUMENT_MESSAGE =
  "%s: expected %d argument, got %d";

export interface UnderscoreCommandDeps {
  resolver: TranslationResolver;
  commandName?: string;
}

function requireSingleOperand(
  args: readonly string[],
  resolver: TranslationResolver,
  commandName: string,
): string {
  const [operand] = args;
  if (args.length !== 1 || operand === undefined) {
    throw new UsageError(
      resolver.format(
        EXPECTED_ONE_ARGUMENT_MESSAGE,
        commandName,
        1,
        args.length,
      ),
      { argumentCount: args.length },
    );
  }
  return operand;
}

// A single operand always succeeds: any failure inside the resolver prints
// the operand itself.
function resolveOrEcho(resolver: TranslationResolver, operand: string): string {
  try {
    const message = resolver.resolve(operand);
    return message.length > 0 || operand.length === 0 ? message : operand;
  } catch {
    return operand;
  }
}

/**
 * `_ STRING`: prints the translation of STRING in the shell's own message
 * domain, or STRING itself when there is none. Options are not parsed, so
 * `--help` and `--` are looked up like any other operand.
 */
export function runUnderscoreCommand(
  args: readonly string[],
  deps: UnderscoreCommandDeps,
): CommandResult {
  const commandName = deps.commandName ?? UNDERSCORE_COMMAND_NAME;

  let operand: string;
  try {
    operand = requireSingleOperand(args, deps.resolver, commandName);
  } catch (error) {
    return toCommandErrorResult(error);
  }

  return {
    stdout: `${resolveOrEcho(deps.resolver, operand)}\n`,
    stderr: "",
    exitStatus: 0,
  };
}
