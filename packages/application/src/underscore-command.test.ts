import { describe, expect, it } from "vitest";
import type { LocaleContext } from "@shellmsg/contracts";
import type { FormatArgument } from "@shellmsg/shared";
import { InMemoryCatalog } from "./in-memory-catalog.js";
import {
  createTranslationResolver,
  type TranslationResolver,
} from "./resolver.js";
import { runUnderscoreCommand } from "./underscore-command.js";

const germanContext: LocaleContext = {
  locale: "de_DE.UTF-8",
  source: "LANG",
  languages: [],
  candidates: ["de_DE", "de"],
};

const catalog = new InMemoryCatalog([
  {
    domain: "fish",
    locale: "de",
    messages: new Map([
      ["File", "Datei"],
      ["--help", "--hilfe"],
      ["%s: expected %d argument, got %d", "%s: %d Argument erwartet, %d erhalten"],
    ]),
  },
]);

class ExplodingResolver implements TranslationResolver {
  resolve(_key: string): string {
    void _key;
    throw new Error("boom");
  }

  format(template: string, ..._args: FormatArgument[]): string {
    void _args;
    return template;
  }
}

describe("runUnderscoreCommand", () => {
  it("prints the translation followed by a newline", () => {
    const resolver = createTranslationResolver({
      context: germanContext,
      catalog,
    });

    expect(runUnderscoreCommand(["File"], { resolver })).toEqual({
      stdout: "Datei\n",
      stderr: "",
      exitStatus: 0,
    });
  });

  it("prints the operand when no translation exists", () => {
    const resolver = createTranslationResolver({
      context: germanContext,
      catalog,
    });

    expect(runUnderscoreCommand(["Edit"], { resolver })).toEqual({
      stdout: "Edit\n",
      stderr: "",
      exitStatus: 0,
    });
  });

  it("prints the operand when translation support is off", () => {
    const resolver = createTranslationResolver({ context: germanContext });

    expect(runUnderscoreCommand(["File"], { resolver }).stdout).toBe("File\n");
  });

  it("treats option-like operands as messages", () => {
    const resolver = createTranslationResolver({
      context: germanContext,
      catalog,
    });

    expect(runUnderscoreCommand(["--help"], { resolver }).stdout).toBe(
      "--hilfe\n",
    );
    expect(runUnderscoreCommand(["--"], { resolver }).stdout).toBe("--\n");
  });

  it("reports a translated usage error for a wrong operand count", () => {
    const resolver = createTranslationResolver({
      context: germanContext,
      catalog,
    });

    expect(runUnderscoreCommand([], { resolver })).toEqual({
      stdout: "",
      stderr: "_: 1 Argument erwartet, 0 erhalten\n",
      exitStatus: 2,
    });
  });

  it("reports the usage error untranslated without catalog support", () => {
    const resolver = createTranslationResolver({ context: germanContext });

    expect(
      runUnderscoreCommand(["File", "Edit"], {
        resolver,
        commandName: "gettext",
      }),
    ).toEqual({
      stdout: "",
      stderr: "gettext: expected 1 argument, got 2\n",
      exitStatus: 2,
    });
  });

  it("prints the operand when the resolver throws", () => {
    expect(
      runUnderscoreCommand(["File"], { resolver: new ExplodingResolver() }),
    ).toEqual({
      stdout: "File\n",
      stderr: "",
      exitStatus: 0,
    });
  });

  it("prints the operand when the resolver returns an empty string", () => {
    const resolver: TranslationResolver = {
      resolve: () => "",
      format: (template) => template,
    };

    expect(runUnderscoreCommand(["File"], { resolver })).toEqual({
      stdout: "File\n",
      stderr: "",
      exitStatus: 0,
    });
  });

  it("maps a failing usage message to a generic error", () => {
    expect(
      runUnderscoreCommand([], {
        resolver: {
          resolve: (key) => key,
          format: () => {
            throw new Error("boom");
          },
        },
      }),
    ).toEqual({
      stdout: "",
      stderr: "Unexpected error\n",
      exitStatus: 1,
    });
  });
});
