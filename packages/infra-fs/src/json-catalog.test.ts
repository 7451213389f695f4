import { describe, expect, it } from "vitest";
import { CatalogFormatError } from "@shellmsg/application";
import { parseJsonCatalog } from "./json-catalog.js";

describe("parseJsonCatalog", () => {
  it("reads messages and drops empty translations", () => {
    const messages = parseJsonCatalog(
      JSON.stringify({
        language: "de",
        messages: { File: "Datei", Edit: "" },
      }),
      "de/fish.json",
    );

    expect([...messages]).toEqual([["File", "Datei"]]);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseJsonCatalog("{", "de/fish.json")).toThrow(
      CatalogFormatError,
    );
    expect(() => parseJsonCatalog("{", "de/fish.json")).toThrow(
      /^de\/fish\.json: invalid JSON - /,
    );
  });

  it("reports the offending field", () => {
    expect(() =>
      parseJsonCatalog(
        JSON.stringify({ messages: { File: 1 } }),
        "de/fish.json",
      ),
    ).toThrow(
      "de/fish.json: invalid catalog - messages.File: Expected string, received number",
    );
  });

  it("requires the messages object", () => {
    expect(() => parseJsonCatalog("{}", "de/fish.json")).toThrow(
      "de/fish.json: invalid catalog - messages: Required",
    );
  });

  it("rejects unknown top-level keys", () => {
    expect(() =>
      parseJsonCatalog(
        JSON.stringify({ messages: {}, domain: "fish" }),
        "de/fish.json",
      ),
    ).toThrow(/catalog: Unrecognized key/);
  });

  it("skips the empty msgid instead of rejecting the catalog", () => {
    const messages = parseJsonCatalog(
      JSON.stringify({ messages: { "": "Project-Id-Version: shell", File: "Datei" } }),
      "de/fish.json",
    );

    expect([...messages]).toEqual([["File", "Datei"]]);
  });

  it("accepts a language matching the expected locale", () => {
    const messages = parseJsonCatalog(
      JSON.stringify({ language: "pt-BR", messages: { File: "Arquivo" } }),
      "pt_BR/fish.json",
      "pt_BR",
    );

    expect(messages.get("File")).toBe("Arquivo");
  });

  it("rejects a language naming another locale", () => {
    expect(() =>
      parseJsonCatalog(
        JSON.stringify({ language: "fr", messages: { File: "Fichier" } }),
        "de/fish.json",
        "de",
      ),
    ).toThrow(
      new CatalogFormatError(
        "de/fish.json: catalog language fr does not match locale de",
      ),
    );
  });
});
