import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CatalogTranslationResolver,
  IdentityTranslationResolver,
  type TranslationEventLogger,
} from "@shellmsg/application";
import type { TranslationEvent } from "@shellmsg/contracts";
import { FixedClock } from "@shellmsg/shared";
import { createCliCompositionRoot } from "./composition-root.js";
import { DEFAULT_CATALOG_DIR } from "./config.js";
import { ConsoleTranslationEventLogger } from "./trace-logger.js";

class RecordingLogger implements TranslationEventLogger {
  public readonly events: TranslationEvent[] = [];

  log(event: TranslationEvent): void {
    this.events.push(event);
  }
}

describe("createCliCompositionRoot", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("captures the locale context once", () => {
    const root = createCliCompositionRoot({
      env: { LANG: "de_DE.UTF-8" },
    });

    expect(root.context).toEqual({
      locale: "de_DE.UTF-8",
      source: "LANG",
      languages: [],
      candidates: ["de_DE", "de"],
    });
    expect(root.resolver).toBeInstanceOf(CatalogTranslationResolver);
  });

  it("uses the identity resolver when translation is disabled", () => {
    const root = createCliCompositionRoot({
      env: { LANG: "de_DE.UTF-8", SHELLMSG_NLS: "disabled" },
    });

    expect(root.config?.translationSupport).toBe("disabled");
    expect(root.resolver.resolve("File")).toBe("File");
  });

  it("records invalid configuration and falls back to identity", () => {
    const logger = new RecordingLogger();
    const root = createCliCompositionRoot({
      env: { LANG: "de_DE.UTF-8", SHELLMSG_NLS: "maybe" },
      logger,
      clock: new FixedClock("2026-03-01T12:00:00.000Z"),
    });

    expect(root.config).toBeNull();
    expect(root.resolver).toBeInstanceOf(IdentityTranslationResolver);
    expect(logger.events).toHaveLength(1);
    expect(logger.events[0]?.name).toBe("config.invalid");
    expect(logger.events[0]?.metadata.code).toBe("INVALID_CONFIGURATION");
  });

  it("selects the console trace logger when tracing is requested", () => {
    expect(
      createCliCompositionRoot({ env: { SHELLMSG_TRACE: "1" } }).logger,
    ).toBeInstanceOf(ConsoleTranslationEventLogger);
  });

  it("writes trace events as JSON lines on stderr", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    const root = createCliCompositionRoot({
      env: { LANG: "de", SHELLMSG_TRACE: "1" },
      clock: new FixedClock("2026-03-01T12:00:00.000Z"),
    });
    expect(root.resolver.resolve("File")).toBe("Datei");

    expect(errorSpy.mock.calls).toEqual([
      [
        JSON.stringify({
          type: "translation_event",
          name: "catalog.loaded",
          occurredAt: "2026-03-01T12:00:00.000Z",
          metadata: {
            path: join(DEFAULT_CATALOG_DIR, "de", "fish.json"),
            format: "json",
            domain: "fish",
            locale: "de",
            entries: "6",
          },
        }),
      ],
      [
        JSON.stringify({
          type: "translation_event",
          name: "message.resolved",
          occurredAt: "2026-03-01T12:00:00.000Z",
          metadata: { key: "File", domain: "fish", locale: "de" },
        }),
      ],
    ]);
  });

  it("stays silent without tracing", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    createCliCompositionRoot({ env: { LANG: "de" } }).resolver.resolve("File");

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
