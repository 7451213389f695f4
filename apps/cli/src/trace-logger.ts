import type { TranslationEventLogger } from "@shellmsg/application";
import type { TranslationEvent } from "@shellmsg/contracts";

export class ConsoleTranslationEventLogger implements TranslationEventLogger {
  log(event: TranslationEvent): void {
    console.error(JSON.stringify({ type: "translation_event", ...event }));
  }
}
