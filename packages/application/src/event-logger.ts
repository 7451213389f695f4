import type {
  TranslationEvent,
  TranslationEventName,
} from "@shellmsg/contracts";
import type { Clock } from "@shellmsg/shared";

export interface TranslationEventLogger {
  log(event: TranslationEvent): void;
}

export class NoopTranslationEventLogger implements TranslationEventLogger {
  log(_event: TranslationEvent): void {
    void _event;
  }
}

export function createTranslationEvent(
  clock: Clock,
  name: TranslationEventName,
  metadata: Record<string, string> = {},
): TranslationEvent {
  return {
    name,
    occurredAt: clock.nowIso(),
    metadata,
  };
}

/**
 * Builds and logs an event. A logger or clock that throws is ignored, so
 * tracing can never change what a lookup or catalog load returns.
 */
export function recordTranslationEvent(
  logger: TranslationEventLogger,
  clock: Clock,
  name: TranslationEventName,
  metadata: Record<string, string> = {},
): void {
  try {
    logger.log(createTranslationEvent(clock, name, metadata));
  } catch {
    return;
  }
}
