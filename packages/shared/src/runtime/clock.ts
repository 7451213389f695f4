import { utcNowIso } from "../time.js";

/** Source of event timestamps (UTC ISO-8601). */
export interface Clock {
  nowIso(): string;
}

export class SystemClock implements Clock {
  nowIso(): string {
    return utcNowIso();
  }
}

export class FixedClock implements Clock {
  constructor(private readonly instant: string) {}

  nowIso(): string {
    return this.instant;
  }
}
