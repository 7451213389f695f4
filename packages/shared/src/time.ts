import { DateTime } from "luxon";

export function utcNowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) {
    throw new Error("Failed to generate current UTC timestamp");
  }
  return iso;
}
