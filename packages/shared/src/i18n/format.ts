export type FormatArgument = string | number;

const CONVERSION_REGEX = /%(?:%|l{0,2}([sdiu]))/g;

function renderArgument(conversion: string, value: FormatArgument): string {
  if (conversion === "s") return String(value);
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(Math.trunc(value)) : String(value);
  }
  return value;
}

export function formatMessage(
  template: string,
  ...args: FormatArgument[]
): string {
  let nextArgument = 0;

  return template.replace(
    CONVERSION_REGEX,
    (match: string, conversion: string | undefined) => {
      if (conversion === undefined) return "%";

      const value = args[nextArgument];
      nextArgument += 1;
      if (value === undefined) return match;

      return renderArgument(conversion, value);
    },
  );
}
