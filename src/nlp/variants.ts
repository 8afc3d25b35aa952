/**
 * Case and umlaut variant generation.
 *
 * The resolver queries the case-sensitive store once per variant, so this is
 * where case-insensitivity actually happens. Output order is stable and the
 * set size is bounded by a constant regardless of input length.
 */

export const MAX_VARIANTS = 8;

const LOCALE = "de-DE";

// Applied independently of the runtime's case tables: ß has no single-letter
// uppercase mapping in toUpperCase ("SS"), and umlaut casing differs between
// ICU builds.
const CASE_SWAPS: ReadonlyMap<string, string> = new Map([
  ["ä", "Ä"],
  ["Ä", "ä"],
  ["ö", "Ö"],
  ["Ö", "ö"],
  ["ü", "Ü"],
  ["Ü", "ü"],
  ["ß", "ẞ"],
  ["ẞ", "ß"],
]);

function upper(text: string): string {
  return text.replace(/ß/g, "ẞ").toLocaleUpperCase(LOCALE);
}

function lower(text: string): string {
  return text.toLocaleLowerCase(LOCALE);
}

function title(text: string): string {
  const [first = "", ...rest] = Array.from(text);
  return upper(first) + lower(rest.join(""));
}

function swapCase(text: string): string {
  return Array.from(text, (char) => CASE_SWAPS.get(char) ?? char).join("");
}

export function variants(text: string): string[] {
  const input = String(text ?? "");
  const out: string[] = [];
  const push = (value: string) => {
    if (out.length < MAX_VARIANTS && !out.includes(value)) out.push(value);
  };

  push(input);
  push(lower(input));
  push(upper(input));
  push(title(input));

  for (const variant of [...out]) push(swapCase(variant));
  return out;
}
