import type { GatedAccessor } from "../capabilities/accessor.js";
import { getDefaultAccessor } from "../capabilities/default.js";

/** Drop combining marks, then replace anything still outside ASCII with `?`. */
export function stripToAscii(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\u0000-\u007f]/g, "?");
}

/**
 * ASCII rendering of `text`. Uses the transliteration package when it is
 * installed and falls back to `stripToAscii` otherwise.
 */
export async function transliterate(
  text: string,
  opts: { accessor?: GatedAccessor } = {},
): Promise<string> {
  const accessor = opts.accessor ?? getDefaultAccessor();
  const handle = await accessor.tryRequire("transliteration");
  const convert = handle?.exportOf("transliteration", "transliterate");
  if (typeof convert === "function") {
    const converted: unknown = convert(text);
    if (typeof converted === "string") {
      return converted;
    }
  }
  return stripToAscii(text);
}
