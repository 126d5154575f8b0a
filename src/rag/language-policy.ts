import { LanguagePolicyError } from "./errors.js";

/**
 * Characters outside the permitted set: ASCII, Latin-1 and Latin Extended-A
 * letters, combining accents, Greek (scientific notation), general
 * punctuation without bidi controls, super/subscripts, letterlike symbols,
 * arrows and mathematical operators.
 */
const OUTSIDE_PERMITTED_SCRIPT =
  /[^\t\n\r\x20-\x7E\u00A0-\u017F\u0300-\u036F\u0370-\u03FF\u2000-\u200D\u2010-\u2029\u202F-\u2064\u2070-\u209F\u2100-\u214F\u2190-\u21FF\u2200-\u22FF]/u;

/** First character that breaks the English-only policy, or null. */
export function findNonEnglish(text: string): string | null {
  const m = OUTSIDE_PERMITTED_SCRIPT.exec(text.normalize("NFC"));
  return m ? m[0] : null;
}

export function checkEnglish(text: string): boolean {
  return findNonEnglish(text) === null;
}

/**
 * The one gate for user-visible text: CLI output, stored answers and any log
 * line that carries model output. Throws rather than stripping.
 */
export function assertEnglishOutput(text: string): string {
  if (!checkEnglish(text)) throw new LanguagePolicyError();
  return text;
}
