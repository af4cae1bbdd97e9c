/**
 * Validation-Error Extractor
 *
 * Best-effort scraping of the ad platform's "these creatives are not valid
 * here" feedback. The wording is not a stable contract, so matching is
 * permissive: find a sentence that reports invalid creatives, then take
 * the numeric tokens that follow it up to the end of that sentence.
 *
 * An empty result is a normal outcome, not an error. Callers treat "error
 * reported, nothing extracted" as non-retryable.
 */

/** Phrases that introduce a list of rejected creatives. */
const INVALID_CREATIVES_RE =
  /\b(?:creatives?|ads?|ids?|entities)[^.:\n]{0,60}?\b(?:not\s+valid|invalid|incompatible|not\s+compatible|rejected|not\s+allowed)\b|\b(?:invalid|incompatible|rejected)\s+(?:creatives?|ads?|ids?|entities)\b/i;

const NUMERIC_TOKEN_RE = /\b\d+\b/g;

/** A period followed by whitespace or end of text, or a line break. */
const SENTENCE_END_RE = /\.(?=\s|$)|\n/;

/**
 * Identifiers named by a validation error, in first-seen order.
 *
 * Only tokens between the recognized phrase and the end of its sentence
 * count, so numbers in a preamble ("Step 3 of 5 failed") or in a later
 * sentence are not mistaken for creative ids.
 */
export function extractInvalidEntityIds(errorText: string): Set<string> {
  const ids = new Set<string>();
  if (!errorText) return ids;

  const match = INVALID_CREATIVES_RE.exec(errorText);
  if (!match) return ids;

  // The list may start on the line after "not valid:".
  const rest = errorText.slice(match.index + match[0].length).replace(/^[\s:]+/, "");
  const end = SENTENCE_END_RE.exec(rest);
  const tail = end ? rest.slice(0, end.index) : rest;
  for (const token of tail.matchAll(NUMERIC_TOKEN_RE)) {
    ids.add(token[0]);
  }
  return ids;
}
