const BOILERPLATE_PATTERNS: RegExp[] = [
  /\bcookie(s)? (policy|settings|consent)\b/i,
  /\bwe use cookies\b/i,
  /^copyright\b/i,
  /^all rights reserved\b/i,
  /^©/,
  /^page \d+( of \d+)?$/i,
];

export interface CleanTextOptions {
  /** Drop cookie banners, copyright footers and page counters. */
  dropBoilerplate?: boolean;
}

function normalizeQuotes(input: string): string {
  return input
    .replace(/[“”„‟«»]/g, "\"")
    .replace(/[‘’‚‛]/g, "'");
}

function stripControlCharacters(input: string): string {
  // Keeps \t and \n; \r is folded by cleanupWhitespace.
  return input.replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f\ufffd]/g, "");
}

function cleanupWhitespace(input: string): string {
  return input
    .replace(/\r\n?/g, "\n")
    .replace(/\u00a0/g, " ")
    .replace(/\t/g, " ")
    .replace(/[ ]{2,}/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

// PDF extraction splits words at line ends: "retrie-\nval" → "retrieval".
function joinHyphenatedLineBreaks(input: string): string {
  return input.replace(/(\p{L})-\n(\p{Ll})/gu, "$1$2");
}

function isBoilerplate(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 0 && BOILERPLATE_PATTERNS.some((pattern) => pattern.test(trimmed));
}

/**
 * Normalises extracted document text before chunking: quotes, control
 * characters, whitespace and paragraph breaks. Paragraphs (blank-line
 * separated) are preserved.
 */
export function cleanText(input: string, options: CleanTextOptions = {}): string {
  if (!input || input.trim().length === 0) return "";

  const normalized = cleanupWhitespace(stripControlCharacters(normalizeQuotes(input)));
  const base = joinHyphenatedLineBreaks(normalized);
  if (!options.dropBoilerplate) return base;

  const kept = base.split("\n").filter((line) => !isBoilerplate(line));
  return cleanupWhitespace(kept.join("\n"));
}
