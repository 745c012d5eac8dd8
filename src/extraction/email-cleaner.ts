// Quoted reply lines, e.g. "> On Monday ... wrote:" or "| original text"
const QUOTED_LINE = /^\s*[>|]/;

// Each pattern removes everything from its match to the end of the text
const SIGNATURE_PATTERNS: RegExp[] = [
  /^[ \t]*--[ \t]*$[\s\S]*/m,
  /best regards,[\s\S]*/i,
  /sincerely,[\s\S]*/i,
  /thank you,[\s\S]*/i,
  /regards,[\s\S]*/i,
];

/**
 * Strip quoted replies and trailing signature blocks from an email body.
 * The result is the only text the extractors look at.
 */
export function cleanEmailContent(content: string): string {
  const lines = content.split(/\r?\n/).filter((line) => !QUOTED_LINE.test(line));

  let cleaned = lines.join('\n');
  for (const pattern of SIGNATURE_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }

  return cleaned.trim();
}
