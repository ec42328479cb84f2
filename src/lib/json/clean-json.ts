const SEPARATOR_LINE = /^\s*=+\s*$\n?/gm;
const TRAILING_COMMA = /,\s*(?=[}\]])/g;

/**
 * Drops lines made only of `=` and commas that sit right before a closing
 * `}` or `]`. Operates on raw text, so commas inside string values that
 * precede a bracket are removed too.
 */
export function cleanJsonText(text: string) {
  return text.replace(SEPARATOR_LINE, "").replace(TRAILING_COMMA, "");
}

export function cleanAndParseJson(
  text: string,
): { ok: true; cleaned: string; value: unknown } | { ok: false; cleaned: string; error: string } {
  const cleaned = cleanJsonText(text);
  try {
    return { ok: true, cleaned, value: JSON.parse(cleaned) };
  } catch (error) {
    return {
      ok: false,
      cleaned,
      error: error instanceof Error ? error.message : "Invalid JSON.",
    };
  }
}

export function formatJson(value: unknown) {
  return `${JSON.stringify(value, null, 2)}\n`;
}
