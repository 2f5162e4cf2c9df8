/** Maximum number of characters kept in error messages and hints. */
const ERROR_TEXT_MAX_LENGTH = 1_000;

/**
 * Collapses whitespace in an error message and truncates it so a single
 * failure cannot flood the response payload.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Same as {@link normaliseErrorMessage}, but blank hints become `undefined`. */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  return normaliseErrorMessage(collapsed);
}

/** Splits free text into lower-cased alphanumeric tokens (`ping_url` → `ping`, `url`). */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}
