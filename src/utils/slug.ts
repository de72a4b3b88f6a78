/**
 * Filesystem-safe names for sessions
 */

/** Lowercase, whitespace to hyphens, keep word characters and hyphens. */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^\w-]+/g, "");
}

/**
 * Turn a model's title suggestion into a slug of at most four words.
 * Returns "" when nothing usable is left.
 */
export function sanitizeSuggestedName(raw: string): string {
  const unquoted = raw.trim().replace(/^['"`]+|['"`]+$/g, "");
  return slugify(unquoted).split("-").filter(Boolean).slice(0, 4).join("-");
}

/**
 * Name used when the naming call fails: the first 20 characters of the
 * user's first message.
 */
export function fallbackName(firstUserText: string): string {
  const slug = slugify(firstUserText.trim().slice(0, 20)).replace(/^-+|-+$/g, "");
  return slug || "chat";
}
