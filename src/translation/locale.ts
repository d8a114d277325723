const normalize = (tag: string) => tag.trim().toLowerCase().replace(/-/g, "_");

/**
 * Picks the first catalog locale named by an `Accept-Language` header.
 * `pt-BR` matches a `pt_BR` catalog and a bare `pt` matches the first
 * catalog of that language.
 */
export function negotiateLocale(
  acceptLanguage: string | undefined,
  supported: readonly string[],
  fallback: string,
): string {
  const candidates = (acceptLanguage ?? "")
    .split(",")
    .map((part) => normalize(part.split(";")[0] ?? ""))
    .filter(Boolean);

  for (const tag of candidates) {
    const exact = supported.find((locale) => normalize(locale) === tag);
    if (exact) return exact;

    const language = tag.split("_")[0];
    const regional = supported.find(
      (locale) => normalize(locale).split("_")[0] === language,
    );
    if (regional) return regional;
  }

  return fallback;
}
