export const TRANSLATION_DOMAINS = ["errors", "schema_fields"] as const;

export type TranslationDomain = (typeof TRANSLATION_DOMAINS)[number];

/**
 * Looks up the localized text for `key`. Returns `undefined` when the
 * catalog has no entry; callers fall back to the key itself.
 */
export interface Translator {
  translate(
    domain: TranslationDomain,
    key: string,
    locale: string,
  ): string | undefined;
}

export const identityTranslator: Translator = {
  translate: () => undefined,
};

export const DEFAULT_LOCALE = "en";
