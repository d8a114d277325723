import { flatten } from "@/translation/flatten";
import { formatLeaf, formatMessage } from "@/translation/format";
import {
  DEFAULT_LOCALE,
  identityTranslator,
  type Translator,
} from "@/translation/translator";
import type { Resolution } from "@/types/resolution";
import type { RawError } from "@/types/validation";

export type TranslateErrorsOptions = {
  defaultLocale?: string;
  translator?: Translator;
};

/** Orders strings by Unicode code point, unlike the UTF-16 default sort. */
export function compareCodePoints(a: string, b: string): number {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();

  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done || r.done) return l.done ? (r.done ? 0 : -1) : 1;

    const diff = (l.value.codePointAt(0) ?? 0) - (r.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

function render(
  error: RawError,
  locale: string,
  translator: Translator,
): string[] {
  switch (error.kind) {
    case "message":
      return [formatMessage(error.message, locale, translator)];
    case "tree":
      return flatten(error.node).map((leaf) =>
        formatLeaf(leaf, locale, translator),
      );
  }
}

/**
 * Builds the stage that replaces raw errors with sorted, translated strings.
 * `context.locale` and `context.translator` win over the defaults given here.
 */
export function createTranslateErrors(options: TranslateErrorsOptions = {}) {
  const defaultLocale = options.defaultLocale ?? DEFAULT_LOCALE;
  const defaultTranslator = options.translator ?? identityTranslator;

  return function translateErrors<TValue>(
    resolution: Resolution<TValue>,
  ): Resolution<TValue, string> {
    if (resolution.errors.length === 0) {
      return { ...resolution, errors: [] };
    }

    const locale = resolution.context.locale ?? defaultLocale;
    const translator = resolution.context.translator ?? defaultTranslator;

    const errors = resolution.errors
      .flatMap((error) => render(error, locale, translator))
      .sort(compareCodePoints);

    return { ...resolution, errors };
  };
}

export const translateErrors = createTranslateErrors();
