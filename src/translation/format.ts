import { interpolate } from "./interpolate";
import type { TranslationDomain, Translator } from "./translator";
import type { ErrorLeaf } from "@/types/validation";

export function formatMessage(
  message: string,
  locale: string,
  translator: Translator,
  domain: TranslationDomain = "errors",
): string {
  return translator.translate(domain, message, locale) ?? message;
}

/**
 * Renders a leaf as `field message`, or `prefix: field message` when it
 * came from an association. Field names and messages use separate domains.
 */
export function formatLeaf(
  leaf: ErrorLeaf,
  locale: string,
  translator: Translator,
): string {
  const template =
    translator.translate("errors", leaf.template, locale) ?? leaf.template;
  const rendered = interpolate(template, leaf.bindings);
  const field =
    translator.translate("schema_fields", leaf.field, locale) ?? leaf.field;

  return leaf.prefix
    ? `${leaf.prefix}: ${field} ${rendered}`
    : `${field} ${rendered}`;
}
