import fs from "node:fs";
import path from "node:path";
import i18next from "i18next";
import { z } from "zod";
import {
  TRANSLATION_DOMAINS,
  type TranslationDomain,
  type Translator,
} from "./translator";
import { CatalogError } from "@/utils/errors/CatalogError";
import { logger } from "@/utils/logger";

/** locale -> domain -> msgid -> template */
export type Catalogs = Record<string, Record<string, Record<string, string>>>;

export interface CatalogTranslator extends Translator {
  readonly locales: string[];
}

const entriesSchema = z.record(z.string(), z.string());

function readDomainFile(file: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw new CatalogError("Unreadable catalog", file, { cause: error });
  }

  const result = entriesSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogError("Catalog must map strings to strings", file, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Reads `<dir>/<locale>/<domain>.json` for every locale directory.
 * Runs once at startup; the result is never mutated afterwards.
 */
export function loadCatalogs(dir: string): Catalogs {
  if (!fs.existsSync(dir)) {
    logger.warn("Locales directory not found; messages stay untranslated", {
      dir,
    });
    return {};
  }

  const catalogs: Catalogs = {};
  const locales = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const locale of locales) {
    const domains: Record<string, Record<string, string>> = {};
    for (const domain of TRANSLATION_DOMAINS) {
      const file = path.join(dir, locale, `${domain}.json`);
      if (!fs.existsSync(file)) {
        logger.warn("Catalog domain missing", { locale, domain });
        continue;
      }
      domains[domain] = readDomainFile(file);
    }
    catalogs[locale] = domains;
    logger.info("Catalog loaded", {
      locale,
      domains: Object.keys(domains),
    });
  }

  return catalogs;
}

export async function createCatalogTranslator(
  catalogs: Catalogs,
): Promise<CatalogTranslator> {
  const i18n = i18next.createInstance();
  await i18n.init({
    resources: catalogs,
    ns: [...TRANSLATION_DOMAINS],
    defaultNS: "errors",
    fallbackLng: false,
    keySeparator: false,
    nsSeparator: false,
    initImmediate: false,
  });

  return {
    locales: Object.keys(catalogs),
    translate(domain: TranslationDomain, key: string, locale: string) {
      // raw entry: %{name} placeholders are interpolated by the caller
      const entry: unknown = i18n.getResource(locale, domain, key);
      return typeof entry === "string" ? entry : undefined;
    },
  };
}
