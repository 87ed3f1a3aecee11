/**
 * Message catalogs with named placeholders and plural variants.
 *
 * Sentences are translated whole, with the number inside the sentence,
 * instead of concatenating a number with a translated fragment.
 */

import { z } from "zod";
import { loadDataFile } from "./data.js";

/** A plural-aware entry, keyed by `Intl.PluralRules` category. */
export type PluralEntry = Readonly<
  Partial<Record<Intl.LDMLPluralRule, string>> & { readonly other: string }
>;

/** One catalog entry: a plain template or plural variants. */
export type CatalogEntry = string | PluralEntry;

/** Messages for one locale, keyed by message key. */
export type Catalog = Readonly<Record<string, CatalogEntry>>;

/** Catalogs keyed by locale tag (`"en"`, `"de"`, `"pt-BR"`...). */
export type Catalogs = Readonly<Record<string, Catalog>>;

/** Values substituted into `{name}` placeholders. */
export type MessageValues = Readonly<Record<string, string | number>>;

const pluralEntrySchema = z.object({
  zero: z.string().optional(),
  one: z.string().optional(),
  two: z.string().optional(),
  few: z.string().optional(),
  many: z.string().optional(),
  other: z.string(),
});

const catalogSchema = z.record(z.string(), z.union([z.string(), pluralEntrySchema]));

const PLURAL_CATEGORIES = ["zero", "one", "two", "few", "many"] as const;

/** Picks the variant for a plural category, falling back to `other`. */
export const pluralVariant = (entry: PluralEntry, category: string): string => {
  for (const candidate of PLURAL_CATEGORIES) {
    if (candidate === category) return entry[candidate] ?? entry.other;
  }
  return entry.other;
};

const withoutUndefined = (entry: z.output<typeof pluralEntrySchema>): PluralEntry => {
  const result: { -readonly [K in keyof PluralEntry]: PluralEntry[K] } = {
    other: entry.other,
  };
  for (const category of PLURAL_CATEGORIES) {
    const value = entry[category];
    if (value !== undefined) result[category] = value;
  }
  return result;
};

/** Locales shipped in `data/locales`. */
export const BUNDLED_LOCALES = ["en", "de", "ar", "sv"] as const;

/** Loads the bundled catalogs from `data/locales/<locale>.json`. */
export const loadBundledCatalogs = (): Catalogs => {
  const catalogs: Record<string, Catalog> = {};
  for (const locale of BUNDLED_LOCALES) {
    const parsed = loadDataFile(`locales/${locale}.json`, catalogSchema);
    const catalog: Record<string, CatalogEntry> = {};
    for (const [key, entry] of Object.entries(parsed)) {
      catalog[key] =
        typeof entry === "string" ? entry : Object.freeze(withoutUndefined(entry));
    }
    catalogs[locale] = Object.freeze(catalog);
  }
  return Object.freeze(catalogs);
};

/**
 * Returns the lookup chain for a locale: `"de-DE"` → `["de-DE", "de"]`,
 * then `fallback` when it is not already included.
 */
export const localeChain = (locale: string, fallback: string): readonly string[] => {
  const chain: string[] = [];
  const parts = locale.split("-");
  for (let i = parts.length; i > 0; i--) {
    chain.push(parts.slice(0, i).join("-"));
  }
  if (!chain.includes(fallback)) chain.push(fallback);
  return chain;
};

/** Replaces `{name}` placeholders. Unknown placeholders are left as written. */
export const interpolate = (
  template: string,
  values: MessageValues,
  formatNumber: (value: number) => string,
): string =>
  template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = Object.hasOwn(values, name) ? values[name] : undefined;
    if (value === undefined) return placeholder;
    return typeof value === "number" ? formatNumber(value) : value;
  });

/** Options for {@link createLocalizer}. */
export interface LocalizerOptions {
  readonly locale: string;
  /** Defaults to the bundled catalogs. */
  readonly catalogs?: Catalogs | undefined;
  /** Locale consulted last. Default: `"en"`. */
  readonly fallbackLocale?: string | undefined;
}

/** Looks up and formats messages for one locale. */
export interface Localizer {
  readonly locale: string;
  /**
   * Returns the message for `key` with placeholders filled. A plural entry
   * is chosen by `values.count`. Missing keys return the key itself.
   */
  readonly t: (key: string, values?: MessageValues) => string;
  readonly has: (key: string) => boolean;
}

/**
 * Creates a {@link Localizer}.
 *
 * @example
 * ```ts
 * const l10n = createLocalizer({ locale: "de-DE" });
 * l10n.t("correct_number_employees_selected", { count: 500 });
 * // "500 Teammitglieder ausgewählt"
 * ```
 */
export const createLocalizer = (options: LocalizerOptions): Localizer => {
  const { locale } = options;
  const catalogs = options.catalogs ?? loadBundledCatalogs();
  const chain = localeChain(locale, options.fallbackLocale ?? "en");
  const pluralRules = new Intl.PluralRules(locale);
  const numberFormat = new Intl.NumberFormat(locale);

  const lookup = (key: string): CatalogEntry | undefined => {
    for (const tag of chain) {
      if (!Object.hasOwn(catalogs, tag)) continue;
      const catalog = catalogs[tag];
      if (catalog === undefined || !Object.hasOwn(catalog, key)) continue;
      const entry = catalog[key];
      if (entry !== undefined) return entry;
    }
    return undefined;
  };

  const t = (key: string, values: MessageValues = {}): string => {
    const entry = lookup(key);
    if (entry === undefined) return key;

    let template: string;
    if (typeof entry === "string") {
      template = entry;
    } else {
      const count = values["count"];
      const category =
        typeof count === "number" ? pluralRules.select(count) : "other";
      template = pluralVariant(entry, category);
    }

    return interpolate(template, values, (n) => numberFormat.format(n));
  };

  return Object.freeze({
    locale,
    t,
    has: (key: string) => lookup(key) !== undefined,
  });
};
