/**
 * Locale-aware list joining through `Intl.ListFormat`.
 */

/** Options for {@link formatList}. */
export interface ListFormatOptions {
  /** `"conjunction"` (and), `"disjunction"` (or) or `"unit"`. Default: conjunction. */
  readonly type?: Intl.ListFormatType | undefined;
  readonly style?: Intl.ListFormatStyle | undefined;
}

/**
 * Joins items the way `locale` writes lists.
 *
 * @example
 * ```ts
 * formatList(["Cats", "Dogs", "Birds"], "en-US"); // "Cats, Dogs, and Birds"
 * formatList(["Cats", "Dogs", "Birds"], "de");    // "Cats, Dogs und Birds"
 * ```
 */
export const formatList = (
  items: readonly string[],
  locale: string,
  options?: ListFormatOptions,
): string =>
  new Intl.ListFormat(locale, {
    type: options?.type ?? "conjunction",
    style: options?.style ?? "long",
  }).format(items);
