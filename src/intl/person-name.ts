/**
 * Person name formatting with locale-dependent name order.
 */

export interface PersonNameComponents {
  readonly givenName: string;
  readonly familyName: string;
  readonly middleName?: string | undefined;
  readonly nickname?: string | undefined;
}

/**
 * - `long`: every component, e.g. "John Quincy Appleseed"
 * - `medium`: given and family name, e.g. "John Appleseed"
 * - `short`: the nickname, else the given name
 * - `initialGiven`: initial of the given name, e.g. "J. Appleseed"
 * - `abbreviated`: initials, e.g. "JA"
 */
export type PersonNameStyle = "long" | "medium" | "short" | "initialGiven" | "abbreviated";

/** Languages that write the family name first. */
const FAMILY_FIRST: ReadonlySet<string> = new Set(["hu", "ja", "ko", "vi", "zh"]);

/** Languages whose names are written without separating spaces. */
const UNSPACED: ReadonlySet<string> = new Set(["ja", "zh"]);

const initial = (name: string): string => Array.from(name)[0] ?? "";

/**
 * Formats a person's name for `locale`.
 *
 * @example
 * ```ts
 * formatPersonName({ givenName: "John", familyName: "Appleseed" }, "initialGiven", "en");
 * // "J. Appleseed"
 * ```
 */
export const formatPersonName = (
  name: PersonNameComponents,
  style: PersonNameStyle,
  locale: string,
): string => {
  const language = new Intl.Locale(locale).language;
  const familyFirst = FAMILY_FIRST.has(language);
  const separator = UNSPACED.has(language) ? "" : " ";

  const order = (given: string, family: string, middle?: string): string => {
    const parts = familyFirst
      ? [family, given, middle]
      : [given, middle, family];
    return parts.filter((part): part is string => !!part).join(separator);
  };

  switch (style) {
    case "long":
      return order(name.givenName, name.familyName, name.middleName);
    case "medium":
      return order(name.givenName, name.familyName);
    case "short":
      return name.nickname ?? name.givenName;
    case "initialGiven":
      return order(`${initial(name.givenName)}.`, name.familyName);
    case "abbreviated":
      return familyFirst
        ? `${initial(name.familyName)}${initial(name.givenName)}`
        : `${initial(name.givenName)}${initial(name.familyName)}`;
  }
};
