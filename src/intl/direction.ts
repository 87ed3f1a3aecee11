/**
 * Layout direction of a locale and the edge and mirroring rules that follow
 * from it.
 */

export type CharacterDirection = "ltr" | "rtl";

/** Direction-relative edges, as used by layout constraints. */
export type RelativeEdge = "leading" | "trailing";

/** Absolute edges. */
export type AbsoluteEdge = "left" | "right";

const RTL_SCRIPTS: ReadonlySet<string> = new Set([
  "Adlm", "Arab", "Hebr", "Nkoo", "Rohg", "Syrc", "Thaa",
]);

/**
 * Returns the character direction of the locale's (likely) script.
 *
 * @example
 * ```ts
 * characterDirection("ar");    // "rtl"
 * characterDirection("ja-JP"); // "ltr"
 * ```
 */
export const characterDirection = (locale: string): CharacterDirection => {
  const script = new Intl.Locale(locale).maximize().script;
  return script !== undefined && RTL_SCRIPTS.has(script) ? "rtl" : "ltr";
};

/** Resolves a leading/trailing edge to left/right for a direction. */
export const resolveEdge = (
  edge: RelativeEdge,
  direction: CharacterDirection,
): AbsoluteEdge => {
  const leading: AbsoluteEdge = direction === "rtl" ? "right" : "left";
  const trailing: AbsoluteEdge = direction === "rtl" ? "left" : "right";
  return edge === "leading" ? leading : trailing;
};

/** Kinds of content whose mirroring in right-to-left layouts is decided here. */
export type MirrorableContent =
  | "workflow"
  | "rating"
  | "backArrow"
  | "graph"
  | "clock"
  | "playbackControl"
  | "timeline"
  | "musicNotation"
  | "phoneNumber"
  | "logo";

const MIRRORED: ReadonlySet<MirrorableContent> = new Set<MirrorableContent>([
  "workflow",
  "rating",
  "backArrow",
]);

/**
 * Whether content should be flipped horizontally in a right-to-left layout.
 * Progressions and directional arrows flip; graphs, clocks, media controls,
 * music, phone numbers and logos keep their orientation.
 */
export const shouldMirror = (
  content: MirrorableContent,
  direction: CharacterDirection = "rtl",
): boolean => direction === "rtl" && MIRRORED.has(content);
