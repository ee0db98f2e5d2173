import { StructuralQuery, and, byClass, byTag, child, descendant, nthChild } from "../crawl/query";

export type ProfileName = "ranked" | "positional" | "storylink";

export interface ExtractionProfile {
  name: ProfileName;
  /** Selects one node per story. */
  items: StructuralQuery;
  /** Used instead of `items` when `items` matches nothing. */
  fallbackItems?: StructuralQuery;
  /** Rank marker below the item. Profiles without one produce records without `rank`. */
  rank?: StructuralQuery;
  /** Title anchor below the item. When absent the item is itself the anchor. */
  title?: StructuralQuery;
}

const STORYLINK_ANCHORS = and(byTag("a"), byClass("storylink"));

export const PROFILES: Record<ProfileName, ExtractionProfile> = {
  ranked: {
    name: "ranked",
    items: byClass("athing"),
    rank: byClass("rank"),
    title: descendant(byClass("title"), byTag("a")),
  },
  positional: {
    name: "positional",
    items: child(child(nthChild(byTag("td"), 3), byTag("span")), byTag("a")),
    fallbackItems: STORYLINK_ANCHORS,
  },
  storylink: {
    name: "storylink",
    items: STORYLINK_ANCHORS,
  },
};

export function isProfileName(value: string): value is ProfileName {
  return Object.prototype.hasOwnProperty.call(PROFILES, value);
}

export function getProfile(name: ProfileName): ExtractionProfile {
  return PROFILES[name];
}
