/**
 * Finds the entities (products, brands) an objective asks about.
 * The planner only uses the first one returned.
 */
export interface EntityExtractor {
  extract(objective: string): string[];
}

const UPPERCASE_TOKEN = /\b[A-Z][A-Z0-9]+\b/g;

/** Runs of two or more uppercase alphanumerics, e.g. `TIAROTEC`. */
export const uppercaseTokenExtractor: EntityExtractor = {
  extract: (objective) => objective.match(UPPERCASE_TOKEN) ?? [],
};
