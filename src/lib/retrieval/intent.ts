import type { ExtractedEntities } from "./entities";

export const INTENTS = [
  "comparison",
  "aggregation",
  "top_ranking",
  "investor_info",
  "sector_info",
  "location_info",
  "company_info",
  "general",
] as const;

export type Intent = (typeof INTENTS)[number];

export type IntentRule = {
  intent: Exclude<Intent, "general">;
  matches: (entities: ExtractedEntities) => boolean;
};

// Evaluated in order; the first match wins. A query with "compare" and a sector word is a
// comparison, not a sector query.
export const INTENT_RULES: readonly IntentRule[] = [
  { intent: "comparison", matches: (e) => e.isComparison },
  { intent: "aggregation", matches: (e) => e.isAggregation },
  { intent: "top_ranking", matches: (e) => e.isTopQuery },
  { intent: "investor_info", matches: (e) => e.queryTypes.has("investor") },
  { intent: "sector_info", matches: (e) => e.queryTypes.has("sector") },
  { intent: "location_info", matches: (e) => e.queryTypes.has("location") },
  { intent: "company_info", matches: (e) => e.queryTypes.has("company") },
];

export function classifyIntent(
  entities: ExtractedEntities,
  rules: readonly IntentRule[] = INTENT_RULES,
): Intent {
  return rules.find((rule) => rule.matches(entities))?.intent ?? "general";
}
