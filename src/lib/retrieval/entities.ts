import { readFileSync } from "node:fs";

import { z } from "zod";

export type EntityType = "company" | "investor" | "sector" | "location";

export type ExtractedEntities = {
  companies: string[];
  investors: string[];
  sectors: string[];
  locations: string[];
  queryTypes: Set<EntityType>;
  isComparison: boolean;
  isAggregation: boolean;
  isTopQuery: boolean;
};

const termList = z.array(z.string().min(1).transform((s) => s.toLowerCase()));

const vocabularySchema = z.object({
  gazetteers: z.object({ investor: termList, sector: termList, location: termList }),
  shapeKeywords: z.object({ comparison: termList, aggregation: termList, top: termList }),
  contextKeywords: z.object({ investor: termList, sector: termList, location: termList }),
  commandWords: termList,
});

type TermGroup<K extends string> = Readonly<Record<K, readonly string[]>>;

export type Vocabulary = Readonly<{
  gazetteers: TermGroup<Exclude<EntityType, "company">>;
  shapeKeywords: TermGroup<"comparison" | "aggregation" | "top">;
  contextKeywords: TermGroup<Exclude<EntityType, "company">>;
  commandWords: readonly string[];
}>;

function freezeGroup<K extends string>(group: Record<K, string[]>): TermGroup<K> {
  for (const key in group) Object.freeze(group[key]);
  return Object.freeze(group);
}

function loadVocabulary(): Vocabulary {
  const parsed = vocabularySchema.parse(
    JSON.parse(readFileSync(new URL("./vocabulary.json", import.meta.url), "utf8")),
  );
  return Object.freeze({
    gazetteers: freezeGroup(parsed.gazetteers),
    shapeKeywords: freezeGroup(parsed.shapeKeywords),
    contextKeywords: freezeGroup(parsed.contextKeywords),
    commandWords: Object.freeze(parsed.commandWords),
  });
}

export const VOCABULARY: Vocabulary = loadVocabulary();

const GAZETTEER_TERMS: ReadonlySet<string> = new Set([
  ...VOCABULARY.gazetteers.investor,
  ...VOCABULARY.gazetteers.sector,
  ...VOCABULARY.gazetteers.location,
]);

// Words that steer retrieval are never company names, even when capitalized.
const NON_COMPANY_WORDS: ReadonlySet<string> = new Set([
  ...VOCABULARY.shapeKeywords.comparison,
  ...VOCABULARY.shapeKeywords.aggregation,
  ...VOCABULARY.shapeKeywords.top,
  ...VOCABULARY.contextKeywords.investor,
  ...VOCABULARY.contextKeywords.sector,
  ...VOCABULARY.contextKeywords.location,
  ...VOCABULARY.commandWords,
]);

const MIN_TOKEN_LENGTH = 3;
const MIN_COMPANY_LENGTH = 4;
const EDGE_PUNCTUATION = /^[?,.'"!()]+|[?,.'"!()]+$/g;

/** "tiger global" → "Tiger Global", "d2c" → "D2C", "e-commerce" → "E-Commerce". */
export function titleCase(term: string): string {
  return term.replace(/[a-z]+/gi, (w) => w[0].toUpperCase() + w.slice(1).toLowerCase());
}

export function tokenize(query: string): string[] {
  return query
    .split(/\s+/)
    .map((w) => w.replace(EDGE_PUNCTUATION, ""))
    .filter((w) => w.length >= MIN_TOKEN_LENGTH);
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((n) => haystack.includes(n));
}

// Ordered by first occurrence in the query; ties keep vocabulary order.
function gazetteerHits(queryLower: string, terms: readonly string[]): string[] {
  return terms
    .map((term, order) => ({ term, order, at: queryLower.indexOf(term) }))
    .filter((hit) => hit.at >= 0)
    .sort((a, b) => a.at - b.at || a.order - b.order)
    .map((hit) => hit.term);
}

function isCapitalized(token: string): boolean {
  return /^\p{Lu}/u.test(token);
}

export function extractEntities(query: string): ExtractedEntities {
  const queryLower = query.toLowerCase();
  const { gazetteers, shapeKeywords, contextKeywords } = VOCABULARY;

  const entities: ExtractedEntities = {
    companies: [],
    investors: [],
    sectors: [],
    locations: [],
    queryTypes: new Set(),
    isComparison: containsAny(queryLower, shapeKeywords.comparison),
    isAggregation: containsAny(queryLower, shapeKeywords.aggregation),
    isTopQuery: containsAny(queryLower, shapeKeywords.top),
  };

  if (containsAny(queryLower, contextKeywords.investor)) entities.queryTypes.add("investor");
  if (containsAny(queryLower, contextKeywords.sector)) entities.queryTypes.add("sector");
  if (containsAny(queryLower, contextKeywords.location)) entities.queryTypes.add("location");

  const matchedTerms: string[] = [];
  const collect = (type: Exclude<EntityType, "company">, terms: readonly string[], out: string[]) => {
    for (const term of gazetteerHits(queryLower, terms)) {
      out.push(titleCase(term));
      matchedTerms.push(term);
      entities.queryTypes.add(type);
    }
  };
  collect("investor", gazetteers.investor, entities.investors);
  collect("sector", gazetteers.sector, entities.sectors);
  collect("location", gazetteers.location, entities.locations);

  // Words of a matched multi-word phrase ("Tiger" in "Tiger Global") belong to that phrase.
  const phraseWords = new Set(matchedTerms.flatMap((t) => t.split(" ")));

  for (const token of tokenize(query)) {
    const lower = token.toLowerCase();
    if (
      token.length >= MIN_COMPANY_LENGTH &&
      isCapitalized(token) &&
      !GAZETTEER_TERMS.has(lower) &&
      !phraseWords.has(lower) &&
      !NON_COMPANY_WORDS.has(lower)
    ) {
      entities.companies.push(token);
      entities.queryTypes.add("company");
    }
  }

  return entities;
}
