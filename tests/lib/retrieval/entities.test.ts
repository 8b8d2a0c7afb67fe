import { describe, expect, it } from "vitest";

import { VOCABULARY, extractEntities, titleCase, tokenize } from "@/lib/retrieval/entities";

describe("extractEntities", () => {
  it("finds a single capitalized company name", () => {
    const e = extractEntities("Tell me about Flipkart");
    expect(e.companies).toEqual(["Flipkart"]);
    expect(e.investors).toEqual([]);
    expect(e.sectors).toEqual([]);
    expect(e.locations).toEqual([]);
    expect([...e.queryTypes]).toEqual(["company"]);
    expect(e.isComparison).toBe(false);
    expect(e.isAggregation).toBe(false);
    expect(e.isTopQuery).toBe(false);
  });

  it("keeps query order for compared companies and skips the command word", () => {
    const e = extractEntities("Compare CRED and PhonePe");
    expect(e.companies).toEqual(["CRED", "PhonePe"]);
    expect(e.isComparison).toBe(true);
  });

  it("flags a top query with investor context and no companies", () => {
    const e = extractEntities("Who are the top investors?");
    expect(e.isTopQuery).toBe(true);
    expect(e.queryTypes.has("investor")).toBe(true);
    expect(e.companies).toEqual([]);
  });

  it("title-cases gazetteer hits and keeps phrase words out of companies", () => {
    const e = extractEntities("Which fintech companies are in Bengaluru backed by Tiger Global?");
    expect(e.investors).toEqual(["Tiger Global"]);
    expect(e.sectors).toEqual(["Fintech"]);
    expect(e.locations).toEqual(["Bengaluru"]);
    expect(e.companies).toEqual([]);
    expect(e.queryTypes).toEqual(new Set(["investor", "sector", "location"]));
  });

  it("orders gazetteer hits by where they appear in the query", () => {
    const e = extractEntities("Accel versus Sequoia");
    expect(e.investors).toEqual(["Accel", "Sequoia"]);
    expect(e.companies).toEqual([]);
    expect(e.isComparison).toBe(true);
  });

  it("ignores capitalized tokens shorter than four characters", () => {
    const e = extractEntities("Is Ola in Pune?");
    expect(e.companies).toEqual([]);
    expect(e.locations).toEqual(["Pune"]);
    expect([...e.queryTypes]).toEqual(["location"]);
  });

  it("detects aggregation phrases", () => {
    expect(extractEntities("How many startups are in Mumbai?").isAggregation).toBe(true);
  });

  it("is deterministic", () => {
    const q = "Compare Zerodha and Groww in fintech";
    expect(extractEntities(q)).toEqual(extractEntities(q));
  });
});

describe("titleCase", () => {
  it("capitalizes each alphabetic run", () => {
    expect(titleCase("tiger global")).toBe("Tiger Global");
    expect(titleCase("d2c")).toBe("D2C");
    expect(titleCase("e-commerce")).toBe("E-Commerce");
  });
});

describe("tokenize", () => {
  it("strips edge punctuation and drops short tokens", () => {
    expect(tokenize("Is Ola in Pune?")).toEqual(["Ola", "Pune"]);
    expect(tokenize(`"Hello," said Zomato's CEO!`)).toEqual(["Hello", "said", "Zomato's", "CEO"]);
  });
});

describe("VOCABULARY", () => {
  it("is frozen all the way down to the term lists", () => {
    expect(Object.isFrozen(VOCABULARY)).toBe(true);
    expect(Object.isFrozen(VOCABULARY.gazetteers)).toBe(true);
    expect(Object.isFrozen(VOCABULARY.gazetteers.investor)).toBe(true);
    expect(Object.isFrozen(VOCABULARY.shapeKeywords.comparison)).toBe(true);
    expect(Object.isFrozen(VOCABULARY.commandWords)).toBe(true);
  });

  it("rejects writes from callers", () => {
    const terms: string[] = [...VOCABULARY.gazetteers.investor];
    expect(Reflect.set(VOCABULARY.gazetteers, "investor", [])).toBe(false);
    expect(VOCABULARY.gazetteers.investor).toEqual(terms);
  });
});
