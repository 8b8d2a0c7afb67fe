import { describe, expect, it } from "vitest";

import { extractEntities } from "@/lib/retrieval/entities";
import { classifyIntent } from "@/lib/retrieval/intent";

const intentOf = (query: string) => classifyIntent(extractEntities(query));

describe("classifyIntent", () => {
  it.each([
    ["Compare fintech companies in Mumbai", "comparison"],
    ["How many startups are in Mumbai?", "aggregation"],
    ["What are the biggest fintech companies?", "top_ranking"],
    ["Which companies has Sequoia invested in?", "investor_info"],
    ["Tell me about edtech", "sector_info"],
    ["Startups based in Pune", "location_info"],
    ["Tell me about Flipkart", "company_info"],
    ["hello there", "general"],
  ])("%s -> %s", (query, intent) => {
    expect(intentOf(query)).toBe(intent);
  });

  it("lets comparison win over every other signal", () => {
    const e = extractEntities("Compare the top fintech investors in Bengaluru");
    expect(e.isTopQuery).toBe(true);
    expect(classifyIntent(e)).toBe("comparison");
  });

  it("accepts a custom rule table", () => {
    const e = extractEntities("hello there");
    expect(classifyIntent(e, [{ intent: "sector_info", matches: () => true }])).toBe("sector_info");
    expect(classifyIntent(e, [])).toBe("general");
  });
});
