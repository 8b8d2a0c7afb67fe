import { describe, expect, it } from "vitest";

import {
  formatBillions,
  formatCityCompanies,
  formatCoInvestors,
  formatCompanyDetails,
  formatGraphStats,
  formatInvestorPortfolio,
  formatLocationStats,
  formatSectorCompanies,
  formatSectorList,
  formatSectorStats,
  formatTopCompanies,
  formatTopInvestors,
  formatValuationGrowth,
} from "@/lib/retrieval/format";

describe("formatBillions", () => {
  it("renders billions or N/A", () => {
    expect(formatBillions(37.6)).toBe("$37.6B");
    expect(formatBillions(0)).toBe("$0B");
    expect(formatBillions(null)).toBe("N/A");
  });
});

describe("formatCompanyDetails", () => {
  it("renders every field and caps the investor list", () => {
    const text = formatCompanyDetails({
      company: "Flipkart",
      valuation: 37.6,
      entryValuation: 1,
      entryDate: "2012-08",
      rank: 1,
      sector: "E-Commerce",
      subsector: "Marketplace",
      locations: ["Bengaluru"],
      investors: ["A", "B", "C", "D", "E", "F", "G", "H", "I"],
    });
    expect(text).toBe(
      [
        "**Company: Flipkart**",
        "- Sector: E-Commerce (Marketplace)",
        "- Current Valuation: $37.6B",
        "- Entry Valuation: $1B",
        "- Entry Date: 2012-08",
        "- Rank: 1",
        "- Locations: Bengaluru",
        "- Key Investors: A, B, C, D, E, F, G (+2 more)",
      ].join("\n"),
    );
  });

  it("falls back to N/A and omits a missing rank", () => {
    const text = formatCompanyDetails({
      company: "Stealthco",
      valuation: null,
      entryValuation: null,
      entryDate: null,
      rank: null,
      sector: null,
      subsector: null,
      locations: [],
      investors: [],
    });
    expect(text).toBe(
      [
        "**Company: Stealthco**",
        "- Sector: N/A",
        "- Current Valuation: N/A",
        "- Entry Valuation: N/A",
        "- Entry Date: N/A",
        "- Locations: N/A",
        "- Key Investors: N/A",
      ].join("\n"),
    );
  });
});

describe("list formatters", () => {
  it("formats an investor portfolio", () => {
    expect(
      formatInvestorPortfolio([
        { investor: "Sequoia", company: "CRED", valuation: 6.4, sector: "Fintech" },
        { investor: "Sequoia", company: "Zomato", valuation: 5.4, sector: null },
      ]),
    ).toBe("**Investor: Sequoia**\n- Portfolio (2 companies): CRED ($6.4B - Fintech), Zomato ($5.4B - N/A)");
  });

  it("formats co-investors", () => {
    expect(
      formatCoInvestors("Sequoia", [{ coInvestor: "Accel", sharedInvestments: 3, sampleCompanies: [] }]),
    ).toBe("**Co-investors of Sequoia:**\n- Accel: 3 shared investments");
  });

  it("formats sector and city company lists", () => {
    expect(
      formatSectorCompanies("Fintech", [
        { company: "PhonePe", valuation: 12, subsector: "Payments" },
        { company: "Stealthco", valuation: null, subsector: null },
      ]),
    ).toBe("**Fintech Sector Companies:**\nPhonePe ($12B), Stealthco (N/A)");
    expect(
      formatCityCompanies("Mumbai", [{ company: "Nykaa", valuation: 4.1, sector: "E-Commerce" }]),
    ).toBe("**Companies in Mumbai:**\nNykaa (E-Commerce, $4.1B)");
  });

  it("numbers ranked lists", () => {
    expect(
      formatTopCompanies([
        { company: "Flipkart", valuation: 37.6, sector: "E-Commerce" },
        { company: "PhonePe", valuation: 12, sector: "Fintech" },
      ]),
    ).toBe("**Top Unicorns by Valuation:**\n1. Flipkart - $37.6B (E-Commerce)\n2. PhonePe - $12B (Fintech)");
    expect(formatTopInvestors([{ investor: "Tiger Global", investments: 4, portfolioValue: 61.4 }])).toBe(
      "**Most Active Investors:**\n1. Tiger Global - 4 investments ($61.4B total)",
    );
  });

  it("shows at most eight stats rows", () => {
    const rows = Array.from({ length: 10 }, (_, i) => ({
      sector: `S${i}`,
      companyCount: 1,
      totalValuation: 1,
      avgValuation: 1,
    }));
    const lines = formatSectorStats(rows).split("\n");
    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe("**Sector Statistics:**");
    expect(lines[8]).toBe("- S7: 1 companies, $1B total");

    expect(formatLocationStats([{ city: "Pune", companyCount: 2, totalValuation: null }])).toBe(
      "**Location Statistics:**\n- Pune: 2 companies, N/A total",
    );
  });

  it("formats graph stats", () => {
    expect(
      formatGraphStats({ companies: 7, investors: 7, sectors: 4, locations: 4, relationships: 27 }),
    ).toBe(
      [
        "**Startup Knowledge Graph:**",
        "- Total Companies: 7",
        "- Total Investors: 7",
        "- Sectors: 4",
        "- Locations: 4",
        "- Total Relationships: 27",
      ].join("\n"),
    );
  });

  it("formats valuation growth and the sector list", () => {
    expect(
      formatValuationGrowth([
        { company: "Flipkart", entryValuation: 1, currentValuation: 37.6, growthPercent: 3660 },
      ]),
    ).toBe("**Highest Valuation Growth:**\n1. Flipkart - $1B → $37.6B (3660%)");
    expect(
      formatSectorList([
        { sector: "Fintech", subsectors: ["Payments", "Credit"] },
        { sector: "SaaS", subsectors: [] },
      ]),
    ).toBe("**Sectors:**\n- Fintech: Payments, Credit\n- SaaS");
  });
});
