import type {
  CoInvestorRow,
  CompanyDetails,
  GraphStats,
  LocationStatsRow,
  PortfolioRow,
  RankedCompanyRow,
  SectorCompanyRow,
  SectorListRow,
  SectorStatsRow,
  SimilarCompanyRow,
  TopInvestorRow,
  ValuationGrowthRow,
} from "./graph";

const NA = "N/A";
const MAX_INVESTORS_SHOWN = 7;
const MAX_STATS_ROWS = 8;

/** `37.6` → `$37.6B`; valuations are stored in billions of USD. */
export function formatBillions(value: number | null): string {
  return value === null ? NA : `$${value}B`;
}

function orNA(value: string | number | null): string {
  return value === null || value === "" ? NA : String(value);
}

function joinOrNA(values: string[]): string {
  return values.length ? values.join(", ") : NA;
}

export function formatCompanyDetails(d: CompanyDetails): string {
  const shown = d.investors.slice(0, MAX_INVESTORS_SHOWN);
  let investors = joinOrNA(shown);
  if (d.investors.length > MAX_INVESTORS_SHOWN) {
    investors += ` (+${d.investors.length - MAX_INVESTORS_SHOWN} more)`;
  }

  const sector = d.subsector ? `${orNA(d.sector)} (${d.subsector})` : orNA(d.sector);
  const lines = [
    `**Company: ${d.company}**`,
    `- Sector: ${sector}`,
    `- Current Valuation: ${formatBillions(d.valuation)}`,
    `- Entry Valuation: ${formatBillions(d.entryValuation)}`,
    `- Entry Date: ${orNA(d.entryDate)}`,
  ];
  if (d.rank !== null) lines.push(`- Rank: ${d.rank}`);
  lines.push(`- Locations: ${joinOrNA(d.locations)}`, `- Key Investors: ${investors}`);
  return lines.join("\n");
}

export function formatInvestorPortfolio(portfolio: PortfolioRow[]): string {
  const investor = portfolio[0]?.investor ?? "Unknown";
  const companies = portfolio.map(
    (p) => `${p.company} (${formatBillions(p.valuation)} - ${orNA(p.sector)})`,
  );
  return [
    `**Investor: ${investor}**`,
    `- Portfolio (${portfolio.length} companies): ${companies.join(", ")}`,
  ].join("\n");
}

export function formatCoInvestors(investor: string, coInvestors: CoInvestorRow[]): string {
  const lines = [`**Co-investors of ${investor}:**`];
  for (const ci of coInvestors) {
    lines.push(`- ${ci.coInvestor}: ${ci.sharedInvestments} shared investments`);
  }
  return lines.join("\n");
}

export function formatSectorCompanies(sector: string, companies: SectorCompanyRow[]): string {
  const items = companies.map((c) => `${c.company} (${formatBillions(c.valuation)})`);
  return `**${sector} Sector Companies:**\n${items.join(", ")}`;
}

export function formatCityCompanies(city: string, companies: RankedCompanyRow[]): string {
  const items = companies.map(
    (c) => `${c.company} (${orNA(c.sector)}, ${formatBillions(c.valuation)})`,
  );
  return `**Companies in ${city}:**\n${items.join(", ")}`;
}

export function formatTopCompanies(companies: RankedCompanyRow[]): string {
  const lines = ["**Top Unicorns by Valuation:**"];
  companies.forEach((c, i) => {
    lines.push(`${i + 1}. ${c.company} - ${formatBillions(c.valuation)} (${orNA(c.sector)})`);
  });
  return lines.join("\n");
}

export function formatTopInvestors(investors: TopInvestorRow[]): string {
  const lines = ["**Most Active Investors:**"];
  investors.forEach((inv, i) => {
    lines.push(
      `${i + 1}. ${inv.investor} - ${inv.investments} investments (${formatBillions(inv.portfolioValue)} total)`,
    );
  });
  return lines.join("\n");
}

export function formatSectorStats(stats: SectorStatsRow[]): string {
  const lines = ["**Sector Statistics:**"];
  for (const s of stats.slice(0, MAX_STATS_ROWS)) {
    lines.push(`- ${s.sector}: ${s.companyCount} companies, ${formatBillions(s.totalValuation)} total`);
  }
  return lines.join("\n");
}

export function formatLocationStats(stats: LocationStatsRow[]): string {
  const lines = ["**Location Statistics:**"];
  for (const s of stats.slice(0, MAX_STATS_ROWS)) {
    lines.push(`- ${s.city}: ${s.companyCount} companies, ${formatBillions(s.totalValuation)} total`);
  }
  return lines.join("\n");
}

export function formatGraphStats(stats: GraphStats): string {
  return [
    "**Startup Knowledge Graph:**",
    `- Total Companies: ${stats.companies}`,
    `- Total Investors: ${stats.investors}`,
    `- Sectors: ${stats.sectors}`,
    `- Locations: ${stats.locations}`,
    `- Total Relationships: ${stats.relationships}`,
  ].join("\n");
}

export function formatSimilarCompanies(company: string, rows: SimilarCompanyRow[]): string {
  const lines = [`**Companies similar to ${company}:**`];
  rows.forEach((r, i) => {
    lines.push(`${i + 1}. ${r.company} - ${formatBillions(r.valuation)} (score ${r.similarityScore})`);
  });
  return lines.join("\n");
}

export function formatValuationGrowth(rows: ValuationGrowthRow[]): string {
  const lines = ["**Highest Valuation Growth:**"];
  rows.forEach((r, i) => {
    const growth = r.growthPercent === null ? NA : `${r.growthPercent}%`;
    lines.push(
      `${i + 1}. ${r.company} - ${formatBillions(r.entryValuation)} → ${formatBillions(r.currentValuation)} (${growth})`,
    );
  });
  return lines.join("\n");
}

export function formatSectorList(rows: SectorListRow[]): string {
  const lines = ["**Sectors:**"];
  for (const r of rows) {
    lines.push(r.subsectors.length ? `- ${r.sector}: ${r.subsectors.join(", ")}` : `- ${r.sector}`);
  }
  return lines.join("\n");
}
