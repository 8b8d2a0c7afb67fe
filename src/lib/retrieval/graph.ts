import type { GraphRecord, GraphStore } from "@/lib/neo4j/client";

export type CompanySearchRow = {
  company: string;
  valuation: number | null;
  sector: string | null;
  locations: string[];
};

export type CompanyDetails = {
  company: string;
  valuation: number | null;
  entryValuation: number | null;
  entryDate: string | null;
  rank: number | null;
  sector: string | null;
  subsector: string | null;
  locations: string[];
  investors: string[];
};

export type RankedCompanyRow = {
  company: string;
  valuation: number | null;
  sector: string | null;
};

export type ValuationGrowthRow = {
  company: string;
  entryValuation: number | null;
  currentValuation: number | null;
  growthPercent: number | null;
};

export type PortfolioRow = {
  investor: string;
  company: string;
  valuation: number | null;
  sector: string | null;
};

export type TopInvestorRow = {
  investor: string;
  investments: number;
  portfolioValue: number | null;
};

export type CoInvestorRow = {
  coInvestor: string;
  sharedInvestments: number;
  sampleCompanies: string[];
};

export type SectorCompanyRow = {
  company: string;
  valuation: number | null;
  subsector: string | null;
};

export type SectorStatsRow = {
  sector: string;
  companyCount: number;
  totalValuation: number | null;
  avgValuation: number | null;
};

export type SectorListRow = {
  sector: string;
  subsectors: string[];
};

export type LocationStatsRow = {
  city: string;
  companyCount: number;
  totalValuation: number | null;
};

export type GraphStats = {
  companies: number;
  investors: number;
  sectors: number;
  locations: number;
  relationships: number;
};

export type SimilarCompanyRow = {
  company: string;
  valuation: number | null;
  similarityScore: number;
};

/**
 * Read-only lookups over the startup graph. Every text match is a case-insensitive
 * substring match; "no match" is an empty list or null, never an error.
 */
export type GraphQueries = {
  searchCompanies(term: string, limit?: number): Promise<CompanySearchRow[]>;
  getCompanyDetails(name: string): Promise<CompanyDetails | null>;
  getTopCompanies(limit?: number): Promise<RankedCompanyRow[]>;
  getCompaniesByValuationGrowth(limit?: number): Promise<ValuationGrowthRow[]>;
  getInvestorPortfolio(name: string, limit?: number): Promise<PortfolioRow[]>;
  getTopInvestors(limit?: number): Promise<TopInvestorRow[]>;
  getCoInvestors(name: string, limit?: number): Promise<CoInvestorRow[]>;
  getSectorCompanies(sector: string, limit?: number): Promise<SectorCompanyRow[]>;
  getSectorStats(): Promise<SectorStatsRow[]>;
  getAllSectors(): Promise<SectorListRow[]>;
  getCityCompanies(city: string, limit?: number): Promise<RankedCompanyRow[]>;
  getLocationStats(): Promise<LocationStatsRow[]>;
  getGraphStats(): Promise<GraphStats | null>;
  findSimilarCompanies(name: string, limit?: number): Promise<SimilarCompanyRow[]>;
};

export const MAX_LIMIT = 100;

export function clampInt(n: number, min: number, max: number) {
  if (!Number.isFinite(n)) return min;
  return Math.max(min, Math.min(max, Math.floor(n)));
}

function limitParam(limit: number | undefined, fallback: number): number {
  return clampInt(limit ?? fallback, 1, MAX_LIMIT);
}

function text(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  return null;
}

function num(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return Number(value);
  return null;
}

function textList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const v of value) {
    const s = text(v);
    if (s !== null) out.push(s);
  }
  return out;
}

// Neo4j sorts nulls first under DESC; `x IS NULL` ascending pushes them last instead.
const BY_VALUATION = "valuation IS NULL, valuation DESC";

const Q = {
  searchCompanies: `
    MATCH (c:Company)
    WHERE toLower(c.name) CONTAINS toLower($term)
    OPTIONAL MATCH (c)-[:OPERATES_IN]->(s:Sector)
    OPTIONAL MATCH (c)-[:LOCATED_IN]->(l:Location)
    WITH c, collect(DISTINCT s.name) AS sectors, collect(DISTINCT l.city) AS locations
    RETURN c.name AS company,
           c.currentValuation AS valuation,
           head(sectors) AS sector,
           locations
    ORDER BY ${BY_VALUATION}, company
    LIMIT toInteger($limit)`,

  getCompanyDetails: `
    MATCH (c:Company)
    WHERE toLower(c.name) CONTAINS toLower($name)
    OPTIONAL MATCH (c)-[:OPERATES_IN]->(s:Sector)
    OPTIONAL MATCH (c)-[:SPECIALIZES_IN]->(ss:SubSector)
    OPTIONAL MATCH (c)-[:LOCATED_IN]->(l:Location)
    OPTIONAL MATCH (i:Investor)-[:INVESTED_IN]->(c)
    WITH c,
         collect(DISTINCT s.name) AS sectors,
         collect(DISTINCT ss.name) AS subsectors,
         collect(DISTINCT l.city) AS locations,
         collect(DISTINCT i.name) AS investors
    RETURN c.name AS company,
           c.currentValuation AS valuation,
           c.entryValuation AS entryValuation,
           c.entryDate AS entryDate,
           c.rank AS rank,
           head(sectors) AS sector,
           head(subsectors) AS subsector,
           locations,
           investors
    ORDER BY ${BY_VALUATION}, company
    LIMIT 1`,

  getTopCompanies: `
    MATCH (c:Company)
    WHERE c.currentValuation IS NOT NULL
    OPTIONAL MATCH (c)-[:OPERATES_IN]->(s:Sector)
    WITH c, collect(DISTINCT s.name) AS sectors
    RETURN c.name AS company,
           c.currentValuation AS valuation,
           head(sectors) AS sector
    ORDER BY valuation DESC, company
    LIMIT toInteger($limit)`,

  getCompaniesByValuationGrowth: `
    MATCH (c:Company)
    WHERE c.entryValuation IS NOT NULL AND c.entryValuation > 0 AND c.currentValuation IS NOT NULL
    RETURN c.name AS company,
           c.entryValuation AS entryValuation,
           c.currentValuation AS currentValuation,
           round((c.currentValuation / c.entryValuation - 1) * 100) AS growthPercent
    ORDER BY growthPercent DESC, company
    LIMIT toInteger($limit)`,

  getInvestorPortfolio: `
    MATCH (i:Investor)-[:INVESTED_IN]->(c:Company)
    WHERE toLower(i.name) CONTAINS toLower($name)
    OPTIONAL MATCH (c)-[:OPERATES_IN]->(s:Sector)
    WITH i, c, collect(DISTINCT s.name) AS sectors
    RETURN i.name AS investor,
           c.name AS company,
           c.currentValuation AS valuation,
           head(sectors) AS sector
    ORDER BY ${BY_VALUATION}, company
    LIMIT toInteger($limit)`,

  getTopInvestors: `
    MATCH (i:Investor)-[:INVESTED_IN]->(c:Company)
    RETURN i.name AS investor,
           count(DISTINCT c) AS investments,
           round(sum(c.currentValuation) * 10) / 10 AS portfolioValue
    ORDER BY investments DESC, investor
    LIMIT toInteger($limit)`,

  getCoInvestors: `
    MATCH (i1:Investor)-[:INVESTED_IN]->(c:Company)<-[:INVESTED_IN]-(i2:Investor)
    WHERE toLower(i1.name) CONTAINS toLower($name) AND i1 <> i2
    WITH i2, collect(DISTINCT c.name) AS shared
    RETURN i2.name AS coInvestor,
           size(shared) AS sharedInvestments,
           shared[0..5] AS sampleCompanies
    ORDER BY sharedInvestments DESC, coInvestor
    LIMIT toInteger($limit)`,

  getSectorCompanies: `
    MATCH (c:Company)-[:OPERATES_IN]->(s:Sector)
    WHERE toLower(s.name) CONTAINS toLower($sector)
    OPTIONAL MATCH (c)-[:SPECIALIZES_IN]->(ss:SubSector)
    WITH c, collect(DISTINCT ss.name) AS subsectors
    RETURN c.name AS company,
           c.currentValuation AS valuation,
           head(subsectors) AS subsector
    ORDER BY ${BY_VALUATION}, company
    LIMIT toInteger($limit)`,

  getSectorStats: `
    MATCH (c:Company)-[:OPERATES_IN]->(s:Sector)
    WHERE c.currentValuation IS NOT NULL
    RETURN s.name AS sector,
           count(DISTINCT c) AS companyCount,
           round(sum(c.currentValuation) * 10) / 10 AS totalValuation,
           round(avg(c.currentValuation) * 10) / 10 AS avgValuation
    ORDER BY totalValuation DESC, sector`,

  getAllSectors: `
    MATCH (s:Sector)
    OPTIONAL MATCH (s)-[:HAS_SUBSECTOR]->(ss:SubSector)
    WITH s, collect(DISTINCT ss.name) AS subsectors
    RETURN s.name AS sector, subsectors
    ORDER BY sector`,

  getCityCompanies: `
    MATCH (c:Company)-[:LOCATED_IN]->(l:Location)
    WHERE toLower(l.city) CONTAINS toLower($city)
    OPTIONAL MATCH (c)-[:OPERATES_IN]->(s:Sector)
    WITH c, collect(DISTINCT s.name) AS sectors
    RETURN c.name AS company,
           c.currentValuation AS valuation,
           head(sectors) AS sector
    ORDER BY ${BY_VALUATION}, company
    LIMIT toInteger($limit)`,

  getLocationStats: `
    MATCH (c:Company)-[:LOCATED_IN]->(l:Location)
    WHERE c.currentValuation IS NOT NULL
    RETURN l.city AS city,
           count(DISTINCT c) AS companyCount,
           round(sum(c.currentValuation) * 10) / 10 AS totalValuation
    ORDER BY totalValuation DESC, city`,

  // COUNT {} subqueries always yield one row, even when a label has no nodes.
  getGraphStats: `
    RETURN COUNT { (:Company) } AS companies,
           COUNT { (:Investor) } AS investors,
           COUNT { (:Sector) } AS sectors,
           COUNT { (:Location) } AS locations,
           COUNT { ()-[]->() } AS relationships`,

  findSimilarCompanies: `
    MATCH (target:Company)
    WHERE toLower(target.name) CONTAINS toLower($name)
    WITH target
    ORDER BY target.currentValuation IS NULL, target.currentValuation DESC
    LIMIT 1
    OPTIONAL MATCH (target)-[:OPERATES_IN]->(s:Sector)
    WITH target, collect(DISTINCT s) AS sectors
    OPTIONAL MATCH (target)-[:LOCATED_IN]->(l:Location)
    WITH target, sectors, collect(DISTINCT l) AS locations
    OPTIONAL MATCH (i:Investor)-[:INVESTED_IN]->(target)
    WITH target, sectors, locations, collect(DISTINCT i) AS investors
    MATCH (similar:Company)
    WHERE similar <> target
    WITH similar,
         size([x IN sectors WHERE (similar)-[:OPERATES_IN]->(x)]) +
         size([x IN locations WHERE (similar)-[:LOCATED_IN]->(x)]) +
         size([x IN investors WHERE (x)-[:INVESTED_IN]->(similar)]) AS score
    WHERE score > 0
    RETURN similar.name AS company,
           similar.currentValuation AS valuation,
           score AS similarityScore
    ORDER BY similarityScore DESC, ${BY_VALUATION}, company
    LIMIT toInteger($limit)`,
} as const;

export const GRAPH_QUERIES: Readonly<Record<keyof GraphQueries, string>> = Q;

function mapRows<T>(rows: GraphRecord[], map: (row: GraphRecord) => T | null): T[] {
  const out: T[] = [];
  for (const row of rows) {
    const mapped = map(row);
    if (mapped !== null) out.push(mapped);
  }
  return out;
}

function rankedCompany(r: GraphRecord): RankedCompanyRow | null {
  const company = text(r["company"]);
  if (company === null) return null;
  return { company, valuation: num(r["valuation"]), sector: text(r["sector"]) };
}

function companyDetails(r: GraphRecord): CompanyDetails | null {
  const company = text(r["company"]);
  if (company === null) return null;
  return {
    company,
    valuation: num(r["valuation"]),
    entryValuation: num(r["entryValuation"]),
    entryDate: text(r["entryDate"]),
    rank: num(r["rank"]),
    sector: text(r["sector"]),
    subsector: text(r["subsector"]),
    locations: textList(r["locations"]),
    investors: textList(r["investors"]),
  };
}

export function createGraphQueries(store: GraphStore): GraphQueries {
  return {
    async searchCompanies(term, limit) {
      const rows = await store.run(Q.searchCompanies, { term, limit: limitParam(limit, 10) });
      return mapRows(rows, (r) => {
        const base = rankedCompany(r);
        return base && { ...base, locations: textList(r["locations"]) };
      });
    },

    async getCompanyDetails(name) {
      const rows = await store.run(Q.getCompanyDetails, { name });
      return mapRows(rows, companyDetails)[0] ?? null;
    },

    async getTopCompanies(limit) {
      const rows = await store.run(Q.getTopCompanies, { limit: limitParam(limit, 10) });
      return mapRows(rows, rankedCompany);
    },

    async getCompaniesByValuationGrowth(limit) {
      const rows = await store.run(Q.getCompaniesByValuationGrowth, {
        limit: limitParam(limit, 10),
      });
      return mapRows(rows, (r) => {
        const company = text(r["company"]);
        if (company === null) return null;
        return {
          company,
          entryValuation: num(r["entryValuation"]),
          currentValuation: num(r["currentValuation"]),
          growthPercent: num(r["growthPercent"]),
        };
      });
    },

    async getInvestorPortfolio(name, limit) {
      const rows = await store.run(Q.getInvestorPortfolio, {
        name,
        limit: limitParam(limit, 20),
      });
      return mapRows(rows, (r) => {
        const investor = text(r["investor"]);
        const base = rankedCompany(r);
        if (investor === null || base === null) return null;
        return { investor, ...base };
      });
    },

    async getTopInvestors(limit) {
      const rows = await store.run(Q.getTopInvestors, { limit: limitParam(limit, 10) });
      return mapRows(rows, (r) => {
        const investor = text(r["investor"]);
        if (investor === null) return null;
        return {
          investor,
          investments: num(r["investments"]) ?? 0,
          portfolioValue: num(r["portfolioValue"]),
        };
      });
    },

    async getCoInvestors(name, limit) {
      const rows = await store.run(Q.getCoInvestors, { name, limit: limitParam(limit, 10) });
      return mapRows(rows, (r) => {
        const coInvestor = text(r["coInvestor"]);
        if (coInvestor === null) return null;
        return {
          coInvestor,
          sharedInvestments: num(r["sharedInvestments"]) ?? 0,
          sampleCompanies: textList(r["sampleCompanies"]),
        };
      });
    },

    async getSectorCompanies(sector, limit) {
      const rows = await store.run(Q.getSectorCompanies, {
        sector,
        limit: limitParam(limit, 15),
      });
      return mapRows(rows, (r) => {
        const company = text(r["company"]);
        if (company === null) return null;
        return { company, valuation: num(r["valuation"]), subsector: text(r["subsector"]) };
      });
    },

    async getSectorStats() {
      const rows = await store.run(Q.getSectorStats);
      return mapRows(rows, (r) => {
        const sector = text(r["sector"]);
        if (sector === null) return null;
        return {
          sector,
          companyCount: num(r["companyCount"]) ?? 0,
          totalValuation: num(r["totalValuation"]),
          avgValuation: num(r["avgValuation"]),
        };
      });
    },

    async getAllSectors() {
      const rows = await store.run(Q.getAllSectors);
      return mapRows(rows, (r) => {
        const sector = text(r["sector"]);
        if (sector === null) return null;
        return { sector, subsectors: textList(r["subsectors"]) };
      });
    },

    async getCityCompanies(city, limit) {
      const rows = await store.run(Q.getCityCompanies, { city, limit: limitParam(limit, 15) });
      return mapRows(rows, rankedCompany);
    },

    async getLocationStats() {
      const rows = await store.run(Q.getLocationStats);
      return mapRows(rows, (r) => {
        const city = text(r["city"]);
        if (city === null) return null;
        return {
          city,
          companyCount: num(r["companyCount"]) ?? 0,
          totalValuation: num(r["totalValuation"]),
        };
      });
    },

    async getGraphStats() {
      const rows = await store.run(Q.getGraphStats);
      const r = rows[0];
      if (!r) return null;
      return {
        companies: num(r["companies"]) ?? 0,
        investors: num(r["investors"]) ?? 0,
        sectors: num(r["sectors"]) ?? 0,
        locations: num(r["locations"]) ?? 0,
        relationships: num(r["relationships"]) ?? 0,
      };
    },

    async findSimilarCompanies(name, limit) {
      const rows = await store.run(Q.findSimilarCompanies, {
        name,
        limit: limitParam(limit, 5),
      });
      return mapRows(rows, (r) => {
        const company = text(r["company"]);
        if (company === null) return null;
        return {
          company,
          valuation: num(r["valuation"]),
          similarityScore: num(r["similarityScore"]) ?? 0,
        };
      });
    },
  };
}
