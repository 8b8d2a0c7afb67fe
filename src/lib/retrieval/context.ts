import { extractEntities, type ExtractedEntities } from "./entities";
import {
  formatCityCompanies,
  formatCoInvestors,
  formatCompanyDetails,
  formatGraphStats,
  formatInvestorPortfolio,
  formatLocationStats,
  formatSectorCompanies,
  formatSectorStats,
  formatTopCompanies,
  formatTopInvestors,
} from "./format";
import { clampInt, type GraphQueries } from "./graph";
import { classifyIntent, type Intent } from "./intent";

/**
 * One labeled unit of retrieved text. `found` is what the block adds to the
 * entities-found tally: 1 for a matched single-record lookup, the row count for a list.
 */
export type ContextBlock = {
  source: string;
  text: string;
  found: number;
};

export type RetrievalResult = {
  intent: Intent;
  entities: ExtractedEntities;
  context: string;
  entitiesFound: number;
  retrievalMs: number;
  sources: string[];
};

export type ContextPlan = (
  queries: GraphQueries,
  entities: ExtractedEntities,
) => Promise<ContextBlock[]>;

export const BLOCK_SEPARATOR = "\n\n";
export const DEFAULT_MAX_CONTEXT_CHARS = 8000;

async function companyDetailBlocks(
  queries: GraphQueries,
  names: string[],
): Promise<ContextBlock[]> {
  const blocks: ContextBlock[] = [];
  for (const name of names) {
    const details = await queries.getCompanyDetails(name);
    if (details) {
      blocks.push({
        source: `company:${details.company}`,
        text: formatCompanyDetails(details),
        found: 1,
      });
    }
  }
  return blocks;
}

async function sectorBlocks(
  queries: GraphQueries,
  sectors: string[],
  limit: number,
): Promise<ContextBlock[]> {
  const blocks: ContextBlock[] = [];
  for (const sector of sectors) {
    const rows = await queries.getSectorCompanies(sector, limit);
    if (rows.length) {
      blocks.push({
        source: `sector:${sector}`,
        text: formatSectorCompanies(sector, rows),
        found: rows.length,
      });
    }
  }
  return blocks;
}

async function cityBlocks(
  queries: GraphQueries,
  cities: string[],
  limit: number,
): Promise<ContextBlock[]> {
  const blocks: ContextBlock[] = [];
  for (const city of cities) {
    const rows = await queries.getCityCompanies(city, limit);
    if (rows.length) {
      blocks.push({
        source: `city:${city}`,
        text: formatCityCompanies(city, rows),
        found: rows.length,
      });
    }
  }
  return blocks;
}

async function portfolioBlocks(
  queries: GraphQueries,
  investors: string[],
  limit: number,
  withCoInvestors: boolean,
): Promise<ContextBlock[]> {
  const blocks: ContextBlock[] = [];
  for (const investor of investors) {
    const portfolio = await queries.getInvestorPortfolio(investor, limit);
    if (!portfolio.length) continue;
    blocks.push({
      source: `investor:${investor}`,
      text: formatInvestorPortfolio(portfolio),
      found: portfolio.length,
    });

    if (!withCoInvestors) continue;
    const coInvestors = await queries.getCoInvestors(investor, 5);
    if (coInvestors.length) {
      blocks.push({
        source: `co_investors:${investor}`,
        text: formatCoInvestors(investor, coInvestors),
        found: 0,
      });
    }
  }
  return blocks;
}

async function topCompaniesBlock(queries: GraphQueries, limit: number): Promise<ContextBlock[]> {
  const rows = await queries.getTopCompanies(limit);
  return rows.length
    ? [{ source: "top_companies", text: formatTopCompanies(rows), found: rows.length }]
    : [];
}

async function topInvestorsBlock(queries: GraphQueries, limit: number): Promise<ContextBlock[]> {
  const rows = await queries.getTopInvestors(limit);
  return rows.length
    ? [{ source: "top_investors", text: formatTopInvestors(rows), found: rows.length }]
    : [];
}

async function graphStatsBlock(queries: GraphQueries): Promise<ContextBlock[]> {
  const stats = await queries.getGraphStats();
  return stats ? [{ source: "graph_stats", text: formatGraphStats(stats), found: 1 }] : [];
}

async function sectorStatsBlock(queries: GraphQueries): Promise<ContextBlock[]> {
  const rows = await queries.getSectorStats();
  return rows.length
    ? [{ source: "sector_stats", text: formatSectorStats(rows), found: rows.length }]
    : [];
}

async function locationStatsBlock(queries: GraphQueries): Promise<ContextBlock[]> {
  const rows = (await queries.getLocationStats()).slice(0, 10);
  return rows.length
    ? [{ source: "location_stats", text: formatLocationStats(rows), found: rows.length }]
    : [];
}

// Lookups within a plan run one after another, in table order.
async function sequence(steps: Array<() => Promise<ContextBlock[]>>): Promise<ContextBlock[]> {
  const blocks: ContextBlock[] = [];
  for (const step of steps) {
    blocks.push(...(await step()));
  }
  return blocks;
}

export const CONTEXT_PLANS: Readonly<Record<Intent, ContextPlan>> = {
  comparison: (q, e) =>
    sequence([
      () => companyDetailBlocks(q, e.companies.slice(0, 5)),
      () => sectorBlocks(q, e.sectors.slice(0, 3), 5),
      () => cityBlocks(q, e.locations.slice(0, 3), 5),
    ]),

  top_ranking: (q, e) =>
    sequence([
      () => topCompaniesBlock(q, 10),
      () => topInvestorsBlock(q, 10),
      () => sectorBlocks(q, e.sectors.slice(0, 2), 5),
    ]),

  aggregation: (q) =>
    sequence([() => graphStatsBlock(q), () => sectorStatsBlock(q), () => locationStatsBlock(q)]),

  investor_info: (q, e) =>
    e.investors.length
      ? portfolioBlocks(q, e.investors.slice(0, 3), 10, true)
      : topInvestorsBlock(q, 10),

  sector_info: (q, e) =>
    sequence([() => sectorBlocks(q, e.sectors.slice(0, 3), 10), () => sectorStatsBlock(q)]),

  location_info: (q, e) =>
    sequence([() => cityBlocks(q, e.locations.slice(0, 3), 10), () => locationStatsBlock(q)]),

  company_info: (q, e) =>
    sequence([
      () => companyDetailBlocks(q, e.companies.slice(0, 3)),
      () => portfolioBlocks(q, e.investors, 5, false),
    ]),

  general: (q) => sequence([() => graphStatsBlock(q), () => topCompaniesBlock(q, 5)]),
};

// Never ends on the high half of a surrogate pair.
function cutToLength(text: string, max: number): string {
  if (text.length <= max) return text;
  const last = text.charCodeAt(max - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
  return text.slice(0, end);
}

/**
 * Keeps the longest prefix of blocks that fits in `maxChars` once joined. The first block is
 * always kept, cut down to the cap if it is longer on its own. Caps below 1 count as 1.
 */
export function fitBlocks(blocks: ContextBlock[], maxChars: number): ContextBlock[] {
  const cap = clampInt(maxChars, 1, Number.MAX_SAFE_INTEGER);
  const kept: ContextBlock[] = [];
  let used = 0;
  for (const block of blocks) {
    if (kept.length === 0) {
      const text = cutToLength(block.text, cap);
      kept.push({ ...block, text });
      used = text.length;
      continue;
    }
    const cost = BLOCK_SEPARATOR.length + block.text.length;
    if (used + cost > cap) break;
    kept.push(block);
    used += cost;
  }
  return kept;
}

export type ContextBuilder = {
  buildContext(query: string): Promise<RetrievalResult>;
};

export function createContextBuilder(opts: {
  queries: GraphQueries;
  maxContextChars?: number;
  plans?: Readonly<Record<Intent, ContextPlan>>;
  now?: () => number;
}): ContextBuilder {
  const { queries } = opts;
  const plans = opts.plans ?? CONTEXT_PLANS;
  const maxChars = clampInt(opts.maxContextChars ?? DEFAULT_MAX_CONTEXT_CHARS, 1, Number.MAX_SAFE_INTEGER);
  const now = opts.now ?? (() => performance.now());

  return {
    async buildContext(query) {
      const start = now();
      const entities = extractEntities(query);
      const intent = classifyIntent(entities);

      let blocks = await plans[intent](queries, entities);
      if (blocks.length === 0 && intent !== "general") {
        blocks = await plans.general(queries, entities);
      }

      const kept = fitBlocks(blocks, maxChars);
      return {
        intent,
        entities,
        context: kept.map((b) => b.text).join(BLOCK_SEPARATOR),
        entitiesFound: kept.reduce((sum, b) => sum + b.found, 0),
        retrievalMs: now() - start,
        sources: kept.map((b) => b.source),
      };
    },
  };
}
