// Startup knowledge-graph Q&A from the terminal.
//
// Usage (from the repository root, which holds .env and tsconfig paths):
//   npm start -- ask "Tell me about Flipkart" [--context] [--timing]
//   npm start -- chat                 # interactive session
//   npm start -- health               # Neo4j + generation connectivity
//   npm start -- search <term>        # company name search
//   npm start -- similar <company>    # companies sharing sectors, cities or investors
//   npm start -- growth               # highest valuation growth
//   npm start -- sectors              # sectors and their subsectors

import { config as loadEnv } from "dotenv";

import {
  answerQuestion,
  checkConnectivity,
  createHealthGate,
  type QueryResponse,
} from "@/lib/chat/answer";
import { runChatLoop } from "@/lib/chat/repl";
import { loadConfig, type AppConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import {
  formatSectorList,
  formatSimilarCompanies,
  formatValuationGrowth,
} from "@/lib/retrieval/format";
import { createServices, type AppServices } from "@/lib/services";

loadEnv({ path: ".env.local" });
loadEnv({ path: ".env" });

const isTTY = process.stdout.isTTY ?? false;
const ansi = {
  reset: isTTY ? "\x1b[0m" : "",
  bold: isTTY ? "\x1b[1m" : "",
  dim: isTTY ? "\x1b[2m" : "",
  green: isTTY ? "\x1b[32m" : "",
  red: isTTY ? "\x1b[31m" : "",
  cyan: isTTY ? "\x1b[36m" : "",
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const args = process.argv.slice(2);
const command = args[0]?.toLowerCase();
const flags = new Set(args.filter((a) => a.startsWith("--")));
const positional = args.slice(1).filter((a) => !a.startsWith("--"));

function requireArg(name: string): string {
  const value = positional.join(" ").trim();
  if (!value) {
    throw new Error(`<${name}> is required for "${command}"`);
  }
  return value;
}

function printResponse(res: QueryResponse, config: AppConfig, opts: { context: boolean; timing: boolean }) {
  console.log(`\n${res.ok ? res.answer : c("red", res.answer)}\n`);

  if (opts.context && res.context) {
    console.log(c("dim", "── Retrieved context ──"));
    console.log(c("dim", res.context) + "\n");
  }
  if (opts.timing) {
    const kg = (res.timing.retrievalMs / 1000).toFixed(2);
    const llm = (res.timing.generationMs / 1000).toFixed(2);
    console.log(c("dim", `KG: ${kg}s | LLM: ${llm}s | Entities: ${res.entitiesFound}`));
  }
  if (config.debug) {
    console.error(`[cli] intent=${res.intent ?? "-"} sources=${res.sources.join(",") || "-"}`);
  }
}

async function handleAsk(services: AppServices, config: AppConfig): Promise<boolean> {
  const question = requireArg("question");
  const res = await answerQuestion(services, question);
  printResponse(res, config, { context: flags.has("--context"), timing: flags.has("--timing") });
  return res.ok;
}

async function handleHealth(services: AppServices, config: AppConfig): Promise<boolean> {
  const report = await checkConnectivity(services);
  const { neo4j, generation } = report.services;

  const status = (ok: boolean) => (ok ? c("green", "connected") : c("red", "unavailable"));
  console.log(`\n  ${c("bold", "Neo4j")}        ${status(neo4j.ok)} ${c("dim", `${neo4j.latency_ms}ms`)}`);
  if (neo4j.message) console.log(`    ${c("dim", neo4j.message)}`);
  console.log(
    `  ${c("bold", "Generation")}   ${status(generation.ok)} ${c("dim", `${config.generation.provider}/${config.generation.model}`)}`,
  );
  if (generation.message) console.log(`    ${c("dim", generation.message)}`);

  if (report.stats) {
    const s = report.stats;
    console.log(
      `\n  Companies ${s.companies} | Investors ${s.investors} | Sectors ${s.sectors} | Locations ${s.locations} | Relationships ${s.relationships}`,
    );
  }
  if (services.generation.listModels && report.generation) {
    try {
      const models = await services.generation.listModels();
      console.log(`  Models: ${models.join(", ") || "none pulled"}`);
    } catch (err) {
      console.warn(`[cli] could not list models: ${errorMessage(err)}`);
    }
  }
  console.log("");
  return report.graph && report.generation;
}

async function handleChat(services: AppServices, config: AppConfig): Promise<boolean> {
  const report = await checkConnectivity(services);
  if (!report.graph) console.error(c("red", "Neo4j not connected. Check NEO4J_URI and credentials."));
  if (!report.generation) console.error(c("red", `Generation service (${config.generation.provider}) not reachable.`));

  const gate = createHealthGate(services, report);
  console.log(c("cyan", 'Ask about companies, investors, sectors or cities. Type "exit" to quit.'));
  await runChatLoop({
    input: process.stdin,
    output: process.stdout,
    prompt: c("bold", "\n> "),
    onLine: async (line) => {
      const res = await answerQuestion(services, line, gate);
      printResponse(res, config, { context: flags.has("--context"), timing: true });
    },
  });
  return true;
}

async function handleLookup(services: AppServices): Promise<boolean> {
  const { queries } = services;
  switch (command) {
    case "search": {
      const rows = await queries.searchCompanies(requireArg("term"));
      if (!rows.length) console.log("No companies found.");
      for (const r of rows) {
        const where = r.locations.length ? `, ${r.locations.join("/")}` : "";
        console.log(`- ${r.company} (${r.sector ?? "N/A"}${where}) ${r.valuation ?? "N/A"}`);
      }
      return true;
    }
    case "similar": {
      const name = requireArg("company");
      const rows = await queries.findSimilarCompanies(name);
      console.log(rows.length ? formatSimilarCompanies(name, rows) : `No companies similar to ${name}.`);
      return true;
    }
    case "growth":
      console.log(formatValuationGrowth(await queries.getCompaniesByValuationGrowth()));
      return true;
    case "sectors":
      console.log(formatSectorList(await queries.getAllSectors()));
      return true;
    default:
      return false;
  }
}

function usage() {
  console.log(`
  ${c("bold", "npm start -- <command>")}  questions over the startup knowledge graph

  ask "<question>" [--context] [--timing]
  chat [--context]
  health
  search <term> | similar <company> | growth | sectors
`);
}

async function main(): Promise<number> {
  if (!command || command === "help" || command === "--help") {
    usage();
    return 0;
  }

  const config = loadConfig();
  const services = createServices(config);
  try {
    switch (command) {
      case "ask":
        return (await handleAsk(services, config)) ? 0 : 1;
      case "health":
        return (await handleHealth(services, config)) ? 0 : 1;
      case "chat":
        return (await handleChat(services, config)) ? 0 : 1;
      default:
        if (await handleLookup(services)) return 0;
        console.error(`${c("red", "Unknown command:")} ${command}`);
        usage();
        return 1;
    }
  } finally {
    await services.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`${c("red", "Error:")} ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
