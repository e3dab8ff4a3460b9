import { loadConfig, loadFootballDataConfig } from "./config.js";
import { createCatalogCache } from "./catalog.js";
import { readJsonl, LOOKUPS_FILE } from "./data.js";
import { errorMessage } from "./errors.js";
import { createFootballDataClient } from "./football-data.js";
import { formatMatch, formatTeam } from "./format.js";
import { logError, logInfo, logLookup } from "./logger.js";
import { createCompetitionLookup } from "./lookup.js";
import { createClaudeCapability, resolveCompetition } from "./resolver.js";
import type { Config, FootballDataConfig, LookupRecord } from "./types.js";

function createGateway(config: FootballDataConfig) {
  return createFootballDataClient({
    apiToken: config.apiAccessToken,
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
  });
}

function createServices(config: Config) {
  const gateway = createGateway(config);
  const catalog = createCatalogCache(() =>
    gateway.listCompetitions({ areas: config.competitionAreas, plan: config.competitionPlan }),
  );
  const capability = createClaudeCapability(config);
  const lookup = createCompetitionLookup({
    gateway,
    catalog,
    resolve: (query, snapshot) => resolveCompetition(query, snapshot, capability),
  });
  return { lookup };
}

function parseId(raw: string | undefined, label: string): number {
  const n = raw === undefined ? NaN : parseInt(raw, 10);
  if (isNaN(n)) {
    throw new Error(`${label} must be a number, got ${raw ?? "nothing"}`);
  }
  return n;
}

async function runLookup(args: string[]) {
  const query = args.join(" ").trim();
  if (!query) {
    throw new Error("Usage: lookup <competition name>");
  }

  const config = loadConfig();
  logInfo(`Model: ${config.claudeModel}`);
  const { lookup } = createServices(config);

  const record: LookupRecord = {
    timestamp: new Date().toISOString(),
    query,
    candidates: [],
    matched: [],
    failures: [],
    notFound: false,
  };

  try {
    const outcome = await lookup.lookupDetailed(query);
    record.candidates = outcome.candidates;
    record.matched = outcome.competitions.map((c) => c.name);
    record.failures = outcome.failures;
    record.notFound = outcome.notFound;
    process.stdout.write(outcome.text);
  } catch (err) {
    record.error = errorMessage(err);
    throw err;
  } finally {
    logLookup(record);
  }
}

async function runCompetitions() {
  const { lookup } = createServices(loadConfig());
  const names = await lookup.supportedCompetitions();
  console.log(`\n=== Supported Competitions (${names.length}) ===\n`);
  for (const name of names) console.log(`  ${name}`);
  console.log("");
}

async function runTeams(args: string[]) {
  const competitionId = parseId(args[0], "competitionId");
  const season = args[1] !== undefined ? parseId(args[1], "season") : undefined;
  const gateway = createGateway(loadFootballDataConfig());
  const teams = await gateway.getTeams(competitionId, { season });
  console.log(`\n=== Teams (${teams.length}) ===\n`);
  for (const team of teams) console.log(formatTeam(team));
  console.log("");
}

async function runMatches(args: string[]) {
  const competitionId = parseId(args[0], "competitionId");
  const gateway = createGateway(loadFootballDataConfig());
  const matches = await gateway.getMatches({ competitionId, dateFrom: args[1], dateTo: args[2] });
  console.log(`\n=== Matches (${matches.length}) ===\n`);
  for (const match of matches) console.log(formatMatch(match));
  console.log("");
}

function runHistory() {
  const records = readJsonl<LookupRecord>(LOOKUPS_FILE);

  if (records.length === 0) {
    logInfo("No lookups recorded yet.");
    return;
  }

  console.log(`\n=== Recent Lookups (${Math.min(records.length, 20)} of ${records.length}) ===\n`);
  for (const r of records.slice(-20)) {
    const result = r.error
      ? `error: ${r.error}`
      : r.notFound
        ? "not found"
        : r.matched.join(", ");
    console.log(`  ${r.timestamp.slice(0, 19)}  "${r.query}" → ${result}`);
  }
  console.log("");
}

function fatal(err: unknown): never {
  logError(errorMessage(err));
  process.exit(1);
}

const [command = "lookup", ...args] = process.argv.slice(2);

switch (command) {
  case "lookup":
    runLookup(args).catch(fatal);
    break;
  case "competitions":
    runCompetitions().catch(fatal);
    break;
  case "teams":
    runTeams(args).catch(fatal);
    break;
  case "matches":
    runMatches(args).catch(fatal);
    break;
  case "history":
    runHistory();
    break;
  default:
    logError(`Unknown command: ${command}. Use: lookup, competitions, teams, matches, history`);
    process.exit(1);
}
