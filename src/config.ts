import "dotenv/config";
import type { CompetitionPlan, Config, FootballDataConfig } from "./types.js";

const PLANS: CompetitionPlan[] = ["TIER_ONE", "TIER_TWO", "TIER_THREE", "TIER_FOUR"];

function requireEnv(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function envInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const n = parseInt(val, 10);
  if (isNaN(n)) throw new Error(`Invalid integer for ${key}: ${val}`);
  return n;
}

function envIntMin(key: string, fallback: number, min: number): number {
  const n = envInt(key, fallback);
  if (n < min) {
    throw new Error(`${key} must be >= ${min}, got ${n}`);
  }
  return n;
}

function envIntList(key: string): number[] | undefined {
  const val = process.env[key];
  if (!val) return undefined;
  return val.split(",").map((part) => {
    const n = parseInt(part.trim(), 10);
    if (isNaN(n)) throw new Error(`Invalid integer in ${key}: ${part.trim()}`);
    return n;
  });
}

function isPlan(value: string): value is CompetitionPlan {
  return PLANS.some((p) => p === value);
}

function envPlan(key: string): CompetitionPlan | undefined {
  const val = process.env[key]?.toUpperCase();
  if (!val) return undefined;
  if (!isPlan(val)) {
    throw new Error(`${key} must be one of ${PLANS.join(", ")}, got ${val}`);
  }
  return val;
}

/** Just the data provider settings, for commands that never call the model. */
export function loadFootballDataConfig(): FootballDataConfig {
  return {
    apiAccessToken: requireEnv("API_ACCESS_TOKEN"),
    apiBaseUrl: process.env.API_BASE_URL || "https://api.football-data.org/v4",
    requestTimeoutMs: envIntMin("REQUEST_TIMEOUT_MS", 30_000, 1),
  };
}

export function loadConfig(): Config {
  return {
    ...loadFootballDataConfig(),
    anthropicApiKey: requireEnv("ANTHROPIC_API_KEY"),
    claudeModel: process.env.CLAUDE_MODEL || "claude-sonnet-4-20250514",
    resolverMaxTokens: envIntMin("RESOLVER_MAX_TOKENS", 256, 1),
    competitionAreas: envIntList("COMPETITION_AREAS"),
    competitionPlan: envPlan("COMPETITION_PLAN"),
  };
}
