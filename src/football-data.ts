import {
  decodeCompetition,
  decodeCompetitionSummary,
  decodeList,
  decodeMatch,
  decodeTeam,
} from "./decode.js";
import { NotFoundError, UpstreamError, errorMessage } from "./errors.js";
import { logInfo } from "./logger.js";
import { sleep } from "./utils.js";
import type {
  Competition,
  CompetitionFilters,
  CompetitionSummary,
  Match,
  MatchFilters,
  Team,
  TeamFilters,
} from "./types.js";

const DEFAULT_TIMEOUT_MS = 30_000;

// Checked in order; the first one carrying a number is used as the pause in seconds
const RETRY_HINT_HEADERS = ["Retry-After", "X-RequestCounter-Reset", "X-Requests-Available"];
const DEFAULT_RETRY_SECONDS = 1;

export interface FootballDataClientOptions {
  apiToken: string;
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface FootballDataClient {
  listCompetitions(filters?: CompetitionFilters): Promise<CompetitionSummary[]>;
  getCompetition(idOrCode: number | string): Promise<Competition>;
  getTeams(competitionId: number, filters?: TeamFilters): Promise<Team[]>;
  getMatches(filters?: MatchFilters): Promise<Match[]>;
}

type Params = Record<string, string | number | undefined>;

export function retryHintSeconds(headers: Headers): number {
  for (const name of RETRY_HINT_HEADERS) {
    const raw = headers.get(name);
    if (raw === null) continue;
    const n = parseInt(raw, 10);
    if (!isNaN(n) && n >= 0) return n;
  }
  return DEFAULT_RETRY_SECONDS;
}

export function createFootballDataClient(options: FootballDataClientOptions): FootballDataClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchFn = options.fetch ?? fetch;
  const pause = options.sleep ?? sleep;

  function buildUrl(path: string, params?: Params): string {
    const url = new URL(`${baseUrl}/${path.replace(/^\/+/, "")}`);
    if (params) {
      for (const [k, v] of Object.entries(params)) {
        if (v !== undefined) url.searchParams.set(k, String(v));
      }
    }
    return url.toString();
  }

  async function send(url: string, path: string): Promise<Response> {
    try {
      return await fetchFn(url, {
        headers: { "X-Auth-Token": options.apiToken },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new UpstreamError(`football-data ${path}: network error: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * GET a path and return the parsed JSON body. A 429 is retried once after
   * the advertised pause; `resource` turns a 404 into a NotFoundError.
   */
  async function get(path: string, params?: Params, resource?: string): Promise<unknown> {
    const url = buildUrl(path, params);

    let res = await send(url, path);
    if (res.status === 429) {
      const seconds = retryHintSeconds(res.headers);
      logInfo(`football-data ${path}: rate limited, retrying in ${seconds}s`);
      await res.body?.cancel();
      await pause(seconds * 1000);
      res = await send(url, path);
      if (res.status === 429) {
        await res.body?.cancel();
        throw new UpstreamError(`football-data ${path}: still rate limited after retry`, { status: 429 });
      }
    }

    if (res.status === 404 && resource) {
      await res.body?.cancel();
      throw new NotFoundError(`${resource} not found`);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "(unreadable body)");
      throw new UpstreamError(`football-data ${path}: ${res.status} ${body.slice(0, 200)}`, {
        status: res.status,
      });
    }

    try {
      return await res.json();
    } catch (err) {
      throw new UpstreamError(`football-data ${path}: invalid JSON response`, { cause: err });
    }
  }

  return {
    async listCompetitions(filters = {}) {
      const body = await get("/competitions", {
        areas: filters.areas && filters.areas.length > 0 ? filters.areas.join(",") : undefined,
        plan: filters.plan,
      });
      return decodeList(body, "competitions", decodeCompetitionSummary);
    },

    async getCompetition(idOrCode) {
      const body = await get(`/competitions/${encodeURIComponent(String(idOrCode))}`, undefined, `Competition ${idOrCode}`);
      return decodeCompetition(body);
    },

    async getTeams(competitionId, filters = {}) {
      const body = await get(
        `/competitions/${competitionId}/teams`,
        { season: filters.season, stage: filters.stage },
        `Competition ${competitionId}`,
      );
      return decodeList(body, "teams", decodeTeam);
    },

    async getMatches(filters = {}) {
      const { competitionId, limit = 10, offset = 0, ...rest } = filters;
      const path = competitionId !== undefined ? `/competitions/${competitionId}/matches` : "/matches";
      const body = await get(
        path,
        { ...rest, limit, offset },
        competitionId !== undefined ? `Competition ${competitionId}` : undefined,
      );
      return decodeList(body, "matches", decodeMatch);
    },
  };
}
