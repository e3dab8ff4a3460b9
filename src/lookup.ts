import type { CatalogCache } from "./catalog.js";
import { NotFoundError, UpstreamError, errorMessage } from "./errors.js";
import type { FootballDataClient } from "./football-data.js";
import { formatCompetitions, formatNotFound } from "./format.js";
import { logError, logInfo } from "./logger.js";
import type {
  CandidateFailure,
  Competition,
  CompetitionCatalog,
  LookupOutcome,
  ResolutionCandidate,
} from "./types.js";

export interface LookupDeps {
  gateway: Pick<FootballDataClient, "getCompetition">;
  catalog: CatalogCache;
  resolve: (query: string, catalog: CompetitionCatalog) => Promise<ResolutionCandidate[]>;
}

export interface CompetitionLookup {
  lookup(query: string): Promise<string>;
  lookupDetailed(query: string): Promise<LookupOutcome>;
  supportedCompetitions(): Promise<string[]>;
}

function sortedNames(catalog: CompetitionCatalog): string[] {
  return [...catalog.keys()].sort();
}

function uniqueById(candidates: ResolutionCandidate[]): ResolutionCandidate[] {
  const seen = new Set<number>();
  return candidates.filter((c) => {
    if (seen.has(c.id)) return false;
    seen.add(c.id);
    return true;
  });
}

export function createCompetitionLookup(deps: LookupDeps): CompetitionLookup {
  async function lookupDetailed(query: string): Promise<LookupOutcome> {
    // Neither step has a textual fallback, so failures here reach the caller
    const catalog = await deps.catalog.ensureLoaded();
    const candidates = await deps.resolve(query, catalog);

    const notFound = (failures: CandidateFailure[]): LookupOutcome => ({
      query,
      candidates,
      competitions: [],
      failures,
      notFound: true,
      text: formatNotFound(query, sortedNames(catalog)),
    });

    if (candidates.length === 0) {
      logInfo(`No catalog match for "${query}"`);
      return notFound([]);
    }

    const toFetch = uniqueById(candidates);
    const settled = await Promise.allSettled(toFetch.map((c) => deps.gateway.getCompetition(c.id)));

    const competitions: Competition[] = [];
    const failures: CandidateFailure[] = [];
    settled.forEach((result, i) => {
      const candidate = toFetch[i];
      if (!candidate) return;
      if (result.status === "fulfilled") {
        competitions.push(result.value);
        return;
      }
      const err: unknown = result.reason;
      if (!(err instanceof NotFoundError) && !(err instanceof UpstreamError)) {
        throw err;
      }
      logError(`Skipping candidate ${candidate.code}#${candidate.id}: ${errorMessage(err)}`);
      failures.push({ id: candidate.id, code: candidate.code, error: errorMessage(err) });
    });

    if (competitions.length === 0) {
      return notFound(failures);
    }

    return {
      query,
      candidates,
      competitions,
      failures,
      notFound: false,
      text: formatCompetitions(competitions),
    };
  }

  return {
    lookupDetailed,

    async lookup(query) {
      const outcome = await lookupDetailed(query);
      return outcome.text;
    },

    async supportedCompetitions() {
      return sortedNames(await deps.catalog.ensureLoaded());
    },
  };
}
