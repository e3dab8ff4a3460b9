export type CompetitionPlan = "TIER_ONE" | "TIER_TWO" | "TIER_THREE" | "TIER_FOUR";

export interface FootballDataConfig {
  apiAccessToken: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
}

export interface Config extends FootballDataConfig {
  anthropicApiKey: string;
  claudeModel: string;
  resolverMaxTokens: number;
  competitionAreas?: number[];
  competitionPlan?: CompetitionPlan;
}

export interface CompetitionSummary {
  id: number;
  name: string;
  code: string;
}

export interface TeamRef {
  id: number;
  name: string;
  shortName?: string;
  tla?: string;
  crest?: string;
}

export interface Season {
  id: number;
  startDate: string; // ISO date, e.g. "2024-08-16"
  endDate: string;
  currentMatchday: number | null;
  winner: TeamRef | null;
}

export interface Competition {
  id: number;
  name: string;
  code: string;
  type: string;
  currentSeason: Season;
  seasons: Season[];
}

export interface Team {
  id: number;
  name: string;
  shortName: string;
  tla: string;
  crest: string;
  address?: string;
  website?: string;
  founded?: number;
  clubColors?: string;
  venue?: string;
}

export interface Score {
  home: number | null;
  away: number | null;
}

export interface ScoreDetails {
  winner: string | null;
  duration: string | null;
  fullTime: Score;
  halfTime: Score;
}

export interface Match {
  id: number;
  competition: { id: number; name: string };
  utcDate: string;
  status: string;
  matchday: number | null;
  stage: string | null;
  group: string | null;
  homeTeam: TeamRef;
  awayTeam: TeamRef;
  score: ScoreDetails;
}

export interface CompetitionFilters {
  areas?: number[];
  plan?: CompetitionPlan;
}

export interface TeamFilters {
  season?: number;
  stage?: string;
}

export interface MatchFilters {
  competitionId?: number;
  dateFrom?: string; // YYYY-MM-DD
  dateTo?: string;
  status?: string;
  matchday?: number;
  group?: string;
  season?: number;
  stage?: string;
  limit?: number;
  offset?: number;
}

export interface CatalogEntry {
  id: number;
  code: string;
}

/** Canonical competition name → provider identifiers. */
export type CompetitionCatalog = ReadonlyMap<string, CatalogEntry>;

export interface ResolutionCandidate {
  id: number;
  code: string;
}

export interface CandidateFailure {
  id: number;
  code: string;
  error: string;
}

export interface LookupOutcome {
  query: string;
  candidates: ResolutionCandidate[];
  competitions: Competition[];
  failures: CandidateFailure[];
  notFound: boolean;
  text: string;
}

export interface LookupRecord {
  timestamp: string;
  query: string;
  candidates: ResolutionCandidate[];
  matched: string[];
  failures: CandidateFailure[];
  notFound: boolean;
  error?: string;
}
