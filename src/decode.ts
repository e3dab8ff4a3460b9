/**
 * Strict decoders for football-data.org v4 payloads.
 *
 * Every required field must be present with the right type; a record that
 * fails is reported as an UpstreamError naming the field path instead of
 * being dropped from the result.
 */

import { UpstreamError } from "./errors.js";
import type {
  Competition,
  CompetitionSummary,
  Match,
  Score,
  ScoreDetails,
  Season,
  Team,
  TeamRef,
} from "./types.js";

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(path: string, expected: string, value: unknown): never {
  const got = value === undefined ? "missing" : JSON.stringify(value)?.slice(0, 80) ?? String(value);
  throw new UpstreamError(`Malformed response: ${path} should be ${expected}, got ${got}`);
}

function asObject(value: unknown, path: string): Json {
  if (!isObject(value)) fail(path, "an object", value);
  return value;
}

function int(obj: Json, key: string, path: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isInteger(v)) fail(`${path}.${key}`, "an integer", v);
  return v;
}

function str(obj: Json, key: string, path: string): string {
  const v = obj[key];
  if (typeof v !== "string") fail(`${path}.${key}`, "a string", v);
  return v;
}

function date(obj: Json, key: string, path: string): string {
  const v = str(obj, key, path);
  if (isNaN(Date.parse(v))) fail(`${path}.${key}`, "a date", v);
  return v;
}

function nullableInt(obj: Json, key: string, path: string): number | null {
  const v = obj[key];
  if (v === undefined || v === null) return null;
  return int(obj, key, path);
}

function nullableStr(obj: Json, key: string, path: string): string | null {
  const v = obj[key];
  if (v === undefined || v === null) return null;
  return str(obj, key, path);
}

function optionalStr(obj: Json, key: string, path: string): string | undefined {
  return nullableStr(obj, key, path) ?? undefined;
}

function list<T>(value: unknown, path: string, decode: (item: unknown, path: string) => T): T[] {
  if (!Array.isArray(value)) fail(path, "an array", value);
  return value.map((item, i) => decode(item, `${path}[${i}]`));
}

export function decodeCompetitionSummary(value: unknown, path = "competition"): CompetitionSummary {
  const obj = asObject(value, path);
  return {
    id: int(obj, "id", path),
    name: str(obj, "name", path),
    code: str(obj, "code", path),
  };
}

export function decodeTeamRef(value: unknown, path = "team"): TeamRef {
  const obj = asObject(value, path);
  const team: TeamRef = { id: int(obj, "id", path), name: str(obj, "name", path) };
  const shortName = optionalStr(obj, "shortName", path);
  const tla = optionalStr(obj, "tla", path);
  const crest = optionalStr(obj, "crest", path);
  if (shortName !== undefined) team.shortName = shortName;
  if (tla !== undefined) team.tla = tla;
  if (crest !== undefined) team.crest = crest;
  return team;
}

export function decodeSeason(value: unknown, path = "season"): Season {
  const obj = asObject(value, path);
  const winner = obj.winner;
  return {
    id: int(obj, "id", path),
    startDate: date(obj, "startDate", path),
    endDate: date(obj, "endDate", path),
    currentMatchday: nullableInt(obj, "currentMatchday", path),
    winner: winner === undefined || winner === null ? null : decodeTeamRef(winner, `${path}.winner`),
  };
}

export function decodeCompetition(value: unknown, path = "competition"): Competition {
  const obj = asObject(value, path);
  return {
    id: int(obj, "id", path),
    name: str(obj, "name", path),
    code: str(obj, "code", path),
    type: str(obj, "type", path),
    currentSeason: decodeSeason(obj.currentSeason, `${path}.currentSeason`),
    // The provider omits the history for some competitions
    seasons: obj.seasons === undefined ? [] : list(obj.seasons, `${path}.seasons`, decodeSeason),
  };
}

export function decodeTeam(value: unknown, path = "team"): Team {
  const obj = asObject(value, path);
  const team: Team = {
    id: int(obj, "id", path),
    name: str(obj, "name", path),
    shortName: str(obj, "shortName", path),
    tla: str(obj, "tla", path),
    crest: str(obj, "crest", path),
  };
  const address = optionalStr(obj, "address", path);
  const website = optionalStr(obj, "website", path);
  const founded = nullableInt(obj, "founded", path);
  const clubColors = optionalStr(obj, "clubColors", path);
  const venue = optionalStr(obj, "venue", path);
  if (address !== undefined) team.address = address;
  if (website !== undefined) team.website = website;
  if (founded !== null) team.founded = founded;
  if (clubColors !== undefined) team.clubColors = clubColors;
  if (venue !== undefined) team.venue = venue;
  return team;
}

function decodeScore(value: unknown, path: string): Score {
  const obj = asObject(value, path);
  return { home: nullableInt(obj, "home", path), away: nullableInt(obj, "away", path) };
}

function decodeScoreDetails(value: unknown, path: string): ScoreDetails {
  const obj = asObject(value, path);
  return {
    winner: nullableStr(obj, "winner", path),
    duration: nullableStr(obj, "duration", path),
    fullTime: decodeScore(obj.fullTime, `${path}.fullTime`),
    halfTime: decodeScore(obj.halfTime, `${path}.halfTime`),
  };
}

export function decodeMatch(value: unknown, path = "match"): Match {
  const obj = asObject(value, path);
  const competition = asObject(obj.competition, `${path}.competition`);
  return {
    id: int(obj, "id", path),
    competition: {
      id: int(competition, "id", `${path}.competition`),
      name: str(competition, "name", `${path}.competition`),
    },
    utcDate: date(obj, "utcDate", path),
    status: str(obj, "status", path),
    matchday: nullableInt(obj, "matchday", path),
    stage: nullableStr(obj, "stage", path),
    group: nullableStr(obj, "group", path),
    homeTeam: decodeTeamRef(obj.homeTeam, `${path}.homeTeam`),
    awayTeam: decodeTeamRef(obj.awayTeam, `${path}.awayTeam`),
    score: decodeScoreDetails(obj.score, `${path}.score`),
  };
}

/** Decodes `{ [key]: [...] }`, the envelope every list endpoint wraps its items in. */
export function decodeList<T>(
  body: unknown,
  key: string,
  decode: (item: unknown, path: string) => T,
): T[] {
  const obj = asObject(body, "response");
  return list(obj[key], key, decode);
}
