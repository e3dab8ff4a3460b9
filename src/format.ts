import type { Competition, Match, Season, Team } from "./types.js";

export const DIVIDER = "=".repeat(50);

function formatSeasonRecord(season: Season): string {
  return JSON.stringify({
    id: season.id,
    startDate: season.startDate,
    endDate: season.endDate,
    currentMatchday: season.currentMatchday,
    winner: season.winner?.name ?? null,
  });
}

export function formatCompetition(comp: Competition): string {
  const lines: string[] = [];
  lines.push(`Name: ${comp.name}`);
  lines.push(`Type: ${comp.type}`);

  const current = comp.currentSeason;
  lines.push("");
  lines.push("Current Season:");
  lines.push(`  Start: ${current.startDate}`);
  lines.push(`  End: ${current.endDate}`);
  lines.push(`  Current Matchday: ${current.currentMatchday ?? "n/a"}`);
  if (current.winner) {
    lines.push(`  Winner: ${current.winner.name}`);
  }

  if (comp.seasons.length > 0) {
    lines.push("");
    lines.push("Previous Seasons:");
    for (const season of comp.seasons) {
      lines.push(`  ${formatSeasonRecord(season)}`);
    }
  }

  lines.push(DIVIDER);
  return lines.join("\n");
}

export function formatCompetitions(comps: Competition[]): string {
  return comps.map(formatCompetition).join("\n") + "\n";
}

export function formatNotFound(query: string, names: string[]): string {
  return [
    `Information not found for ${query}.`,
    "It might be because the competition is not supported.",
    "Please try again or try a different competition.",
    `Available competitions: ${names.join(", ")}`,
  ].join("\n") + "\n";
}

export function formatTeam(team: Team): string {
  const extra = [team.venue, team.founded !== undefined ? `founded ${team.founded}` : undefined]
    .filter((s): s is string => s !== undefined);
  return `- ${team.name} (${team.tla})${extra.length > 0 ? ` — ${extra.join(", ")}` : ""}`;
}

export function formatMatch(match: Match): string {
  const date = match.utcDate.split("T")[0];
  const ft = match.score.fullTime;
  const score = ft.home !== null && ft.away !== null ? ` ${ft.home}-${ft.away}` : "";
  return `- ${date} ${match.homeTeam.name} vs ${match.awayTeam.name} [${match.status}]${score}`;
}
