import { strict as assert } from "node:assert";
import { test } from "node:test";

import { DIVIDER, formatCompetition, formatCompetitions, formatMatch, formatTeam } from "../src/format.js";
import type { Competition } from "../src/types.js";

const laLiga: Competition = {
  id: 2014,
  name: "Primera Division",
  code: "PD",
  type: "LEAGUE",
  currentSeason: { id: 2292, startDate: "2024-08-15", endDate: "2025-05-25", currentMatchday: null, winner: null },
  seasons: [
    { id: 2292, startDate: "2024-08-15", endDate: "2025-05-25", currentMatchday: null, winner: null },
    {
      id: 1577,
      startDate: "2023-08-11",
      endDate: "2024-05-26",
      currentMatchday: 38,
      winner: { id: 86, name: "Real Madrid CF", tla: "RMA" },
    },
  ],
};

test("formatCompetition renders the current season and history", () => {
  assert.equal(
    formatCompetition(laLiga),
    [
      "Name: Primera Division",
      "Type: LEAGUE",
      "",
      "Current Season:",
      "  Start: 2024-08-15",
      "  End: 2025-05-25",
      "  Current Matchday: n/a",
      "",
      "Previous Seasons:",
      '  {"id":2292,"startDate":"2024-08-15","endDate":"2025-05-25","currentMatchday":null,"winner":null}',
      '  {"id":1577,"startDate":"2023-08-11","endDate":"2024-05-26","currentMatchday":38,"winner":"Real Madrid CF"}',
      DIVIDER,
    ].join("\n"),
  );
});

test("formatCompetition prints the winner and omits an empty history", () => {
  const text = formatCompetition({
    ...laLiga,
    currentSeason: { ...laLiga.currentSeason, currentMatchday: 38, winner: { id: 86, name: "Real Madrid CF" } },
    seasons: [],
  });
  assert.ok(text.includes("  Current Matchday: 38\n  Winner: Real Madrid CF\n" + DIVIDER));
  assert.ok(!text.includes("Previous Seasons:"));
});

test("formatCompetitions separates blocks with the divider line", () => {
  const text = formatCompetitions([laLiga, { ...laLiga, id: 2015, name: "Ligue 1", code: "FL1", seasons: [] }]);
  assert.equal(text.split(`${DIVIDER}\n`).length, 3);
  assert.ok(text.endsWith(`${DIVIDER}\n`));
  assert.ok(text.indexOf("Name: Primera Division") < text.indexOf("Name: Ligue 1"));
});

test("formatTeam and formatMatch render one line each", () => {
  assert.equal(
    formatTeam({ id: 57, name: "Arsenal FC", shortName: "Arsenal", tla: "ARS", crest: "c", venue: "Emirates Stadium", founded: 1886 }),
    "- Arsenal FC (ARS) — Emirates Stadium, founded 1886",
  );
  assert.equal(
    formatMatch({
      id: 1,
      competition: { id: 2021, name: "Premier League" },
      utcDate: "2024-08-17T14:00:00Z",
      status: "FINISHED",
      matchday: 1,
      stage: "REGULAR_SEASON",
      group: null,
      homeTeam: { id: 57, name: "Arsenal FC" },
      awayTeam: { id: 76, name: "Wolverhampton Wanderers FC" },
      score: { winner: "HOME_TEAM", duration: "REGULAR", fullTime: { home: 2, away: 0 }, halfTime: { home: 1, away: 0 } },
    }),
    "- 2024-08-17 Arsenal FC vs Wolverhampton Wanderers FC [FINISHED] 2-0",
  );
});
