import { strict as assert } from "node:assert";
import { test } from "node:test";

import { ResolutionError } from "../src/errors.js";
import {
  buildPrompt,
  createClaudeCapability,
  parseCandidates,
  resolveCompetition,
  stripCodeFence,
} from "../src/resolver.js";
import type { MessagesClient } from "../src/resolver.js";
import type { CompetitionCatalog, Config } from "../src/types.js";

const catalog: CompetitionCatalog = new Map([
  ["Premier League", { id: 2021, code: "PL" }],
  ["UEFA Champions League", { id: 2001, code: "CL" }],
]);

test("parseCandidates reads a fenced JSON array", () => {
  const candidates = parseCandidates('```json\n[{"id":2021,"code":"PL"}]\n```');
  assert.deepEqual(candidates, [{ id: 2021, code: "PL" }]);
});

test("parseCandidates reads the continuation after a primed fence opener", () => {
  // The model's reply starts after "```json", so only the closing fence is present
  const candidates = parseCandidates('\n[{"id":2001,"code":"CL"},{"id":2021,"code":"PL"}]\n```\n');
  assert.deepEqual(candidates, [
    { id: 2001, code: "CL" },
    { id: 2021, code: "PL" },
  ]);
});

test("parseCandidates treats an empty array as no match", () => {
  assert.deepEqual(parseCandidates("[]\n```"), []);
});

test("parseCandidates rejects empty and whitespace-only replies", () => {
  assert.throws(() => parseCandidates(""), ResolutionError);
  assert.throws(() => parseCandidates("   \n\t"), ResolutionError);
  assert.throws(() => parseCandidates("```json\n```"), ResolutionError);
});

test("parseCandidates rejects text that is not JSON", () => {
  assert.throws(() => parseCandidates("not json"), ResolutionError);
});

test("parseCandidates rejects JSON of the wrong shape", () => {
  assert.throws(() => parseCandidates('{"id":2021,"code":"PL"}'), ResolutionError);
  assert.throws(() => parseCandidates('[{"id":"2021","code":"PL"}]'), ResolutionError);
  assert.throws(() => parseCandidates('[{"id":2021.5,"code":"PL"}]'), ResolutionError);
  assert.throws(() => parseCandidates('[{"id":2021}]'), ResolutionError);
  assert.throws(() => parseCandidates("[null]"), ResolutionError);
});

test("parseCandidates drops extra fields", () => {
  assert.deepEqual(parseCandidates('[{"id":2021,"code":"PL","name":"Premier League"}]'), [
    { id: 2021, code: "PL" },
  ]);
});

test("stripCodeFence leaves bare JSON alone", () => {
  assert.equal(stripCodeFence('  [{"id":1,"code":"X"}]  '), '[{"id":1,"code":"X"}]');
});

test("buildPrompt includes the query and every catalog entry", () => {
  const prompt = buildPrompt("prem league", catalog);
  assert.ok(prompt.includes("**Query:** prem league"));
  assert.ok(prompt.includes('"Premier League": {\n    "id": 2021,\n    "code": "PL"\n  }'));
  assert.ok(prompt.includes('"UEFA Champions League"'));
});

test("resolveCompetition passes the rendered prompt to the capability", async () => {
  const prompts: string[] = [];
  const result = await resolveCompetition("prem league", catalog, async (prompt) => {
    prompts.push(prompt);
    return '[{"id":2021,"code":"PL"}]\n```';
  });
  assert.deepEqual(result, [{ id: 2021, code: "PL" }]);
  assert.equal(prompts.length, 1);
  assert.equal(prompts[0], buildPrompt("prem league", catalog));
});

test("resolveCompetition wraps capability failures without retrying", async () => {
  let calls = 0;
  await assert.rejects(
    resolveCompetition("prem league", catalog, async () => {
      calls++;
      throw new Error("request timed out");
    }),
    (err: unknown) => err instanceof ResolutionError && err.message === "Model call failed: request timed out",
  );
  assert.equal(calls, 1);
});

test("resolveCompetition returns ids that are not in the catalog", async () => {
  const result = await resolveCompetition("bundesliga", catalog, async () => '[{"id":2002,"code":"BL1"}]');
  assert.deepEqual(result, [{ id: 2002, code: "BL1" }]);
});

const config: Config = {
  apiAccessToken: "test-token",
  apiBaseUrl: "https://football.test/v4",
  anthropicApiKey: "test-key",
  claudeModel: "claude-test",
  requestTimeoutMs: 30_000,
  resolverMaxTokens: 256,
};

type CreateParams = Parameters<MessagesClient["messages"]["create"]>[0];

function fakeClient(content: Array<{ type: string; text?: string }>) {
  const requests: CreateParams[] = [];
  const client: MessagesClient = {
    messages: {
      create: async (body) => {
        requests.push(body);
        return { content };
      },
    },
  };
  return { client, requests };
}

test("the Claude capability asks for a deterministic, fence-primed reply", async () => {
  const { client, requests } = fakeClient([{ type: "text", text: '\n[{"id":2021,"code":"PL"}]\n```' }]);
  const capability = createClaudeCapability(config, client);

  const result = await resolveCompetition("prem league", catalog, capability);

  assert.deepEqual(result, [{ id: 2021, code: "PL" }]);
  assert.equal(requests.length, 1);
  const body = requests[0];
  assert.equal(body?.model, "claude-test");
  assert.equal(body?.temperature, 0);
  assert.equal(body?.max_tokens, 256);
  assert.deepEqual(body?.messages, [
    { role: "user", content: buildPrompt("prem league", catalog) },
    { role: "assistant", content: "```json" },
  ]);
});

test("a reply that does not start with text is a ResolutionError", async () => {
  const { client } = fakeClient([{ type: "tool_use" }]);
  const capability = createClaudeCapability(config, client);

  assert.equal(await capability("anything"), "");
  await assert.rejects(
    resolveCompetition("prem league", catalog, capability),
    (err: unknown) => err instanceof ResolutionError && err.message === "Empty response from model",
  );
});
