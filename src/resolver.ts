import Anthropic from "@anthropic-ai/sdk";
import { ResolutionError, errorMessage } from "./errors.js";
import type { CompetitionCatalog, Config, ResolutionCandidate } from "./types.js";

/** Anything that turns a rendered prompt into the model's raw text reply. */
export type ReasoningCapability = (prompt: string) => Promise<string>;

const SYSTEM_PROMPT = `You match football competition names. You are given a user's free-text query, which may be abbreviated, misspelled or informal, and a catalog of the competitions the data provider supports.

## Rules

- Only answer with entries that exist in the catalog, copying their id and code exactly.
- Return every entry that plausibly matches, best match first. Most queries match exactly one.
- If nothing in the catalog matches, return an empty array.

## Output Format

Respond with ONLY a JSON array:
[{"id": 2021, "code": "PL"}]`;

// Primed assistant turn, so the reply continues straight into the JSON body
const FENCE_OPENER = "```json";

export function buildPrompt(query: string, catalog: CompetitionCatalog): string {
  const entries = Object.fromEntries(catalog);
  return `Find the competitions matching this query:

**Query:** ${query}

**Catalog (name → id, code):**
${JSON.stringify(entries, null, 2)}

Respond with ONLY a JSON array of {"id": ..., "code": ...} objects.`;
}

/** The slice of the Anthropic client the resolver calls. */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
    ): Promise<{ content: Array<{ type: string; text?: string }> }>;
  };
}

export function createClaudeCapability(
  config: Config,
  client: MessagesClient = new Anthropic({ apiKey: config.anthropicApiKey }),
): ReasoningCapability {
  return async (prompt) => {
    const response = await client.messages.create({
      model: config.claudeModel,
      max_tokens: config.resolverMaxTokens,
      temperature: 0,
      system: SYSTEM_PROMPT,
      messages: [
        { role: "user", content: prompt },
        { role: "assistant", content: FENCE_OPENER },
      ],
    });

    const first = response.content[0];
    return first?.type === "text" && first.text !== undefined ? first.text : "";
  };
}

export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```[a-z]*/i, "")
    .replace(/```$/, "")
    .trim();
}

export function parseCandidates(text: string): ResolutionCandidate[] {
  const body = stripCodeFence(text);
  if (!body) {
    throw new ResolutionError("Empty response from model");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ResolutionError(`Failed to parse model response as JSON: ${body.slice(0, 200)}`, { cause: err });
  }

  if (!Array.isArray(parsed)) {
    throw new ResolutionError(`Expected a JSON array of candidates, got: ${body.slice(0, 200)}`);
  }

  return parsed.map((item: unknown, i) => {
    if (typeof item !== "object" || item === null) {
      throw new ResolutionError(`Candidate ${i} is not an object`);
    }
    const id: unknown = "id" in item ? item.id : undefined;
    const code: unknown = "code" in item ? item.code : undefined;
    if (typeof id !== "number" || !Number.isInteger(id)) {
      throw new ResolutionError(`Candidate ${i} has invalid id: ${String(id)}`);
    }
    if (typeof code !== "string") {
      throw new ResolutionError(`Candidate ${i} has invalid code: ${String(code)}`);
    }
    return { id, code };
  });
}

/**
 * Asks the model which catalog entries match `query`. An empty array is a
 * successful "no match"; anything the model says that is not a candidate
 * list is a ResolutionError. Candidate ids are not checked against the catalog.
 */
export async function resolveCompetition(
  query: string,
  catalog: CompetitionCatalog,
  capability: ReasoningCapability,
): Promise<ResolutionCandidate[]> {
  let text: string;
  try {
    text = await capability(buildPrompt(query, catalog));
  } catch (err) {
    throw new ResolutionError(`Model call failed: ${errorMessage(err)}`, { cause: err });
  }
  return parseCandidates(text);
}
