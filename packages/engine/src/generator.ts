import { readFile } from "node:fs/promises";
import path from "node:path";
import type { JudicialRole, RubricCriterion, ScoreScale } from "@tribunal/config";
import { isJudicialRole } from "@tribunal/config";
import { RateLimitError } from "./errors.js";
import { roleVariant } from "./roles.js";
import type { Evidence } from "./state.js";

/* ------------------------------------------------------------------ */
/*  Model routing                                                      */
/* ------------------------------------------------------------------ */

export interface ModelRoute {
  model: string;
  temperature: number;
}

export type ModelRouteTable = Record<JudicialRole, ModelRoute>;

const DEFAULT_MODEL_ROUTES: ModelRouteTable = {
  Prosecutor: { model: "gpt-4o", temperature: 0 },
  Defense: { model: "gpt-4o", temperature: 0.2 },
  TechLead: { model: "gpt-4o", temperature: 0 },
};

export class ModelRouter {
  constructor(private readonly routeTable: ModelRouteTable = DEFAULT_MODEL_ROUTES) {}

  resolve(role: JudicialRole): ModelRoute {
    return this.routeTable[role];
  }
}

/* ------------------------------------------------------------------ */
/*  Chat client                                                        */
/* ------------------------------------------------------------------ */

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatRequest {
  model: string;
  temperature: number;
  messages: ChatMessage[];
}

export interface ChatClient {
  complete(request: ChatRequest, signal?: AbortSignal): Promise<string>;
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

/** First choice's message text of a chat-completions response, or "" when absent. */
export function readCompletionText(payload: unknown): string {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return "";
  const first: unknown = payload.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return "";
  const content = first.message.content;
  return typeof content === "string" ? content : "";
}

function retryAfterMs(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1_000 : undefined;
}

export class FetchChatClient implements ChatClient {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl = "https://api.openai.com/v1",
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async complete(request: ChatRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: request.model,
        temperature: request.temperature,
        messages: request.messages,
      }),
      signal,
    });

    if (response.status === 429) {
      throw new RateLimitError(
        `Generator rate limit: ${response.status} ${response.statusText}`,
        retryAfterMs(response.headers.get("retry-after")),
      );
    }
    if (!response.ok) {
      throw new Error(`Generator call failed: ${response.status} ${response.statusText}`);
    }

    const payload: unknown = await response.json();
    return readCompletionText(payload);
  }
}

/* ------------------------------------------------------------------ */
/*  Prompt registry                                                    */
/* ------------------------------------------------------------------ */

export interface PromptVersionRef {
  id: string;
  version: string;
}

export interface PromptMapping {
  role: JudicialRole;
  prompt: PromptVersionRef;
}

export interface PromptRegistryDocument {
  mappings: PromptMapping[];
}

export interface PromptRecord {
  id: string;
  version: string;
  content: string;
}

function isPromptMapping(input: unknown): input is PromptMapping {
  return (
    isRecord(input) &&
    isJudicialRole(input.role) &&
    isRecord(input.prompt) &&
    typeof input.prompt.id === "string" &&
    typeof input.prompt.version === "string"
  );
}

export function isPromptRegistryDocument(input: unknown): input is PromptRegistryDocument {
  return isRecord(input) && Array.isArray(input.mappings) && input.mappings.every(isPromptMapping);
}

export class PromptRegistry {
  private readonly cache = new Map<string, Promise<PromptRecord>>();

  constructor(
    private readonly rootDir: string,
    private readonly document: PromptRegistryDocument,
  ) {}

  static async loadFromRepo(rootDir: string): Promise<PromptRegistry> {
    const registryPath = path.join(rootDir, "docs/prompts/registry.json");
    const raw = await readFile(registryPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (!isPromptRegistryDocument(parsed)) {
      throw new Error(`Invalid prompt registry: ${registryPath}`);
    }
    return new PromptRegistry(rootDir, parsed);
  }

  resolve(role: JudicialRole): PromptMapping {
    const mapping = this.document.mappings.find((entry) => entry.role === role);
    if (!mapping) {
      throw new Error(`No prompt mapping configured for role: ${role}`);
    }
    return mapping;
  }

  async loadPrompt(ref: PromptVersionRef): Promise<PromptRecord> {
    const key = `${ref.id}@${ref.version}`;
    let pending = this.cache.get(key);
    if (!pending) {
      const promptPath = path.join(this.rootDir, "docs/prompts", ref.id, `${ref.version}.md`);
      pending = readFile(promptPath, "utf-8").then((content) => ({ id: ref.id, version: ref.version, content }));
      this.cache.set(key, pending);
    }
    return pending;
  }
}

/* ------------------------------------------------------------------ */
/*  Opinion generator                                                  */
/* ------------------------------------------------------------------ */

export interface OpinionRequest {
  role: JudicialRole;
  criterion: RubricCriterion;
  evidence: readonly Evidence[];
  scale: ScoreScale;
}

/** Produces the raw text of one opinion; consumed only through the extraction adapter. */
export interface OpinionGenerator {
  generate(request: OpinionRequest, signal?: AbortSignal): Promise<string>;
}

export const EVIDENCE_CONTENT_LIMIT = 500;

function renderEvidence(item: Evidence): string {
  const lines = [
    `- goal: ${item.goal}`,
    `  found: ${item.found}`,
    `  location: ${item.location}`,
    `  confidence: ${item.confidence}`,
    `  rationale: ${item.rationale}`,
  ];
  if (item.severity) lines.push(`  severity: ${item.severity}`);
  if (item.content) {
    const content =
      item.content.length > EVIDENCE_CONTENT_LIMIT ? `${item.content.slice(0, EVIDENCE_CONTENT_LIMIT)}...` : item.content;
    lines.push(`  content: ${content}`);
  }
  return lines.join("\n");
}

export function buildOpinionMessages(request: OpinionRequest, systemPrompt: string): ChatMessage[] {
  const { criterion, scale } = request;
  const variant = roleVariant(request.role);
  const evidence = request.evidence.length > 0 ? request.evidence.map(renderEvidence).join("\n") : "(no evidence collected)";
  const user = [
    `Role: ${request.role}. ${variant.stance}`,
    `Criterion: ${criterion.id} (${criterion.name}), category ${criterion.category}.`,
    criterion.forensicInstruction ? `Instruction: ${criterion.forensicInstruction}` : "",
    criterion.successPattern ? `Success pattern: ${criterion.successPattern}` : "",
    criterion.failurePattern ? `Failure pattern: ${criterion.failurePattern}` : "",
    "Evidence:",
    evidence,
    `Answer with a JSON object {"score": integer ${scale.min}-${scale.max}, "rationale": string, "citations": string[]} and nothing else. Citations name evidence locations.`,
  ]
    .filter((line) => line.length > 0)
    .join("\n");
  return [
    { role: "system", content: systemPrompt },
    { role: "user", content: user },
  ];
}

export class ChatOpinionGenerator implements OpinionGenerator {
  constructor(
    private readonly client: ChatClient,
    private readonly registry: PromptRegistry,
    private readonly router: ModelRouter = new ModelRouter(),
  ) {}

  async generate(request: OpinionRequest, signal?: AbortSignal): Promise<string> {
    const mapping = this.registry.resolve(request.role);
    const prompt = await this.registry.loadPrompt(mapping.prompt);
    const route = this.router.resolve(request.role);
    return this.client.complete(
      { model: route.model, temperature: route.temperature, messages: buildOpinionMessages(request, prompt.content) },
      signal,
    );
  }
}
