import { z } from "zod";
import { Effect, VoteSchema, describeIssues, type Logger, type OpinionDraft } from "@tiergate/shared";
import type { CouncilMember } from "../config.js";
import { chatComplete, tryParseJson, type ChatMessage, type LlmSettings } from "../llm/llmClient.js";
import type { OpinionQuery, OpinionSource } from "./source.js";

export class InvalidOpinionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidOpinionError";
  }
}

// Models drift on casing and number formatting; anything beyond that is rejected.
const ModelOpinionSchema = z
  .object({
    vote: z.string().transform((v) => v.trim().toLowerCase()).pipe(VoteSchema),
    confidence: z.coerce.number().min(0).max(1),
    rationale: z.string().optional(),
    reasoning: z.string().optional(),
  })
  .transform((o): OpinionDraft => ({
    vote: o.vote,
    confidence: o.confidence,
    rationale: o.rationale ?? o.reasoning ?? "",
  }));

/** Coerces raw model output into an OpinionDraft, or throws InvalidOpinionError. */
export function parseModelOpinion(content: string): OpinionDraft {
  const json = tryParseJson(content);
  if (json === null) throw new InvalidOpinionError(`No JSON object in response: ${content.slice(0, 200)}`);
  const parsed = ModelOpinionSchema.safeParse(json);
  if (!parsed.success) throw new InvalidOpinionError(describeIssues(parsed.error));
  return parsed.data;
}

function systemPrompt(role: string): string {
  return [
    "You are a board member of an autonomous business system.",
    `Your role is: ${role}.`,
    "Assess the decision independently. Weigh risk, financial impact, legal exposure, strategic fit and timing.",
    'Return STRICT JSON with keys: vote ("approve" | "reject" | "abstain"), confidence (0..1), rationale (2-3 sentences). No extra keys, no text outside the JSON.',
  ].join("\n");
}

function userPrompt(query: OpinionQuery): string {
  return JSON.stringify({
    question: query.question,
    actionType: query.actionType,
    amount: query.amount ?? null,
    currency: query.currency,
    destination: query.destination ?? null,
    context: query.payload,
  });
}

type SourceEnv = { log: Logger };

export class LlmOpinionSource implements OpinionSource {
  readonly id: string;

  constructor(
    private member: CouncilMember,
    private settings: LlmSettings,
    private log: Logger
  ) {
    this.id = member.id;
  }

  async query(query: OpinionQuery, signal: AbortSignal): Promise<OpinionDraft> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt(this.member.role) },
      { role: "user", content: userPrompt(query) },
    ];
    const attempt: Effect<SourceEnv, OpinionDraft> = async (env, s) => {
      const res = await chatComplete(this.settings, this.member.model, messages, s);
      if (!res.ok) {
        env.log.warn(`${this.id} (${this.member.model}) call failed`, res.error);
        throw new Error(res.error);
      }
      return parseModelOpinion(res.content);
    };
    const withRetry = Effect.retry(attempt, {
      retries: this.settings.retries,
      delayMs: this.settings.retryDelayMs,
    });
    return withRetry({ log: this.log }, signal);
  }
}
