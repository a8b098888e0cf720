import "dotenv/config";
import { isAddress } from "viem";
import { z } from "zod";
import { ActionTypeSchema, MAX_AMOUNT, TierSchema, describeIssues } from "@tiergate/shared";
import { deepFreeze } from "./util/freeze.js";

const CouncilMemberSchema = z.object({
  id: z.string().min(1),
  model: z.string().min(1),
  role: z.string().min(1).default("Advisor"),
});

export type CouncilMember = z.infer<typeof CouncilMemberSchema>;

const DEFAULT_MEMBERS: CouncilMember[] = [
  { id: "risk-analyst", model: "anthropic/claude-sonnet-4", role: "Risk Analyst" },
  { id: "strategy-director", model: "openai/gpt-4o", role: "Strategy Director" },
  { id: "finance-officer", model: "google/gemini-2.5-pro", role: "Finance Officer" },
  { id: "chairman", model: "x-ai/grok-3", role: "Chairman" },
];

// Longest delay a Node timer honours; larger values fire at once.
const MAX_TIMER_MS = 2_147_483_647;

const timerMs = () => z.coerce.number().int().max(MAX_TIMER_MS);
const money = () => z.coerce.number().nonnegative().max(MAX_AMOUNT);

const ConfigSchema = z
  .object({
    apiPort: z.coerce.number().int().min(0).max(65535).default(3001),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    tiers: z.object({
      autonomousBelow: z.coerce.number().nonnegative().default(100),
      humanAbove: z.coerce.number().nonnegative().default(2000),
      defaults: z.record(ActionTypeSchema, TierSchema).default({ venture_change: "Council", generic: "Autonomous" }),
    }).default({}),
    council: z.object({
      threshold: z.coerce.number().min(0).max(1).default(0.66),
      // undefined: every configured source must respond
      quorum: z.coerce.number().int().positive().optional(),
      chairmanId: z.string().min(1).optional(),
      sourceTimeoutMs: timerMs().positive().default(30_000),
      deliberationTimeoutMs: timerMs().positive().default(120_000),
      members: z.array(CouncilMemberSchema).default(DEFAULT_MEMBERS),
    }).default({}),
    llm: z.object({
      chatUrl: z.string().default("https://openrouter.ai/api/v1/chat/completions"),
      apiKey: z.string().default(""),
      temperature: z.coerce.number().min(0).max(2).default(0.7),
      maxTokens: z.coerce.number().int().positive().default(500),
      retries: z.coerce.number().int().nonnegative().default(2),
      retryDelayMs: timerMs().nonnegative().default(1_000),
    }).default({}),
    approval: z.object({
      timeoutMs: timerMs().positive().default(24 * 3600_000),
      reminderAfterMs: timerMs().nonnegative().default(4 * 3600_000),
      responders: z.array(z.string().min(1)).default([]),
      webhookUrl: z.string().default(""),
    }).default({}),
    policy: z.object({
      perTxLimit: money().default(1_000),
      dailyLimit: money().default(5_000),
      weeklyLimit: money().optional(),
      whitelist: z
        .array(z.string().trim().refine((a) => isAddress(a, { strict: false }), "not an address"))
        .default([]),
      multiSigThreshold: money().default(2_000),
      multiSigSigners: z.coerce.number().int().positive().default(2),
    }).default({}),
    audit: z.object({
      path: z.string().min(1).default("./audit.jsonl"),
    }).default({}),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.tiers.humanAbove < cfg.tiers.autonomousBelow) {
      ctx.addIssue({ code: "custom", path: ["tiers", "humanAbove"], message: "must be >= autonomousBelow" });
    }
    const ids = cfg.council.members.map((m) => m.id);
    if (new Set(ids).size !== ids.length) {
      ctx.addIssue({ code: "custom", path: ["council", "members"], message: "member ids must be unique" });
    }
    if (cfg.council.chairmanId && !ids.includes(cfg.council.chairmanId)) {
      ctx.addIssue({ code: "custom", path: ["council", "chairmanId"], message: "must name a council member" });
    }
    if (cfg.council.quorum !== undefined && cfg.council.quorum > ids.length) {
      ctx.addIssue({ code: "custom", path: ["council", "quorum"], message: "exceeds the number of council members" });
    }
  })
  // Without COUNCIL_CHAIRMAN the last listed member breaks ties.
  .transform((cfg) => ({
    ...cfg,
    council: { ...cfg.council, chairmanId: cfg.council.chairmanId ?? cfg.council.members.at(-1)?.id },
  }));

export type EngineConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// Accepts a JSON array or a comma separated list.
function list(raw: string | undefined): unknown {
  if (raw === undefined || raw.trim() === "") return undefined;
  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) return json(trimmed, "list");
  return trimmed.split(",").map((s) => s.trim()).filter(Boolean);
}

function json(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid JSON for ${what}: ${String(e)}`);
  }
}

function optional(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
}

/** Maps environment variables onto the raw config shape. */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const quorum = optional(env.COUNCIL_QUORUM);
  const tierDefaults = optional(env.TIER_DEFAULTS);
  const members = optional(env.COUNCIL_MEMBERS);
  return {
    apiPort: optional(env.API_PORT),
    logLevel: optional(env.LOG_LEVEL),
    tiers: {
      autonomousBelow: optional(env.TIER_AUTONOMOUS_BELOW_USD),
      humanAbove: optional(env.TIER_HUMAN_ABOVE_USD),
      defaults: tierDefaults ? json(tierDefaults, "TIER_DEFAULTS") : undefined,
    },
    council: {
      threshold: optional(env.CONSENSUS_THRESHOLD),
      quorum: quorum === undefined || quorum === "all" ? undefined : quorum,
      chairmanId: optional(env.COUNCIL_CHAIRMAN),
      sourceTimeoutMs: optional(env.COUNCIL_SOURCE_TIMEOUT_MS),
      deliberationTimeoutMs: optional(env.COUNCIL_TIMEOUT_MS),
      members: members ? json(members, "COUNCIL_MEMBERS") : undefined,
    },
    llm: {
      chatUrl: optional(env.LLM_CHAT_URL),
      apiKey: env.LLM_API_KEY ?? "",
      temperature: optional(env.LLM_TEMPERATURE),
      maxTokens: optional(env.LLM_MAX_TOKENS),
      retries: optional(env.LLM_RETRIES),
      retryDelayMs: optional(env.LLM_RETRY_DELAY_MS),
    },
    approval: {
      timeoutMs: optional(env.APPROVAL_TIMEOUT_MS),
      reminderAfterMs: optional(env.APPROVAL_REMINDER_MS),
      responders: list(env.APPROVAL_RESPONDERS),
      webhookUrl: env.APPROVAL_WEBHOOK_URL ?? "",
    },
    policy: {
      perTxLimit: optional(env.POLICY_MAX_TX_USD),
      dailyLimit: optional(env.POLICY_MAX_DAILY_USD),
      weeklyLimit: optional(env.POLICY_MAX_WEEKLY_USD),
      whitelist: list(env.POLICY_WHITELIST),
      multiSigThreshold: optional(env.MULTISIG_THRESHOLD_USD),
      multiSigSigners: optional(env.MULTISIG_SIGNERS),
    },
    audit: {
      path: optional(env.AUDIT_PATH),
    },
  };
}

/**
 * Validates and freezes a configuration. The result is built once at startup and
 * handed to each component; nothing reads the environment after this.
 */
export function parseConfig(raw: unknown): EngineConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  return deepFreeze(parsed.data);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return parseConfig(configFromEnv(env));
}

/** Quorum in effect for a council of `size` sources. */
export function effectiveQuorum(council: Pick<EngineConfig["council"], "quorum">, size: number): number {
  return council.quorum ?? size;
}
