import { vi } from "vitest";
import { createClock, type DecisionRequest, type Logger, type OpinionDraft } from "@tiergate/shared";
import { ApprovalCoordinator } from "../src/approval/coordinator.js";
import type { ApprovalNotice } from "../src/approval/notifier.js";
import { AuditLog, MemorySink, type AuditSink } from "../src/audit/auditLog.js";
import { InMemoryBus } from "../src/bus/inMemoryBus.js";
import { parseConfig, type EngineConfig } from "../src/config.js";
import type { OpinionQuery, OpinionSource } from "../src/council/source.js";
import { DecisionEngine } from "../src/engine/decisionEngine.js";
import { PolicyGate } from "../src/policy/policyGate.js";
import { SpendLedger } from "../src/policy/spendLedger.js";

export const MEMBER_IDS = ["a", "b", "c", "chairman"];

type Section = Record<string, unknown>;

export function testConfig(
  overrides: { tiers?: Section; council?: Section; llm?: Section; approval?: Section; policy?: Section } = {}
): EngineConfig {
  return parseConfig({
    tiers: { ...overrides.tiers },
    council: {
      chairmanId: "chairman",
      members: MEMBER_IDS.map((id) => ({ id, model: `test/${id}` })),
      ...overrides.council,
    },
    llm: { ...overrides.llm },
    approval: { ...overrides.approval },
    policy: { ...overrides.policy },
    audit: { path: "unused.jsonl" },
  });
}

export function quietLogger(): Logger {
  const log: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => log,
  };
  return log;
}

export function makeRequest(overrides: Partial<DecisionRequest> = {}): DecisionRequest {
  return {
    id: "req-1",
    actionType: "spend",
    amount: 500,
    currency: "USDC",
    payload: {},
    requestedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

/** Answers with `draft`, after `delayMs` when given; gives up when aborted. */
export function fixedSource(id: string, draft: OpinionDraft, delayMs?: number): OpinionSource & { lastSignal?: AbortSignal } {
  const source: OpinionSource & { lastSignal?: AbortSignal } = {
    id,
    query(_query: OpinionQuery, signal: AbortSignal) {
      source.lastSignal = signal;
      if (delayMs === undefined) return Promise.resolve(draft);
      return new Promise<OpinionDraft>((resolve, reject) => {
        const t = setTimeout(() => resolve(draft), delayMs);
        signal.addEventListener(
          "abort",
          () => {
            clearTimeout(t);
            reject(new Error("aborted"));
          },
          { once: true }
        );
      });
    },
  };
  return source;
}

export function voter(id: string, vote: OpinionDraft["vote"], confidence = 0.9, delayMs?: number) {
  return fixedSource(id, { vote, confidence, rationale: `${id} says ${vote}` }, delayMs);
}

export function failingSource(id: string, message = "backend down"): OpinionSource {
  return { id, query: () => Promise.reject(new Error(message)) };
}

export function fakeNotifier() {
  return { notify: vi.fn(async (_notice: ApprovalNotice) => ({ handle: "handle-1" })) };
}

export function buildEngine(
  options: {
    config?: EngineConfig;
    sources?: OpinionSource[];
    sink?: AuditSink;
  } = {}
) {
  const config = options.config ?? testConfig();
  const clock = createClock();
  const log = quietLogger();
  const audit = new AuditLog(options.sink ?? new MemorySink(), { clock, log });
  const ledger = new SpendLedger();
  const policy = new PolicyGate(config.policy, ledger, { clock, log });
  const notifier = fakeNotifier();
  const approvals = new ApprovalCoordinator(config.approval, notifier, { clock, log });
  const bus = new InMemoryBus(log);
  const sources = options.sources ?? MEMBER_IDS.map((id) => voter(id, "approve"));
  const engine = new DecisionEngine({ config, sources, approvals, policy, audit, bus, clock, log });
  return { config, clock, log, audit, ledger, policy, notifier, approvals, bus, engine };
}
