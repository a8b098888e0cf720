import {
  OpinionDraftSchema,
  describeIssues,
  type Clock,
  type ConsensusResult,
  type DecisionRequest,
  type Logger,
  type Opinion,
  type OpinionDraft,
  type SourceFailure,
} from "@tiergate/shared";
import type { EngineConfig } from "../config.js";
import { effectiveQuorum } from "../config.js";
import { computeConsensus } from "./consensus.js";
import { buildOpinionQuery, type OpinionQuery, type OpinionSource } from "./source.js";

export type CouncilSettings = Pick<
  EngineConfig["council"],
  "threshold" | "quorum" | "chairmanId" | "sourceTimeoutMs" | "deliberationTimeoutMs"
>;

export type DeliberationEnv = {
  clock: Clock;
  log: Logger;
};

type QueryOutcome = { ok: true; draft: OpinionDraft } | { ok: false; failure: SourceFailure };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs one source under its own timeout. Settles exactly once: with the
 * validated draft, or with a failure when the source errors, answers with
 * something invalid, runs out of time, or the round is closed under it.
 */
function querySource(
  source: OpinionSource,
  query: OpinionQuery,
  timeoutMs: number,
  round: AbortSignal
): Promise<QueryOutcome> {
  const controller = new AbortController();
  return new Promise<QueryOutcome>((resolve) => {
    let done = false;
    const settle = (outcome: QueryOutcome) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      round.removeEventListener("abort", onRoundClosed);
      if (!outcome.ok) controller.abort();
      resolve(outcome);
    };
    const fail = (kind: SourceFailure["kind"], message: string) =>
      settle({ ok: false, failure: { sourceId: source.id, kind, message } });

    const onRoundClosed = () => fail("timeout", "deliberation closed before a response");
    const timer = setTimeout(() => fail("timeout", `no response within ${timeoutMs}ms`), timeoutMs);
    if (round.aborted) {
      onRoundClosed();
      return;
    }
    round.addEventListener("abort", onRoundClosed, { once: true });

    Promise.resolve()
      .then(() => source.query(query, controller.signal))
      .then(
        (raw) => {
          const parsed = OpinionDraftSchema.safeParse(raw);
          if (parsed.success) settle({ ok: true, draft: parsed.data });
          else fail("invalid", describeIssues(parsed.error));
        },
        (err) => fail("error", errorMessage(err))
      );
  });
}

/**
 * Fans the request out to every source at once and aggregates whatever came
 * back before the deliberation deadline (or before `signal` fires). Late
 * answers are dropped; a missing answer is never counted as a vote.
 */
export async function deliberate(
  request: DecisionRequest,
  sources: readonly OpinionSource[],
  council: CouncilSettings,
  env: DeliberationEnv,
  signal?: AbortSignal
): Promise<ConsensusResult> {
  const startedAt = env.clock.nowIso();
  const startMs = env.clock.nowMs();
  const requestDeadline = request.deadline ? Date.parse(request.deadline) : Infinity;
  const deadlineMs = Math.min(startMs + council.deliberationTimeoutMs, requestDeadline);
  const budgetMs = Math.max(0, deadlineMs - startMs);
  const query = buildOpinionQuery(request, new Date(deadlineMs).toISOString());

  const round = new AbortController();
  const closeRound = () => round.abort();
  const deadlineTimer = setTimeout(closeRound, budgetMs);
  if (signal?.aborted) closeRound();
  signal?.addEventListener("abort", closeRound, { once: true });

  const received = new Map<string, Opinion>();
  const failures = new Map<string, SourceFailure>();
  const perSourceMs = Math.min(council.sourceTimeoutMs, budgetMs);

  env.log.debug(`deliberation ${request.id}: querying ${sources.length} sources, budget ${budgetMs}ms`);

  try {
    await Promise.all(
      sources.map(async (source) => {
        const outcome = await querySource(source, query, perSourceMs, round.signal);
        if (outcome.ok) {
          received.set(source.id, { ...outcome.draft, sourceId: source.id, receivedAt: env.clock.nowIso() });
        } else {
          failures.set(source.id, outcome.failure);
          env.log.warn(`source ${source.id} gave no opinion on ${request.id}: ${outcome.failure.kind}`, outcome.failure.message);
        }
      })
    );
  } finally {
    clearTimeout(deadlineTimer);
    signal?.removeEventListener("abort", closeRound);
    round.abort();
  }

  const result = computeConsensus({
    requestId: request.id,
    opinions: sources.flatMap((s) => received.get(s.id) ?? []),
    requestedSources: sources.map((s) => s.id),
    failures: sources.flatMap((s) => failures.get(s.id) ?? []),
    rule: {
      threshold: council.threshold,
      quorum: effectiveQuorum(council, sources.length),
      chairmanId: council.chairmanId,
    },
    startedAt,
    finalizedAt: env.clock.nowIso(),
  });

  env.log.info(
    `deliberation ${request.id}: ${result.outcome} (${result.opinions.length}/${sources.length} opinions, score ${result.weightedScore.toFixed(3)})`
  );
  return result;
}
