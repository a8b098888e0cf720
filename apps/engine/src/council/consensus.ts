import type { ConsensusResult, ConsensusRule, Opinion, SourceFailure, Vote } from "@tiergate/shared";

const VOTE_VALUE: Record<Vote, number> = { approve: 1, reject: -1, abstain: 0 };

export const INSUFFICIENT_OPINIONS = "insufficient opinions";
export const CHAIRMAN_UNAVAILABLE = "chairman unavailable";

/** Score a consensus fraction maps to on the [-1, 1] scale. */
export function requiredScore(threshold: number): number {
  return Math.round((2 * threshold - 1) * 1e9) / 1e9;
}

/** sum(vote * confidence) / sum(confidence); 0 when nobody expressed any confidence. */
export function weightedScore(opinions: readonly Opinion[]): number {
  const total = opinions.reduce((acc, o) => acc + o.confidence, 0);
  if (total === 0) return 0;
  return opinions.reduce((acc, o) => acc + VOTE_VALUE[o.vote] * o.confidence, 0) / total;
}

export type ConsensusInput = {
  requestId: string;
  opinions: Opinion[];
  requestedSources: string[];
  failures: SourceFailure[];
  rule: ConsensusRule;
  startedAt: string;
  finalizedAt: string;
};

/**
 * Aggregates collected opinions into a result. Depends only on the opinions and
 * the rule, so replaying a stored result must reproduce its outcome.
 */
export function computeConsensus(input: ConsensusInput): ConsensusResult {
  const { opinions, rule } = input;
  const approveCount = opinions.filter((o) => o.vote === "approve").length;
  const rejectCount = opinions.filter((o) => o.vote === "reject").length;
  const score = weightedScore(opinions);
  const required = requiredScore(rule.threshold);

  const base = {
    requestId: input.requestId,
    opinions,
    requestedSources: input.requestedSources,
    failures: input.failures,
    quorum: rule.quorum,
    weightedScore: score,
    thresholdUsed: rule.threshold,
    requiredScore: required,
    approveCount,
    rejectCount,
    chairmanId: rule.chairmanId,
    startedAt: input.startedAt,
    finalizedAt: input.finalizedAt,
  };

  if (opinions.length < rule.quorum) {
    return { ...base, outcome: "rejected", reason: INSUFFICIENT_OPINIONS };
  }
  if (score >= required) {
    return { ...base, outcome: "approved", reason: `weighted score ${score.toFixed(3)} >= ${required}` };
  }
  if (approveCount !== rejectCount) {
    return { ...base, outcome: "rejected", reason: `weighted score ${score.toFixed(3)} < ${required}` };
  }

  const chairman = rule.chairmanId ? opinions.find((o) => o.sourceId === rule.chairmanId) : undefined;
  if (!chairman) {
    return { ...base, outcome: "rejected", reason: CHAIRMAN_UNAVAILABLE };
  }
  return {
    ...base,
    outcome: "tied_resolved",
    tieBreak: { sourceId: chairman.sourceId, vote: chairman.vote },
    reason: `tie broken by chairman ${chairman.sourceId} (${chairman.vote})`,
  };
}

export function isApproved(result: Pick<ConsensusResult, "outcome" | "tieBreak">): boolean {
  if (result.outcome === "approved") return true;
  return result.outcome === "tied_resolved" && result.tieBreak?.vote === "approve";
}

/** Human-readable summary of a deliberation, used in approval prompts. */
export function synthesize(result: ConsensusResult): string {
  const abstain = result.opinions.length - result.approveCount - result.rejectCount;
  const lines = [
    `Council vote: ${result.approveCount} approve, ${result.rejectCount} reject, ${abstain} abstain`,
    `Weighted score: ${result.weightedScore.toFixed(2)} (required ${result.requiredScore})`,
    `Decision: ${isApproved(result) ? "APPROVE" : "REJECT"} (${result.reason})`,
  ];
  const considered = result.opinions.filter((o) => o.vote !== "abstain");
  if (considered.length) {
    lines.push("", "Key considerations:");
    for (const o of considered) {
      const excerpt = o.rationale.length > 100 ? `${o.rationale.slice(0, 100)}...` : o.rationale;
      lines.push(`- ${o.sourceId}: ${excerpt}`);
    }
  }
  if (result.failures.length) {
    lines.push("", `No response: ${result.failures.map((f) => `${f.sourceId} (${f.kind})`).join(", ")}`);
  }
  return lines.join("\n");
}
