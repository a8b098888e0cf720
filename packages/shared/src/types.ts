export type ActionType = "spend" | "venture_change" | "self_modification" | "generic";

export type Tier = "Autonomous" | "Council" | "Human" | "SelfModification";

export type DecisionRequest = {
  id: string;
  actionType: ActionType;
  amount?: number;            // decisive for tiering
  currency: string;           // e.g. "USDC"
  destination?: string;       // transfer target for spend
  payload: Record<string, unknown>;
  requestedAt: string;        // ISO
  deadline?: string;          // ISO, hard cutoff
  signers?: string[];         // co-signers for the multi-sig constraint
};

export type Vote = "approve" | "reject" | "abstain";

// What an opinion source adapter hands back, before the engine stamps it.
export type OpinionDraft = {
  vote: Vote;
  confidence: number;         // 0..1
  rationale: string;
};

export type Opinion = OpinionDraft & {
  sourceId: string;
  receivedAt: string;         // ISO
};

export type SourceFailure = {
  sourceId: string;
  kind: "timeout" | "error" | "invalid";
  message: string;
};

export type ConsensusOutcome = "approved" | "rejected" | "tied_resolved";

export type ConsensusRule = {
  threshold: number;          // consensus fraction, e.g. 0.66
  quorum: number;             // minimum opinions collected
  chairmanId?: string;
};

export type ConsensusResult = {
  requestId: string;
  opinions: Opinion[];
  requestedSources: string[];
  failures: SourceFailure[];
  quorum: number;
  weightedScore: number;      // -1..1
  thresholdUsed: number;
  requiredScore: number;      // 2*threshold - 1
  approveCount: number;
  rejectCount: number;
  chairmanId?: string;
  outcome: ConsensusOutcome;
  tieBreak?: { sourceId: string; vote: Vote };
  reason: string;
  startedAt: string;
  finalizedAt: string;
};

export type ApprovalStatus = "Pending" | "Approved" | "Rejected" | "TimedOut" | "Withdrawn";

export type ApprovalWaiter = {
  requestId: string;
  status: ApprovalStatus;
  createdAt: string;
  expiresAt: string;
  responderId?: string;
  respondedAt?: string;
  comment?: string;
  notificationHandle?: string;
};

export type PolicyConstraint =
  | "verdict_not_approved"
  | "whitelist_membership"
  | "per_tx_limit"
  | "daily_limit"
  | "weekly_limit"
  | "multi_sig_required";

export type ConstraintEvaluation = {
  constraint: PolicyConstraint;
  passed: boolean;
  skipped?: boolean;          // not applicable to this request
  inputs: Record<string, string | number | boolean | null>;
};

export type PolicyViolation = {
  constraint: PolicyConstraint;
  message: string;
};

export type PolicyCheck = {
  passed: boolean;
  evaluated: ConstraintEvaluation[];
  violation?: PolicyViolation;
  reservationId?: string;
};

export type Verdict = {
  requestId: string;
  approved: boolean;
  tier: Tier;
  reason: string;
  auditEntryId: string;
};

export type TierBasis = {
  autonomousBelow: number;
  humanAbove: number;
  defaults: Partial<Record<ActionType, Tier>>;
};

export type AuditEntry = {
  entryId: string;
  seq: number;
  requestId: string;
  tier: Tier;
  tierBasis: TierBasis;
  request: DecisionRequest;
  consensus?: ConsensusResult;
  approval?: ApprovalWaiter;
  policy?: PolicyCheck;
  verdict: { approved: boolean; reason: string };
  recordedAt: string;
  prevHash: string | null;
  hash: string;
};
