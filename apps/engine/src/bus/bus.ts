import type { ApprovalWaiter, ConsensusResult, Verdict } from "@tiergate/shared";

export type TopicPayloads = {
  CONSENSUS: ConsensusResult;
  APPROVALS: ApprovalWaiter;
  VERDICTS: Verdict;
};

export type Topic = keyof TopicPayloads;

export interface Bus {
  publish<K extends Topic>(topic: K, payload: TopicPayloads[K]): void;
  subscribe<K extends Topic>(topic: K, handler: (payload: TopicPayloads[K]) => void): () => void;
}
