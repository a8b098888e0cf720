import type { ActionType, DecisionRequest, OpinionDraft } from "@tiergate/shared";

export type OpinionQuery = {
  requestId: string;
  question: string;
  actionType: ActionType;
  amount?: number;
  currency: string;
  destination?: string;
  payload: Record<string, unknown>;
  deadline: string;           // ISO; answer before this or not at all
};

/**
 * One council member. Adapters turn whatever their backend returns into a
 * strict OpinionDraft, or throw; retries are the adapter's own business.
 */
export interface OpinionSource {
  id: string;
  query(query: OpinionQuery, signal: AbortSignal): Promise<OpinionDraft>;
}

export function describeRequest(request: DecisionRequest): string {
  const raw = request.payload["summary"];
  const summary = typeof raw === "string" ? raw : undefined;
  const amount = request.amount !== undefined ? ` of ${request.amount} ${request.currency}` : "";
  const target = request.destination ? ` to ${request.destination}` : "";
  return summary ?? `${request.actionType.replace(/_/g, " ")}${amount}${target}`;
}

export function buildOpinionQuery(request: DecisionRequest, deadline: string): OpinionQuery {
  return {
    requestId: request.id,
    question: `Should we proceed: ${describeRequest(request)}?`,
    actionType: request.actionType,
    amount: request.amount,
    currency: request.currency,
    destination: request.destination,
    payload: request.payload,
    deadline,
  };
}
