import { z } from "zod";

const isoString = z.string().datetime({ offset: true });

export const ActionTypeSchema = z.enum(["spend", "venture_change", "self_modification", "generic"]);

export const TierSchema = z.enum(["Autonomous", "Council", "Human", "SelfModification"]);

export const VoteSchema = z.enum(["approve", "reject", "abstain"]);

export const OpinionDraftSchema = z
  .object({
    vote: VoteSchema,
    confidence: z.number().min(0).max(1),
    rationale: z.string(),
  })
  .strict();

// Largest amount or limit accepted; keeps every value exact at six decimals.
export const MAX_AMOUNT = 1e15;

// What callers submit; id and requestedAt are filled in by the engine when absent.
export const DecisionRequestInputSchema = z
  .object({
    id: z.string().min(1).optional(),
    actionType: ActionTypeSchema,
    amount: z.number().finite().nonnegative().max(MAX_AMOUNT).optional(),
    currency: z.string().min(1).default("USDC"),
    destination: z.string().min(1).optional(),
    payload: z.record(z.unknown()).default({}),
    requestedAt: isoString.optional(),
    deadline: isoString.optional(),
    signers: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type DecisionRequestInput = z.input<typeof DecisionRequestInputSchema>;

export const ApprovalResponseSchema = z.object({
  decision: z.string().min(1),
  responderId: z.string().min(1),
  comment: z.string().optional(),
});

export type ApprovalResponseInput = z.infer<typeof ApprovalResponseSchema>;

/** Flattens a zod error into `path: message` fragments. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
