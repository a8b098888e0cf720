import type { ApprovalStatus, ApprovalWaiter, Clock, DecisionRequest, Logger } from "@tiergate/shared";
import type { EngineConfig } from "../config.js";
import { deepFreeze } from "../util/freeze.js";
import type { ApprovalNotice, Notifier } from "./notifier.js";

export type ApprovalSettings = EngineConfig["approval"];

export type ApprovalDecision = "approve" | "reject";

export type ApprovalResponse = {
  decision: ApprovalDecision;
  responderId: string;
  comment?: string;
};

export type SubmitResult =
  | { accepted: true; waiter: ApprovalWaiter }
  | { accepted: false; reason: "unknown_request" | "already_resolved" | "unauthorized"; waiter?: ApprovalWaiter };

export type ApprovalPrompt = {
  subject: string;
  body: string;
  priority: ApprovalNotice["priority"];
};

type Slot = {
  state: ApprovalWaiter;
  expiryTimer?: ReturnType<typeof setTimeout>;
  reminderTimer?: ReturnType<typeof setTimeout>;
  settled: Promise<ApprovalWaiter>;
  resolve: (waiter: ApprovalWaiter) => void;
};

const APPROVE_WORDS = new Set(["approve", "approved", "yes", "ok", "y", "1"]);
const REJECT_WORDS = new Set(["reject", "rejected", "no", "deny", "n", "0"]);

// Terminal waiters kept around so late replies can still be recognised.
const MAX_RETAINED = 1000;

/** Maps a free-text reply from a chat channel onto a decision. */
export function parseApprovalDecision(text: string): ApprovalDecision | undefined {
  const normalized = text.trim().toLowerCase();
  if (APPROVE_WORDS.has(normalized)) return "approve";
  if (REJECT_WORDS.has(normalized)) return "reject";
  return undefined;
}

export function isTerminal(status: ApprovalStatus): boolean {
  return status !== "Pending";
}

/**
 * Human approval state machine, one waiter per request:
 *
 *   Pending → Approved | Rejected   (first accepted response)
 *   Pending → TimedOut              (expiresAt passed)
 *   Pending → Withdrawn             (request withdrawn)
 *
 * Each waiter leaves Pending exactly once; later responses are logged and ignored.
 */
export class ApprovalCoordinator {
  private slots = new Map<string, Slot>();
  private retired: string[] = [];

  constructor(
    private settings: ApprovalSettings,
    private notifier: Notifier,
    private env: { clock: Clock; log: Logger }
  ) {}

  /** Creates the Pending waiter, arms its timers and sends the prompt. */
  async open(request: DecisionRequest, prompt: ApprovalPrompt): Promise<ApprovalWaiter> {
    if (this.slots.has(request.id)) throw new Error(`Approval already opened for ${request.id}`);

    const nowMs = this.env.clock.nowMs();
    const requestDeadline = request.deadline ? Date.parse(request.deadline) : Infinity;
    const expiresMs = Math.min(nowMs + this.settings.timeoutMs, requestDeadline);
    let resolve: (waiter: ApprovalWaiter) => void = () => undefined;
    const settled = new Promise<ApprovalWaiter>((r) => {
      resolve = r;
    });
    const slot: Slot = {
      state: {
        requestId: request.id,
        status: "Pending",
        createdAt: new Date(nowMs).toISOString(),
        expiresAt: new Date(expiresMs).toISOString(),
      },
      settled,
      resolve,
    };
    this.slots.set(request.id, slot);

    slot.expiryTimer = setTimeout(() => {
      this.transition(request.id, "TimedOut", {});
    }, Math.max(0, expiresMs - nowMs));

    const { reminderAfterMs } = this.settings;
    if (reminderAfterMs > 0 && nowMs + reminderAfterMs < expiresMs) {
      slot.reminderTimer = setTimeout(() => {
        this.remind(request.id, prompt).catch((e) => this.env.log.error(`reminder for ${request.id} failed`, e));
      }, reminderAfterMs);
    }

    try {
      const { handle } = await this.notifier.notify({
        kind: "approval_request",
        requestId: request.id,
        subject: prompt.subject,
        body: prompt.body,
        expiresAt: slot.state.expiresAt,
        priority: prompt.priority,
      });
      slot.state.notificationHandle = handle;
    } catch (e) {
      // Still pending: a responder may answer through the API, otherwise it times out.
      this.env.log.error(`approval prompt for ${request.id} could not be delivered`, e);
    }
    return this.snapshot(slot);
  }

  /** Suspends until the waiter is terminal. Aborting `signal` withdraws it. */
  async wait(requestId: string, signal?: AbortSignal): Promise<ApprovalWaiter> {
    const slot = this.slots.get(requestId);
    if (!slot) throw new Error(`No approval waiter for ${requestId}`);
    if (isTerminal(slot.state.status)) return this.snapshot(slot);

    const onAbort = () => {
      this.withdraw(requestId);
    };
    if (signal?.aborted) onAbort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      return await slot.settled;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  submit(requestId: string, response: ApprovalResponse): SubmitResult {
    const slot = this.slots.get(requestId);
    if (!slot) return { accepted: false, reason: "unknown_request" };

    const { responders } = this.settings;
    if (responders.length && !responders.includes(response.responderId)) {
      this.env.log.warn(`unauthorized approval response for ${requestId} from ${response.responderId}`);
      return { accepted: false, reason: "unauthorized", waiter: this.snapshot(slot) };
    }

    const next = response.decision === "approve" ? "Approved" : "Rejected";
    if (!this.transition(requestId, next, { responderId: response.responderId, comment: response.comment })) {
      this.env.log.warn(
        `late or duplicate approval response for ${requestId} from ${response.responderId} ignored (already ${slot.state.status})`
      );
      return { accepted: false, reason: "already_resolved", waiter: this.snapshot(slot) };
    }
    return { accepted: true, waiter: this.snapshot(slot) };
  }

  withdraw(requestId: string): boolean {
    return this.transition(requestId, "Withdrawn", {});
  }

  get(requestId: string): ApprovalWaiter | undefined {
    const slot = this.slots.get(requestId);
    return slot ? this.snapshot(slot) : undefined;
  }

  pending(): ApprovalWaiter[] {
    return [...this.slots.values()].filter((s) => s.state.status === "Pending").map((s) => this.snapshot(s));
  }

  private async remind(requestId: string, prompt: ApprovalPrompt): Promise<void> {
    const slot = this.slots.get(requestId);
    if (!slot || slot.state.status !== "Pending") return;
    await this.notifier.notify({
      kind: "approval_reminder",
      requestId,
      subject: `Reminder: ${prompt.subject}`,
      body: prompt.body,
      expiresAt: slot.state.expiresAt,
      priority: prompt.priority,
    });
  }

  private transition(
    requestId: string,
    status: Exclude<ApprovalStatus, "Pending">,
    extras: { responderId?: string; comment?: string }
  ): boolean {
    const slot = this.slots.get(requestId);
    if (!slot || slot.state.status !== "Pending") return false;

    clearTimeout(slot.expiryTimer);
    clearTimeout(slot.reminderTimer);
    slot.state.status = status;
    if (extras.responderId !== undefined) {
      slot.state.responderId = extras.responderId;
      slot.state.respondedAt = this.env.clock.nowIso();
    }
    if (extras.comment !== undefined) slot.state.comment = extras.comment;

    this.env.log.info(`approval ${requestId}: ${status}${extras.responderId ? ` by ${extras.responderId}` : ""}`);
    slot.resolve(this.snapshot(slot));
    this.retire(requestId);
    return true;
  }

  private retire(requestId: string): void {
    this.retired.push(requestId);
    while (this.retired.length > MAX_RETAINED) {
      const oldest = this.retired.shift();
      if (oldest !== undefined) this.slots.delete(oldest);
    }
  }

  private snapshot(slot: Slot): ApprovalWaiter {
    return deepFreeze({ ...slot.state });
  }
}
