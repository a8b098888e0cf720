import { describe, expect, it, vi } from "vitest";
import type { Verdict } from "@tiergate/shared";
import { MemorySink, type AuditSink } from "../src/audit/auditLog.js";
import { AuditWriteError, MalformedRequestError } from "../src/errors.js";
import { MEMBER_IDS, buildEngine, testConfig, voter } from "./helpers.js";

const generous = testConfig({ policy: { perTxLimit: 10_000, dailyLimit: 100_000, multiSigThreshold: 50_000 } });

describe("DecisionEngine", () => {
  it("approves a small spend on its own and audits it first", async () => {
    const { engine, audit, bus } = buildEngine();
    const auditedAtPublish: Array<boolean | undefined> = [];
    bus.subscribe("VERDICTS", (v) => auditedAtPublish.push(audit.get(v.auditEntryId)?.verdict.approved));

    const verdict = await engine.submit({ id: "r-1", actionType: "spend", amount: 50 });

    expect(verdict).toMatchObject({ requestId: "r-1", approved: true, tier: "Autonomous", reason: "autonomous: amount 50 below 100" });
    expect(auditedAtPublish).toEqual([true]);
    const entry = audit.get(verdict.auditEntryId);
    expect(entry?.requestId).toBe("r-1");
    expect(entry?.policy?.passed).toBe(true);
    expect(entry?.consensus).toBeUndefined();
    expect(entry?.tierBasis).toEqual({
      autonomousBelow: 100,
      humanAbove: 2000,
      defaults: { venture_change: "Council", generic: "Autonomous" },
    });
  });

  it("generates an id when the caller gives none", async () => {
    const { engine } = buildEngine();
    const verdict = await engine.submit({ actionType: "generic" });
    expect(verdict.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(verdict.reason).toBe("autonomous by default for generic");
  });

  it("asks the council in the middle band", async () => {
    const { engine, audit } = buildEngine();
    const verdict = await engine.submit({ id: "r-1", actionType: "spend", amount: 500 });

    expect(verdict).toMatchObject({ approved: true, tier: "Council", reason: "weighted score 1.000 >= 0.32" });
    expect(audit.get(verdict.auditEntryId)?.consensus?.opinions.map((o) => o.sourceId)).toEqual(MEMBER_IDS);
  });

  it("rejects what the council rejects and records the gate closing", async () => {
    const { engine, audit } = buildEngine({ sources: MEMBER_IDS.map((id) => voter(id, "reject")) });
    const verdict = await engine.submit({ id: "r-1", actionType: "spend", amount: 500 });

    expect(verdict).toMatchObject({ approved: false, tier: "Council", reason: "weighted score -1.000 < 0.32" });
    expect(audit.get(verdict.auditEntryId)?.policy?.violation?.constraint).toBe("verdict_not_approved");
  });

  it("names the policy constraint that blocked an approved tier", async () => {
    const { engine } = buildEngine();
    const verdict = await engine.submit({ id: "r-1", actionType: "spend", amount: 1500 });

    expect(verdict.approved).toBe(false);
    expect(verdict.tier).toBe("Council");
    expect(verdict.reason).toBe("policy violation (per_tx_limit): amount 1500 exceeds per-transaction limit 1000");
  });

  it("waits for a human above the upper threshold", async () => {
    const { engine, approvals } = buildEngine({ config: generous });
    const pending = engine.submit({ id: "h-1", actionType: "spend", amount: 3000 });
    await vi.waitFor(() => expect(approvals.pending()).toHaveLength(1));

    expect(approvals.submit("h-1", { decision: "approve", responderId: "alice" }).accepted).toBe(true);
    expect(await pending).toMatchObject({ approved: true, tier: "Human", reason: "approved by alice" });
  });

  it("fails closed when nobody answers in time", async () => {
    const config = testConfig({ approval: { timeoutMs: 20 }, policy: { perTxLimit: 10_000 } });
    const { engine, audit } = buildEngine({ config });
    const verdict = await engine.submit({ id: "h-1", actionType: "spend", amount: 3000 });

    expect(verdict).toMatchObject({ approved: false, tier: "Human", reason: "approval timed out" });
    expect(audit.get(verdict.auditEntryId)?.approval?.status).toBe("TimedOut");
  });

  it("needs both the council and a human for self-modification", async () => {
    const { engine, approvals, notifier, audit } = buildEngine();
    const pending = engine.submit({
      id: "sm-1",
      actionType: "self_modification",
      payload: { summary: "raise the daily limit" },
    });
    await vi.waitFor(() => expect(approvals.pending()).toHaveLength(1));

    const notice = notifier.notify.mock.calls[0]?.[0];
    expect(notice?.subject).toBe("Self-modification approval needed: sm-1");
    expect(notice?.priority).toBe("urgent");
    expect(notice?.body.startsWith("raise the daily limit\n\nCouncil vote: 4 approve, 0 reject, 0 abstain")).toBe(true);

    approvals.submit("sm-1", { decision: "approve", responderId: "alice" });
    const verdict = await pending;
    expect(verdict).toMatchObject({ approved: true, tier: "SelfModification" });
    const entry = audit.get(verdict.auditEntryId);
    expect(entry?.consensus?.outcome).toBe("approved");
    expect(entry?.approval?.status).toBe("Approved");
  });

  it("does not bother a human when the council rejects self-modification", async () => {
    const { engine, notifier } = buildEngine({ sources: MEMBER_IDS.map((id) => voter(id, "reject")) });
    const verdict = await engine.submit({ id: "sm-1", actionType: "self_modification" });

    expect(verdict).toMatchObject({ approved: false, reason: "council: weighted score -1.000 < 0.32" });
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it("ends a withdrawn human wait with an audited rejection", async () => {
    const { engine, approvals, audit } = buildEngine({ config: generous });
    const { verdict } = engine.begin({ id: "h-2", actionType: "spend", amount: 3000 });
    await vi.waitFor(() => expect(approvals.pending()).toHaveLength(1));

    expect(engine.withdraw("h-2")).toBe(true);
    const result = await verdict;
    expect(result).toMatchObject({ approved: false, reason: "withdrawn" });
    expect(audit.get(result.auditEntryId)?.approval?.status).toBe("Withdrawn");
    expect(engine.withdraw("h-2")).toBe(false);
  });

  it("withdraws during deliberation", async () => {
    const sources = MEMBER_IDS.map((id) => voter(id, "approve", 0.9, 60_000));
    const { engine, audit } = buildEngine({ sources });
    const { verdict } = engine.begin({ id: "c-1", actionType: "spend", amount: 500 });
    engine.withdraw("c-1");

    const result = await verdict;
    expect(result).toMatchObject({ approved: false, tier: "Council", reason: "withdrawn" });
    expect(audit.byRequest("c-1")).toHaveLength(1);
  });

  it("rejects a request withdrawn while the policy gate waits for its bucket", async () => {
    const { engine, policy, ledger, audit } = buildEngine();
    const check = policy.check.bind(policy);
    let resume: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      resume = resolve;
    });
    const gated = vi.spyOn(policy, "check").mockImplementationOnce(async (request, tierApproved) => {
      await held;
      return check(request, tierApproved);
    });

    const { verdict } = engine.begin({ id: "w-1", actionType: "spend", amount: 50 });
    await vi.waitFor(() => expect(gated).toHaveBeenCalledTimes(1));
    expect(engine.withdraw("w-1")).toBe(true);
    resume();

    expect(await verdict).toMatchObject({ approved: false, tier: "Autonomous", reason: "withdrawn" });
    expect(ledger.dailyTotal("spend", Date.now())).toBe(0n);
    expect(audit.byRequest("w-1")[0]?.policy?.violation?.constraint).toBe("verdict_not_approved");
  });

  it("refuses malformed and duplicate requests before auditing anything", async () => {
    const { engine, audit } = buildEngine();
    await expect(engine.submit({ actionType: "spend", amount: -5 })).rejects.toBeInstanceOf(MalformedRequestError);
    await expect(engine.submit({ actionType: "teleport" })).rejects.toBeInstanceOf(MalformedRequestError);
    await expect(engine.submit({ actionType: "spend" })).rejects.toThrow("amount is required for spend");
    expect(audit.all()).toHaveLength(0);

    await engine.submit({ id: "dup", actionType: "spend", amount: 50 });
    await expect(engine.submit({ id: "dup", actionType: "spend", amount: 50 })).rejects.toThrow("duplicate request id dup");
    expect(audit.all()).toHaveLength(1);
  });

  it("remembers ids already in the audit log", async () => {
    const sink = new MemorySink();
    await buildEngine({ sink }).engine.submit({ id: "r-1", actionType: "spend", amount: 50 });
    await expect(buildEngine({ sink }).engine.submit({ id: "r-1", actionType: "spend", amount: 50 })).rejects.toBeInstanceOf(
      MalformedRequestError
    );
  });

  it("releases the reservation and returns no verdict when the audit write fails", async () => {
    const failing: AuditSink = {
      load: () => [],
      write: () => {
        throw new Error("disk full");
      },
    };
    const { engine, policy, bus } = buildEngine({ sink: failing });
    const release = vi.spyOn(policy, "release");
    const published: Verdict[] = [];
    bus.subscribe("VERDICTS", (v) => published.push(v));

    await expect(engine.submit({ id: "r-1", actionType: "spend", amount: 500 })).rejects.toBeInstanceOf(AuditWriteError);
    expect(release).toHaveBeenCalledTimes(1);
    expect(published).toEqual([]);
  });

  it("keeps per-tier counters", async () => {
    const { engine } = buildEngine();
    await engine.submit({ id: "r-1", actionType: "spend", amount: 50 });
    await engine.submit({ id: "r-2", actionType: "spend", amount: 1500 });

    const state = engine.state();
    expect(state.decisions).toMatchObject({ total: 2, approved: 1, rejected: 1 });
    expect(state.decisions.byTier).toEqual({ Autonomous: 1, Council: 1, Human: 0, SelfModification: 0 });
    expect(state.inFlight).toBe(0);
    expect(state.pendingApprovals).toBe(0);
    expect(state.lastVerdict?.requestId).toBe("r-2");
  });
});
