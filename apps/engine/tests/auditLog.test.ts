import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createClock, type Tier } from "@tiergate/shared";
import { AuditLog, JsonlFileSink, MemorySink, type AuditDraft, type AuditSink } from "../src/audit/auditLog.js";
import { stableStringify } from "../src/audit/hashChain.js";
import { AuditWriteError } from "../src/errors.js";
import { makeRequest, quietLogger } from "./helpers.js";

function draft(requestId: string, tier: Tier = "Autonomous", approved = true): AuditDraft {
  return {
    requestId,
    tier,
    tierBasis: { autonomousBelow: 100, humanAbove: 2000, defaults: {} },
    request: makeRequest({ id: requestId }),
    verdict: { approved, reason: approved ? "ok" : "no" },
  };
}

function env() {
  return { clock: createClock(), log: quietLogger() };
}

describe("stableStringify", () => {
  it("sorts keys and drops undefined members", () => {
    expect(stableStringify({ b: 1, a: undefined, c: [1, "x", { z: null, y: true }] })).toBe(
      '{"b":1,"c":[1,"x",{"y":true,"z":null}]}'
    );
    expect(stableStringify({ x: 1, y: 2 })).toBe(stableStringify({ y: 2, x: 1 }));
  });
});

describe("AuditLog", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("chains entries by sequence and previous hash", () => {
    const log = new AuditLog(new MemorySink(), env());
    const first = log.append(draft("r1"));
    const second = log.append(draft("r2"));

    expect(first.seq).toBe(1);
    expect(first.prevHash).toBeNull();
    expect(second.seq).toBe(2);
    expect(second.prevHash).toBe(first.hash);
    expect(first.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(log.verifyChain()).toEqual({ ok: true, count: 2 });
  });

  it("freezes what it stores", () => {
    const log = new AuditLog(new MemorySink(), env());
    const entry = log.append(draft("r1"));
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.request)).toBe(true);
    expect(Object.isFrozen(entry.verdict)).toBe(true);
  });

  it("answers queries by request, tier, time and tail", () => {
    const log = new AuditLog(new MemorySink(), env());
    log.append(draft("r1", "Autonomous"));
    vi.setSystemTime(new Date("2026-01-01T01:00:00.000Z"));
    log.append(draft("r2", "Council", false));
    vi.setSystemTime(new Date("2026-01-01T02:00:00.000Z"));
    log.append(draft("r3", "Human"));

    expect(log.byRequest("r2").map((e) => e.seq)).toEqual([2]);
    expect(log.byTier("Human").map((e) => e.requestId)).toEqual(["r3"]);
    expect(log.byTimeRange("2026-01-01T00:30:00.000Z", "2026-01-01T02:00:00.000Z").map((e) => e.requestId)).toEqual(["r2", "r3"]);
    expect(log.byTimeRange(undefined, "2026-01-01T00:00:00.000Z").map((e) => e.requestId)).toEqual(["r1"]);
    expect(log.tail(2).map((e) => e.requestId)).toEqual(["r2", "r3"]);
    expect(log.tail(0)).toEqual([]);
  });

  it("reloads from its sink and continues the chain", () => {
    const sink = new MemorySink();
    const writer = new AuditLog(sink, env());
    writer.append(draft("r1"));
    writer.append(draft("r2"));

    const reloaded = new AuditLog(sink, env());
    expect(reloaded.verifyChain()).toEqual({ ok: true, count: 2 });
    const third = reloaded.append(draft("r3"));
    expect(third.seq).toBe(3);
    expect(third.prevHash).toBe(writer.all()[1]?.hash);
  });

  it("names the first entry whose contents were altered", () => {
    const sink = new MemorySink();
    const log = new AuditLog(sink, env());
    log.append(draft("r1"));
    log.append(draft("r2", "Council", false));
    log.append(draft("r3"));

    sink.lines[1] = (sink.lines[1] ?? "").replace('"approved":false', '"approved":true');

    expect(new AuditLog(sink, env()).verifyChain()).toEqual({
      ok: false,
      count: 3,
      brokenAt: 2,
      reason: "hash does not match entry contents",
    });
  });

  it("throws AuditWriteError and keeps nothing when the sink fails", () => {
    const failing: AuditSink = {
      load: () => [],
      write: () => {
        throw new Error("disk full");
      },
    };
    const log = new AuditLog(failing, env());
    expect(() => log.append(draft("r1"))).toThrow(AuditWriteError);
    expect(log.all()).toHaveLength(0);
  });
});

describe("JsonlFileSink", () => {
  let dir = "";

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tiergate-audit-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per entry and reads them back", () => {
    const file = path.join(dir, "nested", "audit.jsonl");
    const log = new AuditLog(new JsonlFileSink(file), env());
    log.append(draft("r1"));
    log.append(draft("r2"));

    const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    const reloaded = new AuditLog(new JsonlFileSink(file), env());
    expect(reloaded.all().map((e) => e.requestId)).toEqual(["r1", "r2"]);
    expect(reloaded.verifyChain().ok).toBe(true);
  });
});
