import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { AuditEntry, Clock, Logger, Tier } from "@tiergate/shared";
import { AuditWriteError } from "../errors.js";
import { deepFreeze } from "../util/freeze.js";
import { computeEntryHash } from "./hashChain.js";

/** Synchronous line store. `write` must not return before the line is durable. */
export interface AuditSink {
  load(): string[];
  write(line: string): void;
}

export class JsonlFileSink implements AuditSink {
  constructor(private filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  load(): string[] {
    if (!fs.existsSync(this.filePath)) return [];
    return fs
      .readFileSync(this.filePath, "utf-8")
      .split("\n")
      .filter((l) => l.trim() !== "");
  }

  write(line: string): void {
    fs.appendFileSync(this.filePath, line + "\n", "utf-8");
  }
}

export class MemorySink implements AuditSink {
  readonly lines: string[] = [];

  load(): string[] {
    return [...this.lines];
  }

  write(line: string): void {
    this.lines.push(line);
  }
}

export type AuditDraft = Omit<AuditEntry, "entryId" | "seq" | "recordedAt" | "prevHash" | "hash">;

export type ChainReport = { ok: true; count: number } | { ok: false; count: number; brokenAt: number; reason: string };

function isAuditEntry(value: unknown): value is AuditEntry {
  if (value === null || typeof value !== "object") return false;
  return (
    typeof Reflect.get(value, "entryId") === "string" &&
    typeof Reflect.get(value, "seq") === "number" &&
    typeof Reflect.get(value, "requestId") === "string" &&
    typeof Reflect.get(value, "hash") === "string"
  );
}

/**
 * Append-only, hash-chained record of every verdict. There is no update or
 * delete; an entry is written before its verdict leaves the engine.
 */
export class AuditLog {
  private entries: AuditEntry[] = [];

  constructor(
    private sink: AuditSink,
    private env: { clock: Clock; log: Logger }
  ) {
    for (const [i, line] of sink.load().entries()) {
      const parsed: unknown = JSON.parse(line);
      if (!isAuditEntry(parsed)) throw new Error(`Unreadable audit line ${i + 1}`);
      this.entries.push(deepFreeze(parsed));
    }
    if (this.entries.length) env.log.info(`audit log loaded ${this.entries.length} entries`);
  }

  append(draft: AuditDraft): AuditEntry {
    const last = this.entries.at(-1);
    const unhashed = {
      ...draft,
      entryId: uuidv4(),
      seq: last ? last.seq + 1 : 1,
      recordedAt: this.env.clock.nowIso(),
      prevHash: last ? last.hash : null,
    };
    const entry: AuditEntry = { ...unhashed, hash: computeEntryHash(unhashed) };
    try {
      this.sink.write(JSON.stringify(entry));
    } catch (e) {
      this.env.log.error(`audit write failed for ${draft.requestId}`, e);
      throw new AuditWriteError(`Audit entry for ${draft.requestId} could not be written`, { cause: e });
    }
    this.entries.push(deepFreeze(entry));
    return entry;
  }

  get(entryId: string): AuditEntry | undefined {
    return this.entries.find((e) => e.entryId === entryId);
  }

  byRequest(requestId: string): AuditEntry[] {
    return this.entries.filter((e) => e.requestId === requestId);
  }

  /** Inclusive bounds on `recordedAt`; either side may be open. */
  byTimeRange(from?: string, to?: string): AuditEntry[] {
    const lo = from ? Date.parse(from) : -Infinity;
    const hi = to ? Date.parse(to) : Infinity;
    return this.entries.filter((e) => {
      const t = Date.parse(e.recordedAt);
      return t >= lo && t <= hi;
    });
  }

  byTier(tier: Tier): AuditEntry[] {
    return this.entries.filter((e) => e.tier === tier);
  }

  tail(n: number): AuditEntry[] {
    return n > 0 ? this.entries.slice(-n) : [];
  }

  all(): readonly AuditEntry[] {
    return this.entries;
  }

  verifyChain(): ChainReport {
    let prevHash: string | null = null;
    let expectedSeq = 1;
    for (const entry of this.entries) {
      const { hash, ...rest } = entry;
      const broken = (reason: string): ChainReport => ({
        ok: false,
        count: this.entries.length,
        brokenAt: entry.seq,
        reason,
      });
      if (entry.seq !== expectedSeq) return broken(`expected seq ${expectedSeq}`);
      if (entry.prevHash !== prevHash) return broken("prevHash does not match the previous entry");
      if (computeEntryHash(rest) !== hash) return broken("hash does not match entry contents");
      prevHash = hash;
      expectedSeq += 1;
    }
    return { ok: true, count: this.entries.length };
  }
}
