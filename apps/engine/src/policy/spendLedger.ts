import { v4 as uuidv4 } from "uuid";
import type { ActionType, AuditEntry } from "@tiergate/shared";
import { utcDay } from "../util/time.js";
import { toUnits } from "./units.js";

export const WEEK_MS = 7 * 24 * 3600_000;

type Reservation = {
  id: string;
  actionType: ActionType;
  units: bigint;
  atMs: number;
};

/**
 * Approved amounts per action type, in minor units. Reservations are taken by
 * the policy gate under the bucket lock and released again if the audit write
 * fails. Nothing older than the trailing week is kept.
 */
export class SpendLedger {
  private reservations = new Map<string, Reservation>();

  get size(): number {
    return this.reservations.size;
  }

  reserve(actionType: ActionType, units: bigint, atMs: number): string {
    this.prune(atMs);
    const id = uuidv4();
    this.reservations.set(id, { id, actionType, units, atMs });
    return id;
  }

  release(reservationId: string): boolean {
    return this.reservations.delete(reservationId);
  }

  /** Same UTC calendar day as `nowMs`. */
  dailyTotal(actionType: ActionType, nowMs: number): bigint {
    const day = utcDay(new Date(nowMs).toISOString());
    return this.sum(actionType, nowMs, (r) => r.atMs <= nowMs && utcDay(new Date(r.atMs).toISOString()) === day);
  }

  /** Trailing seven days ending at `nowMs`. */
  weeklyTotal(actionType: ActionType, nowMs: number): bigint {
    return this.sum(actionType, nowMs, (r) => r.atMs <= nowMs);
  }

  /** Rebuilds the trailing week of reservations from approved audit entries after a restart. */
  restore(entries: readonly AuditEntry[], nowMs: number): number {
    let restored = 0;
    for (const entry of entries) {
      const id = entry.policy?.reservationId;
      const amount = entry.request.amount;
      const atMs = Date.parse(entry.recordedAt);
      if (!entry.verdict.approved || !id || amount === undefined || atMs <= nowMs - WEEK_MS) continue;
      this.reservations.set(id, { id, actionType: entry.request.actionType, units: toUnits(amount), atMs });
      restored += 1;
    }
    return restored;
  }

  private prune(nowMs: number) {
    const cutoff = nowMs - WEEK_MS;
    for (const [id, r] of this.reservations) {
      if (r.atMs <= cutoff) this.reservations.delete(id);
    }
  }

  private sum(actionType: ActionType, nowMs: number, include: (r: Reservation) => boolean): bigint {
    this.prune(nowMs);
    let total = 0n;
    for (const r of this.reservations.values()) {
      if (r.actionType === actionType && include(r)) total += r.units;
    }
    return total;
  }
}
