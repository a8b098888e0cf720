import crypto from "node:crypto";
import type { AuditEntry } from "@tiergate/shared";

/**
 * JSON with sorted keys. Undefined members are dropped the way JSON.stringify
 * drops them, so an entry hashes the same before and after a round trip.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value) ?? "null";
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
}

export function sha256Hex(s: string): string {
  return crypto.createHash("sha256").update(s, "utf8").digest("hex");
}

export type UnhashedEntry = Omit<AuditEntry, "hash">;

/** Hash over everything in the entry, `prevHash` included. */
export function computeEntryHash(entry: UnhashedEntry): string {
  return sha256Hex(stableStringify(entry));
}
