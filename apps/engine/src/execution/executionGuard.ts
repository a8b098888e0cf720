import type { Logger, Verdict } from "@tiergate/shared";
import type { AuditLog } from "../audit/auditLog.js";
import { verifyVerdict } from "../engine/replay.js";
import { ExecutionRefusedError } from "../errors.js";

/**
 * Runs a caller's side effect only for an approved verdict that is backed by a
 * consistent audit entry. Each verdict authorizes one execution.
 */
export class ExecutionGuard {
  private executed = new Set<string>();

  constructor(
    private audit: AuditLog,
    private log: Logger
  ) {}

  async execute<T>(verdict: Verdict, effect: () => Promise<T>): Promise<T> {
    if (!verdict.approved) throw new ExecutionRefusedError(`Verdict for ${verdict.requestId} is not an approval`);
    const report = verifyVerdict(verdict, this.audit);
    if (!report.ok) {
      this.log.error(`refused to execute ${verdict.requestId}`, report.mismatches);
      throw new ExecutionRefusedError(`Verdict for ${verdict.requestId} failed audit: ${report.mismatches.join("; ")}`);
    }
    if (this.executed.has(verdict.auditEntryId)) {
      throw new ExecutionRefusedError(`Verdict for ${verdict.requestId} was already executed`);
    }
    this.executed.add(verdict.auditEntryId);
    this.log.info(`executing ${verdict.requestId} (${verdict.tier})`);
    return effect();
  }
}
