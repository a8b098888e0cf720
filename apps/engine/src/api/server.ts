import http from "node:http";
import { ApprovalResponseSchema, TierSchema, describeIssues, type AuditEntry, type Logger } from "@tiergate/shared";
import { parseApprovalDecision, type ApprovalCoordinator } from "../approval/coordinator.js";
import type { AuditLog } from "../audit/auditLog.js";
import type { DecisionEngine } from "../engine/decisionEngine.js";
import { AuditWriteError, MalformedRequestError } from "../errors.js";

export type ApiDeps = {
  engine: DecisionEngine;
  audit: AuditLog;
  approvals: ApprovalCoordinator;
  log: Logger;
};

const MAX_BODY_BYTES = 1_000_000;

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function json(res: http.ServerResponse, status: number, body: unknown) {
  const data = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
  });
  res.end(data);
}

function notFound(res: http.ServerResponse) {
  json(res, 404, { error: "Not found" });
}

async function readBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new HttpError(413, "Body too large");
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf-8");
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new HttpError(400, "Body is not valid JSON");
  }
}

function statusFor(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof MalformedRequestError) return 400;
  if (err instanceof AuditWriteError) return 503;
  return 500;
}

/**
 * Service surface of the engine.
 *
 * Endpoints:
 * - GET    /api/health
 * - GET    /api/state
 * - GET    /api/audit?requestId=&from=&to=&tier=&lines=200
 * - GET    /api/audit/verify
 * - GET    /api/approvals
 * - POST   /api/approvals/:requestId   { decision, responderId, comment? }
 * - POST   /api/decisions[?wait=false]
 * - DELETE /api/decisions/:requestId
 */
export function createApiServer(deps: ApiDeps): http.Server {
  const { engine, audit, approvals, log } = deps;

  const route = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const path = url.pathname;
    const method = req.method ?? "GET";

    if (method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Methods": "GET,POST,DELETE,OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      res.end();
      return;
    }

    if (method === "GET") {
      if (path === "/api/health") return json(res, 200, { ok: true, ts: new Date().toISOString() });
      if (path === "/api/state") return json(res, 200, engine.state());
      if (path === "/api/approvals") return json(res, 200, { items: approvals.pending() });
      if (path === "/api/audit/verify") return json(res, 200, audit.verifyChain());
      if (path === "/api/audit") {
        const q = url.searchParams;
        const lines = Math.max(1, Math.min(5000, Number(q.get("lines") ?? 200) || 200));
        const requestId = q.get("requestId");
        const tier = q.get("tier");
        const from = q.get("from") ?? undefined;
        const to = q.get("to") ?? undefined;

        // Each filter is one of the log's own queries; the result is their intersection.
        const selections: AuditEntry[][] = [];
        if (requestId) selections.push(audit.byRequest(requestId));
        if (tier !== null) {
          const parsed = TierSchema.safeParse(tier);
          if (!parsed.success) throw new HttpError(400, `Unknown tier ${tier}`);
          selections.push(audit.byTier(parsed.data));
        }
        if (from || to) selections.push(audit.byTimeRange(from, to));

        const [first, ...rest] = selections;
        if (!first) return json(res, 200, { lines, items: audit.tail(lines) });
        const items = first.filter((e) => rest.every((selection) => selection.includes(e)));
        return json(res, 200, { lines, items: items.slice(-lines) });
      }
      return notFound(res);
    }

    const approvalMatch = /^\/api\/approvals\/([^/]+)$/.exec(path);
    if (method === "POST" && approvalMatch) {
      const requestId = decodeURIComponent(approvalMatch[1] ?? "");
      const parsed = ApprovalResponseSchema.safeParse(await readBody(req));
      if (!parsed.success) throw new HttpError(400, describeIssues(parsed.error));
      const decision = parseApprovalDecision(parsed.data.decision);
      if (!decision) throw new HttpError(400, `Unrecognized decision "${parsed.data.decision}"`);
      const result = approvals.submit(requestId, { ...parsed.data, decision });
      // A late or duplicate reply is ignored, not an error to the responder.
      if (result.accepted || result.reason === "already_resolved") return json(res, 200, result);
      return json(res, result.reason === "unknown_request" ? 404 : 403, result);
    }

    if (method === "POST" && path === "/api/decisions") {
      const { request, verdict } = engine.begin(await readBody(req));
      if (url.searchParams.get("wait") === "false") {
        verdict.catch((e) => log.error(`decision ${request.id} failed`, e));
        return json(res, 202, { requestId: request.id });
      }
      return json(res, 200, await verdict);
    }

    const decisionMatch = /^\/api\/decisions\/([^/]+)$/.exec(path);
    if (method === "DELETE" && decisionMatch) {
      const requestId = decodeURIComponent(decisionMatch[1] ?? "");
      return engine.withdraw(requestId) ? json(res, 200, { requestId, withdrawn: true }) : notFound(res);
    }

    return notFound(res);
  };

  return http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      const status = statusFor(err);
      if (status >= 500) log.error(`${req.method} ${req.url} failed`, err);
      if (!res.headersSent) json(res, status, { error: err instanceof Error ? err.message : String(err) });
      else res.end();
    });
  });
}

export function startApiServer(deps: ApiDeps, port: number): Promise<http.Server> {
  const server = createApiServer(deps);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      const address = server.address();
      const bound = address !== null && typeof address === "object" ? address.port : port;
      deps.log.info(`listening on http://localhost:${bound}`);
      resolve(server);
    });
  });
}
