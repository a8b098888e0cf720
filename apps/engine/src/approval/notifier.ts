import { v4 as uuidv4 } from "uuid";
import type { HttpClient, Logger } from "@tiergate/shared";

export type ApprovalNotice = {
  kind: "approval_request" | "approval_reminder";
  requestId: string;
  subject: string;
  body: string;
  expiresAt: string;
  priority: "urgent" | "standard";
};

/**
 * Delivers a human-readable prompt through whatever channel is configured and
 * returns a correlation handle. The engine never knows which channel it was.
 */
export interface Notifier {
  notify(notice: ApprovalNotice): Promise<{ handle: string }>;
}

export class LogNotifier implements Notifier {
  constructor(private log: Logger) {}

  async notify(notice: ApprovalNotice): Promise<{ handle: string }> {
    const handle = `log:${uuidv4()}`;
    this.log.info(`${notice.subject} [${notice.priority}]\n${notice.body}`, { requestId: notice.requestId, handle });
    return { handle };
  }
}

/** Posts the notice as JSON; a chat bridge on the other side relays it. */
export class WebhookNotifier implements Notifier {
  constructor(
    private url: string,
    private http: HttpClient
  ) {}

  async notify(notice: ApprovalNotice): Promise<{ handle: string }> {
    const res = await this.http.postJson<{ handle?: unknown; id?: unknown }>(this.url, notice);
    const handle = typeof res.handle === "string" ? res.handle : typeof res.id === "string" ? res.id : `webhook:${uuidv4()}`;
    return { handle };
  }
}
