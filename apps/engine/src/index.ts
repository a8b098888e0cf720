import type http from "node:http";
import {
  createClock,
  createHttpClient,
  createLogger,
  createRuntime,
  type Clock,
  type Effect,
  type Logger,
} from "@tiergate/shared";
import { startApiServer } from "./api/server.js";
import { ApprovalCoordinator } from "./approval/coordinator.js";
import { LogNotifier, WebhookNotifier, type Notifier } from "./approval/notifier.js";
import { AuditLog, JsonlFileSink } from "./audit/auditLog.js";
import { InMemoryBus } from "./bus/inMemoryBus.js";
import { loadConfig, type EngineConfig } from "./config.js";
import { LlmOpinionSource } from "./council/llmOpinionSource.js";
import { DecisionEngine } from "./engine/decisionEngine.js";
import { PolicyGate } from "./policy/policyGate.js";
import { SpendLedger } from "./policy/spendLedger.js";

type EngineEnv = {
  config: EngineConfig;
  clock: Clock;
  log: Logger;
};

function buildEngine(env: EngineEnv) {
  const { config, clock, log } = env;
  const audit = new AuditLog(new JsonlFileSink(config.audit.path), { clock, log: log.child("audit") });

  const ledger = new SpendLedger();
  const restored = ledger.restore(audit.all(), clock.nowMs());
  if (restored) log.info(`restored ${restored} policy reservations from the audit log`);
  const policy = new PolicyGate(config.policy, ledger, { clock, log: log.child("policy") });

  const notifier: Notifier = config.approval.webhookUrl
    ? new WebhookNotifier(config.approval.webhookUrl, createHttpClient())
    : new LogNotifier(log.child("notify"));
  const approvals = new ApprovalCoordinator(config.approval, notifier, { clock, log: log.child("approval") });

  const councilLog = log.child("council");
  councilLog.info(`chairman: ${config.council.chairmanId ?? "none, ties are rejected"}`);
  const sources = config.council.members.map((m) => new LlmOpinionSource(m, config.llm, councilLog.child(m.id)));
  if (!config.llm.apiKey) councilLog.warn("LLM_API_KEY not set; every council source will fail and council tiers reject");

  const bus = new InMemoryBus(log.child("bus"));
  const engine = new DecisionEngine({ config, sources, approvals, policy, audit, bus, clock, log: log.child("decisions") });
  return { engine, audit, approvals };
}

const serve: Effect<EngineEnv, void> = async (env, signal) => {
  const { config, log } = env;
  log.info(
    `decision engine starting: tiers <${config.tiers.autonomousBelow} autonomous, >${config.tiers.humanAbove} human; ` +
      `council=${config.council.members.length} threshold=${config.council.threshold} audit=${config.audit.path}`
  );
  const { engine, audit, approvals } = buildEngine(env);
  const chain = audit.verifyChain();
  if (!chain.ok) log.error(`audit chain broken at seq ${chain.brokenAt}: ${chain.reason}`);

  const server: http.Server = await startApiServer({ engine, audit, approvals, log: log.child("api") }, config.apiPort);
  await new Promise<void>((resolve) => {
    const stop = () => {
      log.info("shutting down");
      for (const w of approvals.pending()) engine.withdraw(w.requestId);
      server.close(() => resolve());
    };
    if (signal.aborted) stop();
    else signal.addEventListener("abort", stop, { once: true });
  });
};

const config = loadConfig();
const runtime = createRuntime<EngineEnv>({
  config,
  clock: createClock(),
  log: createLogger({ level: config.logLevel, scope: "engine" }),
});

const run = runtime.run(serve);
run.promise.catch((e) => {
  console.error(e);
  process.exitCode = 1;
});

process.on("SIGINT", () => run.cancel());
process.on("SIGTERM", () => run.cancel());
