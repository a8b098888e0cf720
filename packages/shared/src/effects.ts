export type Effect<Env, A> = (env: Env, signal: AbortSignal) => Promise<A>;

export type RunHandle<A> = {
  promise: Promise<A>;
  cancel: () => void;
};

export type Runtime<Env> = {
  env: Env;
  run: <A>(effect: Effect<Env, A>) => RunHandle<A>;
};

export type HttpClient = {
  postJson: <A>(url: string, body: unknown, init?: RequestInit) => Promise<A>;
};

export type Clock = {
  nowMs: () => number;
  nowIso: () => string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: unknown) => void;
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
  child: (scope: string) => Logger;
};

export class CancelledError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export const Effect = {
  sleep<Env>(ms: number): Effect<Env, void> {
    return (_env, signal) => new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new CancelledError());
        return;
      }
      const id = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(id);
        reject(new CancelledError());
      };
      signal.addEventListener("abort", onAbort, { once: true });
    });
  },
  retry<Env, A>(
    effect: Effect<Env, A>,
    options: { retries: number; delayMs?: number }
  ): Effect<Env, A> {
    const { retries, delayMs = 0 } = options;
    return async (env, signal) => {
      let attempt = 0;
      while (!signal.aborted) {
        try {
          return await effect(env, signal);
        } catch (err) {
          if (attempt >= retries || signal.aborted) throw err;
          attempt += 1;
          if (delayMs > 0) {
            await Effect.sleep<Env>(delayMs)(env, signal);
          }
        }
      }
      throw new CancelledError();
    };
  }
};

export function createRuntime<Env>(env: Env): Runtime<Env> {
  return {
    env,
    run<A>(effect: Effect<Env, A>): RunHandle<A> {
      const controller = new AbortController();
      const promise = effect(env, controller.signal);
      return {
        promise,
        cancel: () => controller.abort()
      };
    }
  };
}

export function createHttpClient(): HttpClient {
  const readJson = async <A>(response: Response): Promise<A> => {
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    const text = await response.text();
    return (text ? JSON.parse(text) : {}) as A;
  };
  return {
    async postJson<A>(url: string, body: unknown, init?: RequestInit): Promise<A> {
      const response = await fetch(url, {
        method: "POST",
        ...init,
        headers: { "content-type": "application/json", ...init?.headers },
        body: JSON.stringify(body)
      });
      return readJson<A>(response);
    }
  };
}

export function createClock(): Clock {
  return {
    nowMs: () => Date.now(),
    nowIso: () => new Date().toISOString()
  };
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createLogger(options: { level?: LogLevel; scope?: string } = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const prefix = options.scope ? `[${options.scope}] ` : "";
  const emit = (level: LogLevel, sink: (...args: unknown[]) => void) =>
    (message: string, meta?: unknown) => {
      if (LEVEL_ORDER[level] < threshold) return;
      sink(prefix + message, meta ?? "");
    };
  return {
    debug: emit("debug", console.debug),
    info: emit("info", console.log),
    warn: emit("warn", console.warn),
    error: emit("error", console.error),
    child: (scope) =>
      createLogger({
        level: options.level,
        scope: options.scope ? `${options.scope}:${scope}` : scope
      })
  };
}
