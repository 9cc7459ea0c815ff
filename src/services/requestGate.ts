import Bottleneck from "bottleneck";
import type { RequestGateConfig } from "../types/contracts.js";
import { createChildLogger, type Logger } from "../utils/logger.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type GateSuccess = {
  ok: true;
  status: number;
  body: string;
  attempts: number;
};

export type GateFailure = {
  ok: false;
  reason: "rate_limited" | "http_error" | "timeout" | "network_error";
  status?: number;
  attempts: number;
};

export type GateResult = GateSuccess | GateFailure;

export type RequestGateOptions = Partial<RequestGateConfig> & {
  fetchImpl?: FetchLike;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export const USER_AGENTS: readonly string[] = [
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_1) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:120.0) Gecko/20100101 Firefox/120.0",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36"
];

const DEFAULT_GATE_CONFIG: RequestGateConfig = {
  minRequestIntervalMs: 2_000,
  maxRequestsPerSession: 20,
  sessionRestMs: 30_000,
  maxRetries: 3,
  rateLimitBackoffMs: 5_000,
  retryBackoffMs: 1_000,
  requestTimeoutMs: 10_000
};

type AttemptOutcome =
  | { kind: "success"; status: number; body: string }
  | { kind: "status"; status: number }
  | { kind: "timeout" }
  | { kind: "network_error"; message: string };

/**
 * Single serialization point for outbound HTTP. Every adapter in a process
 * shares one instance; pacing state is only touched inside the limiter job.
 */
export class RequestGate {
  readonly config: RequestGateConfig;

  private readonly limiter = new Bottleneck({ maxConcurrent: 1 });
  private readonly fetchImpl: FetchLike;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  private lastRequestTime = 0;
  private sessionRequests = 0;
  private totalRequests = 0;

  constructor(options: RequestGateOptions = {}) {
    const { fetchImpl, random, sleep, logger, ...overrides } = options;
    this.config = withDefaults(overrides);
    this.fetchImpl = fetchImpl ?? fetch;
    this.random = random ?? Math.random;
    this.sleep = sleep ?? defaultSleep;
    this.log = logger ?? createChildLogger({ component: "request-gate" });
  }

  get requestCount(): number {
    return this.totalRequests;
  }

  async execute(url: string, headers: Record<string, string> = {}): Promise<GateResult> {
    const { maxRetries, rateLimitBackoffMs, retryBackoffMs } = this.config;
    let last: AttemptOutcome = { kind: "network_error", message: "not attempted" };

    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      last = await this.limiter.schedule(() => this.attempt(url, headers));

      if (last.kind === "success") {
        return { ok: true, status: last.status, body: last.body, attempts: attempt + 1 };
      }

      if (attempt === maxRetries) {
        break;
      }

      const rateLimited = last.kind === "status" && last.status === 429;
      const waitMs = (rateLimited ? rateLimitBackoffMs : retryBackoffMs) * (attempt + 1);
      this.log.warn({
        msg: rateLimited ? "Rate limited, backing off" : "Request failed, retrying",
        url,
        attempt: attempt + 1,
        outcome: last.kind,
        status: last.kind === "status" ? last.status : undefined,
        waitMs
      });
      await this.sleep(waitMs);
    }

    this.log.warn({ msg: "Request gave up after retries", url, attempts: maxRetries + 1, outcome: last.kind });
    return toFailure(last, maxRetries + 1);
  }

  async stop(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: true });
  }

  private async attempt(url: string, headers: Record<string, string>): Promise<AttemptOutcome> {
    await this.pace();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          "User-Agent": this.pickUserAgent(),
          "Accept-Language": "en-US,en;q=0.9",
          Accept: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
          ...headers
        },
        signal: controller.signal
      });

      if (!response.ok) {
        return { kind: "status", status: response.status };
      }

      return { kind: "success", status: response.status, body: await response.text() };
    } catch (error) {
      if (isAbortError(error)) {
        return { kind: "timeout" };
      }
      return { kind: "network_error", message: error instanceof Error ? error.message : String(error) };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async pace(): Promise<void> {
    const { maxRequestsPerSession, sessionRestMs, minRequestIntervalMs } = this.config;

    if (this.sessionRequests >= maxRequestsPerSession) {
      this.log.info({ msg: "Session budget reached, resting", restMs: sessionRestMs });
      await this.sleep(sessionRestMs);
      this.sessionRequests = 0;
    }

    let elapsed = Date.now() - this.lastRequestTime;
    while (elapsed < minRequestIntervalMs) {
      await this.sleep(minRequestIntervalMs - elapsed);
      elapsed = Date.now() - this.lastRequestTime;
    }

    this.lastRequestTime = Date.now();
    this.sessionRequests += 1;
    this.totalRequests += 1;
  }

  private pickUserAgent(): string {
    const index = Math.min(USER_AGENTS.length - 1, Math.floor(this.random() * USER_AGENTS.length));
    return USER_AGENTS[index] ?? USER_AGENTS[0] ?? "Mozilla/5.0";
  }
}

function toFailure(outcome: AttemptOutcome, attempts: number): GateFailure {
  switch (outcome.kind) {
    case "status":
      return {
        ok: false,
        reason: outcome.status === 429 ? "rate_limited" : "http_error",
        status: outcome.status,
        attempts
      };
    case "timeout":
      return { ok: false, reason: "timeout", attempts };
    case "network_error":
    case "success":
      return { ok: false, reason: "network_error", attempts };
  }
}

function withDefaults(overrides: Partial<RequestGateConfig>): RequestGateConfig {
  return {
    minRequestIntervalMs: overrides.minRequestIntervalMs ?? DEFAULT_GATE_CONFIG.minRequestIntervalMs,
    maxRequestsPerSession: overrides.maxRequestsPerSession ?? DEFAULT_GATE_CONFIG.maxRequestsPerSession,
    sessionRestMs: overrides.sessionRestMs ?? DEFAULT_GATE_CONFIG.sessionRestMs,
    maxRetries: overrides.maxRetries ?? DEFAULT_GATE_CONFIG.maxRetries,
    rateLimitBackoffMs: overrides.rateLimitBackoffMs ?? DEFAULT_GATE_CONFIG.rateLimitBackoffMs,
    retryBackoffMs: overrides.retryBackoffMs ?? DEFAULT_GATE_CONFIG.retryBackoffMs,
    requestTimeoutMs: overrides.requestTimeoutMs ?? DEFAULT_GATE_CONFIG.requestTimeoutMs
  };
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    typeof error.name === "string" &&
    error.name.toLowerCase() === "aborterror"
  );
}
