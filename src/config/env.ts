import { z } from "zod";
import type { EngineConfig, SourceFamily } from "../types/contracts.js";

const booleanFlag = (fallback: "true" | "false") =>
  z.string().transform((val) => val.trim().toLowerCase() === "true").default(fallback);

const familyList = z
  .string()
  .default("reverb,ebay")
  .transform((val) =>
    val
      .split(",")
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(z.enum(["reverb", "ebay"])).min(1));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: booleanFlag("false"),

  // HTTP surface
  CORS_ORIGIN: z.string().default("*"),
  API_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  API_RATE_MAX: z.coerce.number().default(60),

  // Structured price sources
  REVERB_API_TOKEN: z.string().optional(),
  EBAY_API_TOKEN: z.string().optional(),
  USE_SANDBOX: booleanFlag("false"),
  SOURCE_FAMILIES: familyList,

  // Cache
  CACHE_DIR: z.string().default("cache"),
  CACHE_EXPIRY_DAYS: z.coerce.number().positive().default(7),
  SCRAPE_CACHE_EXPIRY_HOURS: z.coerce.number().positive().default(24),

  // Request gate
  MIN_REQUEST_INTERVAL_SECONDS: z.coerce.number().min(0).default(2),
  MAX_REQUESTS_PER_SESSION: z.coerce.number().int().positive().default(20),
  SESSION_REST_SECONDS: z.coerce.number().min(0).default(30),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RATE_LIMIT_BACKOFF_SECONDS: z.coerce.number().min(0).default(5),
  RETRY_BACKOFF_SECONDS: z.coerce.number().min(0).default(1),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Scraping
  SCRAPE_MAX_PAGES: z.coerce.number().int().positive().default(3),
  SCRAPE_TARGET_RESULTS: z.coerce.number().int().positive().default(50),
  SCRAPE_PAGE_SIZE: z.coerce.number().int().positive().default(60),

  // Fetch workers
  WORKER_POOL_SIZE: z.coerce.number().int().positive().default(5),

  // Deal scoring
  DEAL_THRESHOLD: z.coerce.number().positive().default(0.85),
  OVERPRICED_THRESHOLD: z.coerce.number().positive().default(1.15),
  AUCTION_DISCOUNT: z.coerce.number().positive().max(1).default(0.85),
  SIMULATED_INCLUSION: z.enum(["filler", "always", "never"]).default("filler"),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}

export function engineConfigFromEnv(e: Env = getEnv()): EngineConfig {
  const families: SourceFamily[] = Array.from(new Set(e.SOURCE_FAMILIES));

  return {
    families,
    reverbApiToken: nonEmpty(e.REVERB_API_TOKEN),
    ebayApiToken: nonEmpty(e.EBAY_API_TOKEN),
    useSandbox: e.USE_SANDBOX,
    cacheDir: e.CACHE_DIR,
    consensusTtlDays: e.CACHE_EXPIRY_DAYS,
    scrapeTtlHours: e.SCRAPE_CACHE_EXPIRY_HOURS,
    gate: {
      minRequestIntervalMs: e.MIN_REQUEST_INTERVAL_SECONDS * 1000,
      maxRequestsPerSession: e.MAX_REQUESTS_PER_SESSION,
      sessionRestMs: e.SESSION_REST_SECONDS * 1000,
      maxRetries: e.MAX_RETRIES,
      rateLimitBackoffMs: e.RATE_LIMIT_BACKOFF_SECONDS * 1000,
      retryBackoffMs: e.RETRY_BACKOFF_SECONDS * 1000,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    scrape: {
      maxPages: e.SCRAPE_MAX_PAGES,
      targetResults: e.SCRAPE_TARGET_RESULTS,
      pageSize: e.SCRAPE_PAGE_SIZE,
    },
    workerPoolSize: e.WORKER_POOL_SIZE,
    deal: {
      dealThreshold: e.DEAL_THRESHOLD,
      overpricedThreshold: e.OVERPRICED_THRESHOLD,
      auctionDiscount: e.AUCTION_DISCOUNT,
    },
    simulatedInclusion: e.SIMULATED_INCLUSION,
  };
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
    console.log("Source families:", e.SOURCE_FAMILIES.join(", "));
  }

  return e;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
