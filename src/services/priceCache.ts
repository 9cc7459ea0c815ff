import { mkdirSync, readFileSync } from "node:fs";
import { rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import Bottleneck from "bottleneck";
import type { z } from "zod";
import type { ConsensusResult, ListingObservation, SourceFamily } from "../types/contracts.js";
import { consensusResultSchema, listingObservationSchema } from "../types/schemas.js";
import { createChildLogger, type Logger } from "../utils/logger.js";

export type CacheNamespace = "consensus" | "scrape";

export type CacheEntry<T> = {
  key: string;
  payload: T;
  capturedAt: number;
  ttlMs: number;
};

type StoredEntry = {
  timestamp: string;
  payload: unknown;
};

type JsonFileCacheOptions<T> = {
  filePath: string;
  ttlMs: number;
  schema: z.ZodType<T>;
  now?: () => number;
  logger?: Logger;
};

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * TTL-gated key/value map persisted as one JSON object. Stale entries are
 * skipped on read and left in place until the next put overwrites them.
 * Payloads are copied in and out, so callers never share the stored object.
 */
export class JsonFileCache<T> {
  readonly filePath: string;
  readonly ttlMs: number;

  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly writer = new Bottleneck({ maxConcurrent: 1 });
  private readonly schema: z.ZodType<T>;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: JsonFileCacheOptions<T>) {
    this.filePath = options.filePath;
    this.ttlMs = Math.max(1, Math.floor(options.ttlMs));
    this.schema = options.schema;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createChildLogger({ component: "price-cache", file: options.filePath });

    mkdirSync(dirname(this.filePath), { recursive: true });
    this.load();
  }

  get(key: string): CacheEntry<T> | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.now() - entry.capturedAt > entry.ttlMs) {
      return null;
    }

    return { ...entry, payload: structuredClone(entry.payload) };
  }

  async put(key: string, payload: T): Promise<CacheEntry<T>> {
    const entry: CacheEntry<T> = {
      key,
      payload: structuredClone(payload),
      capturedAt: this.now(),
      ttlMs: this.ttlMs
    };
    this.entries.set(key, entry);
    await this.persist();
    return entry;
  }

  async clear(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    await this.persist();
    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  private load(): void {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      this.log.warn({ msg: "Cache file unreadable, starting empty", error: describe(error) });
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log.warn({ msg: "Cache file corrupted, starting empty", error: describe(error) });
      return;
    }

    if (!isRecord(parsed)) {
      this.log.warn({ msg: "Cache file is not a JSON object, starting empty" });
      return;
    }

    let dropped = 0;
    for (const [key, value] of Object.entries(parsed)) {
      const entry = this.decodeEntry(key, value);
      if (entry) {
        this.entries.set(key, entry);
      } else {
        dropped += 1;
      }
    }

    if (dropped > 0) {
      this.log.warn({ msg: "Dropped malformed cache entries", dropped });
    }
  }

  private decodeEntry(key: string, value: unknown): CacheEntry<T> | null {
    if (!isRecord(value) || typeof value.timestamp !== "string") {
      return null;
    }

    const capturedAt = Date.parse(value.timestamp);
    if (!Number.isFinite(capturedAt)) {
      return null;
    }

    const payload = this.schema.safeParse(value.payload);
    if (!payload.success) {
      return null;
    }

    return { key, payload: payload.data, capturedAt, ttlMs: this.ttlMs };
  }

  private persist(): Promise<void> {
    return this.writer.schedule(async () => {
      const snapshot: Record<string, StoredEntry> = {};
      for (const [key, entry] of this.entries) {
        snapshot[key] = {
          timestamp: new Date(entry.capturedAt).toISOString(),
          payload: entry.payload
        };
      }

      const tempPath = `${this.filePath}.tmp`;
      await writeFile(tempPath, JSON.stringify(snapshot, null, 2), "utf8");
      await rename(tempPath, this.filePath);
    });
  }
}

export type PriceCacheOptions = {
  cacheDir: string;
  consensusTtlDays: number;
  scrapeTtlHours: number;
  now?: () => number;
  logger?: Logger;
};

export class PriceCache {
  readonly consensus: JsonFileCache<ConsensusResult>;
  readonly scrape: JsonFileCache<ListingObservation>;

  constructor(options: PriceCacheOptions) {
    this.consensus = new JsonFileCache({
      filePath: join(options.cacheDir, "market_prices.json"),
      ttlMs: options.consensusTtlDays * DAY_MS,
      schema: consensusResultSchema,
      now: options.now,
      logger: options.logger
    });
    this.scrape = new JsonFileCache({
      filePath: join(options.cacheDir, "scrape_cache.json"),
      ttlMs: options.scrapeTtlHours * HOUR_MS,
      schema: listingObservationSchema,
      now: options.now,
      logger: options.logger
    });
  }

  static scrapeKey(family: SourceFamily, query: string): string {
    return `${family}:${query}`;
  }

  async clear(namespace: CacheNamespace): Promise<number> {
    return namespace === "consensus" ? this.consensus.clear() : this.scrape.clear();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
