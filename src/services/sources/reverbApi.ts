import { z } from "zod";
import type { ListingObservation } from "../../types/contracts.js";
import type { RequestGate } from "../requestGate.js";
import {
  normalizeCondition,
  parseAmount,
  parseJSON,
  sampleListings,
  summarizeListings,
  type ParsedListing
} from "./listingStats.js";
import { systemClock, type Clock, type SourceAdapter } from "./types.js";

const PRODUCTION_BASE_URL = "https://api.reverb.com";
const SANDBOX_BASE_URL = "https://sandbox.reverb.com";
const PAGE_SIZE = 50;

const reverbListingSchema = z
  .object({
    title: z.string().optional(),
    price: z
      .object({
        amount: z.union([z.string(), z.number()]).optional(),
        currency: z.string().optional()
      })
      .optional(),
    condition: z.object({ display_name: z.string().optional() }).optional(),
    _links: z.object({ web: z.object({ href: z.string().optional() }).optional() }).optional()
  })
  .passthrough();

const reverbResponseSchema = z.object({
  listings: z.array(z.unknown()).default([])
});

export type ReverbApiAdapterOptions = {
  gate: RequestGate;
  token?: string;
  useSandbox?: boolean;
  clock?: Clock;
};

export class ReverbApiAdapter implements SourceAdapter {
  readonly id = "reverb_api";
  readonly family = "reverb";
  readonly kind = "api";

  private readonly gate: RequestGate;
  private readonly token: string | undefined;
  private readonly baseURL: string;
  private readonly clock: Clock;

  constructor(options: ReverbApiAdapterOptions) {
    this.gate = options.gate;
    this.token = options.token?.trim() || undefined;
    this.baseURL = options.useSandbox ? SANDBOX_BASE_URL : PRODUCTION_BASE_URL;
    this.clock = options.clock ?? systemClock;
  }

  get enabled(): boolean {
    return this.token !== undefined;
  }

  async fetch(query: string): Promise<ListingObservation | null> {
    if (!this.token || !query) {
      return null;
    }

    const url = new URL("/api/listings", this.baseURL);
    url.searchParams.set("query", query);
    url.searchParams.set("per_page", String(PAGE_SIZE));

    const result = await this.gate.execute(url.toString(), {
      Authorization: `Bearer ${this.token}`,
      "Accept-Version": "3.0",
      Accept: "application/hal+json",
      "Content-Type": "application/hal+json"
    });
    if (!result.ok) {
      return null;
    }

    const listings = parseReverbListings(result.body);
    const distribution = summarizeListings(listings);
    if (!distribution) {
      return null;
    }

    return {
      kind: "api",
      family: "reverb",
      price: distribution.average,
      distribution,
      sampleListings: sampleListings(listings),
      capturedAt: this.clock().toISOString()
    };
  }
}

export function parseReverbListings(body: string): ParsedListing[] {
  const payload = reverbResponseSchema.safeParse(parseJSON(body));
  if (!payload.success) {
    return [];
  }

  const listings: ParsedListing[] = [];
  for (const raw of payload.data.listings) {
    const item = reverbListingSchema.safeParse(raw);
    if (!item.success) continue;

    const price = parseAmount(item.data.price?.amount);
    if (price === null) continue;

    listings.push({
      price,
      condition: normalizeCondition(item.data.condition?.display_name),
      title: item.data.title,
      url: item.data._links?.web?.href
    });
  }

  return listings;
}
