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

const PRODUCTION_BASE_URL = "https://api.ebay.com";
const SANDBOX_BASE_URL = "https://api.sandbox.ebay.com";
const PAGE_SIZE = 50;

const itemSummarySchema = z
  .object({
    title: z.string().optional(),
    price: z
      .object({
        value: z.union([z.string(), z.number()]).optional(),
        currency: z.string().optional()
      })
      .optional(),
    condition: z.string().optional(),
    itemWebUrl: z.string().optional()
  })
  .passthrough();

const searchResponseSchema = z.object({
  total: z.number().optional(),
  itemSummaries: z.array(z.unknown()).default([])
});

export type EbayApiAdapterOptions = {
  gate: RequestGate;
  token?: string;
  useSandbox?: boolean;
  marketplaceId?: string;
  clock?: Clock;
};

/** eBay Browse API item search, authorized with an application token. */
export class EbayApiAdapter implements SourceAdapter {
  readonly id = "ebay_api";
  readonly family = "ebay";
  readonly kind = "api";

  private readonly gate: RequestGate;
  private readonly token: string | undefined;
  private readonly baseURL: string;
  private readonly marketplaceId: string;
  private readonly clock: Clock;

  constructor(options: EbayApiAdapterOptions) {
    this.gate = options.gate;
    this.token = options.token?.trim() || undefined;
    this.baseURL = options.useSandbox ? SANDBOX_BASE_URL : PRODUCTION_BASE_URL;
    this.marketplaceId = options.marketplaceId ?? "EBAY_US";
    this.clock = options.clock ?? systemClock;
  }

  get enabled(): boolean {
    return this.token !== undefined;
  }

  async fetch(query: string): Promise<ListingObservation | null> {
    if (!this.token || !query) {
      return null;
    }

    const url = new URL("/buy/browse/v1/item_summary/search", this.baseURL);
    url.searchParams.set("q", query);
    url.searchParams.set("limit", String(PAGE_SIZE));

    const result = await this.gate.execute(url.toString(), {
      Authorization: `Bearer ${this.token}`,
      "X-EBAY-C-MARKETPLACE-ID": this.marketplaceId,
      Accept: "application/json"
    });
    if (!result.ok) {
      return null;
    }

    const listings = parseEbayItemSummaries(result.body);
    const distribution = summarizeListings(listings);
    if (!distribution) {
      return null;
    }

    return {
      kind: "api",
      family: "ebay",
      price: distribution.average,
      distribution,
      sampleListings: sampleListings(listings),
      capturedAt: this.clock().toISOString()
    };
  }
}

export function parseEbayItemSummaries(body: string): ParsedListing[] {
  const payload = searchResponseSchema.safeParse(parseJSON(body));
  if (!payload.success) {
    return [];
  }

  const listings: ParsedListing[] = [];
  for (const raw of payload.data.itemSummaries) {
    const item = itemSummarySchema.safeParse(raw);
    if (!item.success) continue;

    const currency = item.data.price?.currency;
    if (currency && currency.toUpperCase() !== "USD") continue;

    const price = parseAmount(item.data.price?.value);
    if (price === null) continue;

    listings.push({
      price,
      condition: normalizeCondition(item.data.condition),
      title: item.data.title,
      url: item.data.itemWebUrl
    });
  }

  return listings;
}
