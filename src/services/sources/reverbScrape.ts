import * as cheerio from "cheerio";
import { normalizeCondition, parsePriceText, type ParsedListing } from "./listingStats.js";
import { ScrapeAdapter, type ParsedPage } from "./scrapeAdapter.js";

const MARKETPLACE_URL = "https://reverb.com/marketplace";
const SITE_ORIGIN = "https://reverb.com";

export class ReverbScrapeAdapter extends ScrapeAdapter {
  readonly id = "reverb_scraped";
  readonly family = "reverb";

  protected pageURL(query: string, page: number, pageSize: number): string {
    const url = new URL(MARKETPLACE_URL);
    url.searchParams.set("query", query);
    url.searchParams.set("show_only_sold", "true");
    url.searchParams.set("per_page", String(pageSize));
    url.searchParams.set("page", String(page));
    return url.toString();
  }

  protected parsePage(html: string): ParsedPage {
    return parseReverbSoldListings(html);
  }
}

export function parseReverbSoldListings(html: string): ParsedPage {
  const $ = cheerio.load(html);
  const listings: ParsedListing[] = [];
  let cardCount = 0;

  $(".rc-listing-card").each((_, element) => {
    const card = $(element);
    cardCount += 1;

    const price = parsePriceText(card.find(".rc-price-block__price").first().text());
    if (price === null) {
      return;
    }

    const link = card.find("a.rc-listing-card__title-link").first();
    const href = link.attr("href");
    listings.push({
      price,
      condition: normalizeCondition(card.find(".rc-listing-card__condition").first().text()),
      title: (link.text() || card.find(".rc-listing-card__title").first().text()).trim(),
      url: resolveURL(href)
    });
  });

  return { listings, cardCount };
}

function resolveURL(href: string | undefined): string | undefined {
  if (!href) {
    return undefined;
  }
  try {
    return new URL(href, SITE_ORIGIN).toString();
  } catch {
    return undefined;
  }
}
