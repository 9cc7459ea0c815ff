import * as cheerio from "cheerio";
import { normalizeCondition, parsePriceText, type ParsedListing } from "./listingStats.js";
import { ScrapeAdapter, type ParsedPage } from "./scrapeAdapter.js";

const SEARCH_URL = "https://www.ebay.com/sch/i.html";

/** Sold and completed eBay listings from the public search results page. */
export class EbayScrapeAdapter extends ScrapeAdapter {
  readonly id = "ebay_scraped";
  readonly family = "ebay";

  protected pageURL(query: string, page: number, pageSize: number): string {
    const url = new URL(SEARCH_URL);
    url.searchParams.set("_nkw", query);
    url.searchParams.set("LH_Sold", "1");
    url.searchParams.set("LH_Complete", "1");
    url.searchParams.set("_ipg", String(pageSize));
    url.searchParams.set("_pgn", String(page));
    return url.toString();
  }

  protected parsePage(html: string): ParsedPage {
    return parseEbaySoldListings(html);
  }
}

export function parseEbaySoldListings(html: string): ParsedPage {
  const $ = cheerio.load(html);
  const listings: ParsedListing[] = [];
  let cardCount = 0;

  $("li.s-item").each((_, element) => {
    const card = $(element);
    const title = card.find(".s-item__title").first().text().trim();
    // eBay pads results with a "Shop on eBay" placeholder card.
    if (!title || /^shop on ebay$/i.test(title)) {
      return;
    }
    cardCount += 1;

    const price = parsePriceText(card.find(".s-item__price").first().text());
    if (price === null) {
      return;
    }

    listings.push({
      price,
      condition: normalizeCondition(card.find(".SECONDARY_INFO").first().text()),
      title,
      url: card.find("a.s-item__link").attr("href")
    });
  });

  return { listings, cardCount };
}
