import test from "node:test";
import assert from "node:assert/strict";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { PriceCache } from "../src/services/priceCache.js";
import { EbayScrapeAdapter, parseEbaySoldListings } from "../src/services/sources/ebayScrape.js";
import {
  ebaySoldCard,
  ebaySoldPage,
  fastGate,
  fixedClock,
  recordingFetch,
  silentLogger,
  withTempDir
} from "./helpers.js";

const STRAT_PRICES = ["$700.00", "$750.00", "$800.00", "$820.00", "$900.00"];

test("parseEbaySoldListings reads sold cards and skips placeholders and ranges", () => {
  const page = parseEbaySoldListings(
    ebaySoldPage([
      ebaySoldCard("Shop on eBay", "$20.00"),
      ebaySoldCard("Fender Stratocaster", "$700.00", "Pre-Owned", "https://www.ebay.com/itm/1"),
      ebaySoldCard("Strat lot", "$10.00 to $20.00"),
      ebaySoldCard("Fender Telecaster", "$1,050.50", "Open box", "https://www.ebay.com/itm/3")
    ])
  );

  assert.equal(page.cardCount, 3);
  assert.deepEqual(
    page.listings.map((listing) => [listing.title, listing.price, listing.condition, listing.url]),
    [
      ["Fender Stratocaster", 700, "Used", "https://www.ebay.com/itm/1"],
      ["Fender Telecaster", 1050.5, "Open Box", "https://www.ebay.com/itm/3"]
    ]
  );
});

test("EbayScrapeAdapter paginates until a short page and summarizes sold prices", async () => {
  const pages = [
    ebaySoldPage(STRAT_PRICES.slice(0, 4).map((price) => ebaySoldCard("Fender Stratocaster", price))),
    ebaySoldPage(STRAT_PRICES.slice(4).map((price) => ebaySoldCard("Fender Stratocaster", price)))
  ];
  const { fetchImpl, calls } = recordingFetch((url) => new Response(pages[Number(url.searchParams.get("_pgn")) - 1] ?? ""));
  const adapter = new EbayScrapeAdapter({
    gate: fastGate(fetchImpl),
    scrape: { maxPages: 3, targetResults: 50, pageSize: 4 },
    clock: fixedClock,
    logger: silentLogger
  });

  const observation = await adapter.fetch("fender stratocaster");

  assert.equal(calls.length, 2);
  const first = calls[0];
  assert.ok(first);
  assert.equal(first.url.origin + first.url.pathname, "https://www.ebay.com/sch/i.html");
  assert.equal(first.url.searchParams.get("_nkw"), "fender stratocaster");
  assert.equal(first.url.searchParams.get("LH_Sold"), "1");
  assert.equal(first.url.searchParams.get("LH_Complete"), "1");
  assert.equal(first.url.searchParams.get("_ipg"), "4");
  assert.equal(first.url.searchParams.get("_pgn"), "1");

  assert.ok(observation);
  assert.equal(observation.kind, "scraped");
  assert.equal(observation.price, 794);
  assert.equal(observation.distribution.median, 800);
  assert.equal(observation.distribution.count, 5);
  assert.equal(observation.sampleListings.length, 5);
});

test("EbayScrapeAdapter stops once the target listing count is reached", async () => {
  const page = ebaySoldPage(STRAT_PRICES.slice(0, 4).map((price) => ebaySoldCard("Fender Stratocaster", price)));
  const { fetchImpl, calls } = recordingFetch(() => new Response(page));
  const adapter = new EbayScrapeAdapter({
    gate: fastGate(fetchImpl),
    scrape: { maxPages: 3, targetResults: 3, pageSize: 4 },
    logger: silentLogger
  });

  const observation = await adapter.fetch("fender stratocaster");

  assert.equal(calls.length, 1);
  assert.equal(observation?.distribution.count, 3);
  assert.equal(observation?.distribution.max, 800);
});

test("EbayScrapeAdapter serves repeat queries from the scrape cache", async () => {
  await withTempDir(async (dir) => {
    const cache = new PriceCache({ cacheDir: dir, consensusTtlDays: 7, scrapeTtlHours: 24, logger: silentLogger });
    const page = ebaySoldPage(STRAT_PRICES.map((price) => ebaySoldCard("Fender Stratocaster", price)));
    const { fetchImpl, calls } = recordingFetch(() => new Response(page));
    const adapter = new EbayScrapeAdapter({ gate: fastGate(fetchImpl), cache, logger: silentLogger });

    const first = await adapter.fetch("fender stratocaster");
    const second = await adapter.fetch("fender stratocaster");

    assert.equal(calls.length, 1);
    assert.deepEqual(second, first);
    assert.equal(cache.scrape.get("ebay:fender stratocaster")?.payload.price, 794);
  });
});

test("EbayScrapeAdapter returns null and caches nothing when the gate fails", async () => {
  await withTempDir(async (dir) => {
    const cache = new PriceCache({ cacheDir: dir, consensusTtlDays: 7, scrapeTtlHours: 24, logger: silentLogger });
    const { fetchImpl } = recordingFetch(() => new Response("blocked", { status: 503 }));
    const adapter = new EbayScrapeAdapter({ gate: fastGate(fetchImpl), cache, logger: silentLogger });

    assert.equal(await adapter.fetch("fender stratocaster"), null);
    assert.equal(cache.scrape.size(), 0);
  });
});

test("EbayScrapeAdapter keeps the observation when the scrape cache cannot be written", async () => {
  await withTempDir(async (dir) => {
    await mkdir(join(dir, "scrape_cache.json.tmp"));
    const cache = new PriceCache({ cacheDir: dir, consensusTtlDays: 7, scrapeTtlHours: 24, logger: silentLogger });
    const page = ebaySoldPage(STRAT_PRICES.map((price) => ebaySoldCard("Fender Stratocaster", price)));
    const { fetchImpl } = recordingFetch(() => new Response(page));
    const adapter = new EbayScrapeAdapter({ gate: fastGate(fetchImpl), cache, logger: silentLogger });

    const observation = await adapter.fetch("fender stratocaster");

    assert.equal(observation?.kind, "scraped");
    assert.equal(observation?.price, 794);
    assert.equal(observation?.distribution.count, 5);
  });
});
