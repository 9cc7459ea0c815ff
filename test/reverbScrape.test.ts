import test from "node:test";
import assert from "node:assert/strict";
import { ReverbScrapeAdapter, parseReverbSoldListings } from "../src/services/sources/reverbScrape.js";
import { fastGate, recordingFetch, silentLogger } from "./helpers.js";

const marketplacePage = `<html><body>
  <div class="rc-listing-card">
    <a class="rc-listing-card__title-link" href="/item/123-gibson-sg-standard">Gibson SG Standard</a>
    <span class="rc-listing-card__condition">Excellent</span>
    <span class="rc-price-block__price">$1,299</span>
  </div>
  <div class="rc-listing-card">
    <h4 class="rc-listing-card__title"> Gibson SG Special </h4>
    <span class="rc-listing-card__condition">Good</span>
    <span class="rc-price-block__price">$450.00</span>
  </div>
  <div class="rc-listing-card">
    <a class="rc-listing-card__title-link" href="/item/125">Gibson SG Junior</a>
    <span class="rc-price-block__price"></span>
  </div>
</body></html>`;

test("parseReverbSoldListings extracts cards and resolves relative links", () => {
  const page = parseReverbSoldListings(marketplacePage);

  assert.equal(page.cardCount, 3);
  assert.equal(page.listings.length, 2);

  const [standard, special] = page.listings;
  assert.equal(standard?.title, "Gibson SG Standard");
  assert.equal(standard?.price, 1299);
  assert.equal(standard?.condition, "Very Good");
  assert.equal(standard?.url, "https://reverb.com/item/123-gibson-sg-standard");

  assert.equal(special?.title, "Gibson SG Special");
  assert.equal(special?.price, 450);
  assert.equal(special?.condition, "Good");
  assert.equal(special?.url, undefined);
});

test("ReverbScrapeAdapter requests sold marketplace pages", async () => {
  const { fetchImpl, calls } = recordingFetch(() => new Response(marketplacePage));
  const adapter = new ReverbScrapeAdapter({
    gate: fastGate(fetchImpl),
    scrape: { maxPages: 2, targetResults: 50, pageSize: 24 },
    logger: silentLogger
  });

  const observation = await adapter.fetch("gibson sg");

  assert.equal(calls.length, 1);
  const call = calls[0];
  assert.ok(call);
  assert.equal(call.url.origin + call.url.pathname, "https://reverb.com/marketplace");
  assert.equal(call.url.searchParams.get("query"), "gibson sg");
  assert.equal(call.url.searchParams.get("show_only_sold"), "true");
  assert.equal(call.url.searchParams.get("page"), "1");

  assert.ok(observation);
  assert.equal(observation.family, "reverb");
  assert.equal(observation.kind, "scraped");
  assert.equal(observation.price, 874.5);
  assert.deepEqual(observation.distribution.conditions, { "Very Good": 1, Good: 1 });
});
