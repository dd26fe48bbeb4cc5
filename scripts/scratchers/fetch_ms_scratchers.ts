// scripts/scratchers/fetch_ms_scratchers.ts
/* ============================================================================
   MS Scratchers Scraper
   ----------------------------------------------------------------------------
   Run:
     tsx scripts/scratchers/run_ms.ts [--out mslotto_games.csv] [--json index.json]
                                      [--concurrency 75] [--url <active games page>]

   Outputs:
     mslotto_games.csv   (sorted by EV, highest first)
     optional JSON index (--json)

   Conventions:
     • Monetary values stored as DOLLARS (integer).
     • Odds stored as divisor (e.g., 4.50 means "1:4.50").
   ============================================================================ */

import pLimit from "p-limit";
import { describeError, logger } from "../../lib/logger.js";
import type { Game } from "../../lib/scratchers.js";
import { fetchText, gameNameFromUrl, type PageFetcher } from "./_util.js";
import type { ScraperConfig } from "./config.js";
import { parseGamePage } from "./parse_game_page.js";
import { discoverGameLinks } from "./parse_lists.js";
import { writeJsonIndex, writeReport } from "./write_report.js";

export type ScrapeDeps = {
  fetchPage?: PageFetcher;
};

export type ScrapeResult = {
  games: Game[];
  links: string[];
  skipped: string[];
};

const defaultFetch: PageFetcher = (url) => fetchText(url);

// -----------------------------
// Listing
// -----------------------------
/** Landing page -> absolute game URLs. Failures propagate: without links there is no run. */
export async function fetchLandingLinks(
  config: Pick<ScraperConfig, "url" | "marker">,
  deps: ScrapeDeps = {},
): Promise<string[]> {
  const fetchPage = deps.fetchPage ?? defaultFetch;
  const html = await fetchPage(config.url);
  const hrefs = discoverGameLinks(html, { marker: config.marker });

  const links: string[] = [];
  for (const href of hrefs) {
    try {
      const abs = new URL(href, config.url).href;
      if (!links.includes(abs)) links.push(abs);
    } catch {
      logger.warn("[ms] dropping unusable link", { href });
    }
  }
  logger.info("[ms] discovered game links", { url: config.url, count: links.length });
  return links;
}

// -----------------------------
// Detail
// -----------------------------
/** One game page. A failed fetch is logged and yields null; it is never retried. */
export async function fetchGame(link: string, fetchPage: PageFetcher = defaultFetch): Promise<Game | null> {
  let html: string;
  try {
    html = await fetchPage(link);
  } catch (err) {
    logger.warn("[ms] error fetching game page", { url: link, ...describeError(err) });
    return null;
  }
  const game = parseGamePage(html, gameNameFromUrl(link), link);
  logger.debug("[ms] parsed game", { url: link, name: game.name, tiers: game.prizeTiers.length });
  return game;
}

// -----------------------------
// Orchestration
// -----------------------------
export async function scrapeActiveGames(
  config: Pick<ScraperConfig, "url" | "marker" | "concurrency">,
  deps: ScrapeDeps = {},
): Promise<ScrapeResult> {
  const fetchPage = deps.fetchPage ?? defaultFetch;
  const links = await fetchLandingLinks(config, { fetchPage });

  const limit = pLimit(config.concurrency);
  const games: Game[] = [];
  const skipped: string[] = [];

  // every task is queued up front; p-limit caps how many run at once
  await Promise.all(
    links.map((link) =>
      limit(async () => {
        const game = await fetchGame(link, fetchPage);
        // push is synchronous, so no other task can interleave with it
        if (game) games.push(game);
        else skipped.push(link);
      }),
    ),
  );

  return { games, links, skipped };
}

// -----------------------------
// Main
// -----------------------------
export async function main(config: ScraperConfig, deps: ScrapeDeps = {}): Promise<Game[]> {
  logger.info("[ms] starting", { url: config.url, concurrency: config.concurrency });

  const { games, skipped } = await scrapeActiveGames(config, deps);

  const withOdds = games.filter((g) => g.odds > 0).length;
  const withTiers = games.filter((g) => g.prizeTiers.length > 0).length;
  logger.info(
    `[ms] games=${games.length} withOdds=${withOdds} withTiers=${withTiers} skipped=${skipped.length}`,
  );

  const sorted = await writeReport(games, config.out);
  if (config.json) await writeJsonIndex(sorted, config.json);

  logger.info(`Data written to ${config.out}`, config.json ? { json: config.json } : undefined);
  return sorted;
}
