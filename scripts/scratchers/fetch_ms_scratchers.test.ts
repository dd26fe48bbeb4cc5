import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, vi, beforeEach, afterAll } from "vitest";
import { logger } from "../../lib/logger.js";
import { fetchGame, fetchLandingLinks, main, scrapeActiveGames } from "./fetch_ms_scratchers.js";

const LANDING = "https://lottery.test/gamestatus/active/";
const MARKER = "col-lg-3 gamebox";

function landingHtml(slugs: string[]): string {
  const anchors = slugs.map((s) => `<div><a href="/games/${s}/">${s}</a></div>`).join("");
  return `<a href="/games/not-a-game/">x</a><div class="${MARKER}">${anchors}</div>`;
}

function gameHtml(price: string, odds: string, tiers: [string, string, string][]): string {
  const rows = tiers.map((t) => `<tr>${t.map((c) => `<td>${c}</td>`).join("")}</tr>`).join("");
  return `
    <table>
      <tr><td>Ticket Price</td><td>${price}</td></tr>
      <tr><td>Overall Odds</td><td>${odds}</td></tr>
      <tr><td>Launch Date</td><td>2024-03-01</td></tr>
    </table>
    <table><tr><th>Prize</th><th>Total</th><th>Remaining</th></tr>${rows}</table>`;
}

const gameUrl = (slug: string) => `https://lottery.test/games/${slug}/`;

/** Fake site: landing page plus one page per slug; unknown URLs reject. */
function fakeSite(pages: Record<string, string>) {
  const site: Record<string, string> = { [LANDING]: landingHtml(Object.keys(pages)) };
  for (const [slug, html] of Object.entries(pages)) site[gameUrl(slug)] = html;
  return vi.fn(async (url: string) => {
    const html = site[url];
    if (html === undefined) throw new Error(`fetch failed for ${url}`);
    return html;
  });
}

const config = { url: LANDING, marker: MARKER, concurrency: 4 };

describe("MS scratchers scraper", () => {
  const info = vi.spyOn(logger, "info").mockImplementation(() => {});
  const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
  const debug = vi.spyOn(logger, "debug").mockImplementation(() => {});

  beforeEach(() => {
    info.mockClear();
    warn.mockClear();
    debug.mockClear();
  });

  afterAll(() => {
    vi.restoreAllMocks();
  });

  describe("fetchLandingLinks", () => {
    it("resolves container links against the landing URL", async () => {
      const fetchPage = fakeSite({ "lucky-7s": "", "cash-blast": "" });
      const links = await fetchLandingLinks(config, { fetchPage });

      expect(fetchPage).toHaveBeenCalledWith(LANDING);
      expect(links).toEqual([gameUrl("lucky-7s"), gameUrl("cash-blast")]);
    });

    it("propagates a landing page failure", async () => {
      const fetchPage = vi.fn(async () => {
        throw new Error("getaddrinfo ENOTFOUND lottery.test");
      });
      await expect(fetchLandingLinks(config, { fetchPage })).rejects.toThrow("ENOTFOUND");
    });
  });

  describe("fetchGame", () => {
    it("names the game after the last URL segment", async () => {
      const fetchPage = fakeSite({ "lucky-7s": gameHtml("$5", "1:3.50", [["$100", "50", "10"]]) });
      const game = await fetchGame(gameUrl("lucky-7s"), fetchPage);

      expect(game).toMatchObject({
        name: "lucky 7s",
        price: 5,
        odds: 3.5,
        totalOriginalPrizes: 50,
        totalRemainingPrizes: 10,
        url: gameUrl("lucky-7s"),
      });
    });

    it("logs and returns null when the page cannot be fetched", async () => {
      const fetchPage = fakeSite({});
      await expect(fetchGame(gameUrl("gone"), fetchPage)).resolves.toBeNull();
      expect(warn).toHaveBeenCalledWith(
        "[ms] error fetching game page",
        expect.objectContaining({ url: gameUrl("gone"), error: `fetch failed for ${gameUrl("gone")}` }),
      );
    });
  });

  describe("scrapeActiveGames", () => {
    it("builds one game per link and skips failed pages", async () => {
      const fetchPage = fakeSite({
        alpha: gameHtml("$5", "1:2.00", [["$10", "10", "5"]]),
        beta: gameHtml("$2", "1:4.00", [["$100", "4", "1"]]),
        broken: "",
      });
      const failing = vi.fn(async (url: string) => {
        if (url === gameUrl("broken")) throw new Error("HTTP 500 Internal Server Error");
        return fetchPage(url);
      });

      const { games, links, skipped } = await scrapeActiveGames(config, { fetchPage: failing });

      expect(links).toHaveLength(3);
      expect(games.map((g) => g.name).sort()).toEqual(["alpha", "beta"]);
      expect(skipped).toEqual([gameUrl("broken")]);
    });

    it("never runs more fetches at once than the concurrency cap and waits for all of them", async () => {
      const slugs = Array.from({ length: 10 }, (_, i) => `game-${i}`);
      const landing = landingHtml(slugs);
      let inFlight = 0;
      let maxInFlight = 0;
      let completed = 0;

      const fetchPage = async (url: string) => {
        if (url === LANDING) return landing;
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((r) => setTimeout(r, 5));
        inFlight--;
        completed++;
        return gameHtml("$1", "1:5.00", [["$5", "10", "10"]]);
      };

      const { games } = await scrapeActiveGames({ ...config, concurrency: 3 }, { fetchPage });

      expect(completed).toBe(10);
      expect(games).toHaveLength(10);
      expect(maxInFlight).toBe(3);
      expect(inFlight).toBe(0);
    });

    it("fails the whole run when the landing page fails", async () => {
      const fetchPage = vi.fn(async () => {
        throw new Error("fetch failed");
      });
      await expect(scrapeActiveGames(config, { fetchPage })).rejects.toThrow("fetch failed");
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });
  });

  describe("main", () => {
    it("writes the CSV sorted by EV, highest first, plus the JSON index", async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ms-scratchers-"));
      const out = path.join(dir, "nested", "report.csv");
      const json = path.join(dir, "index.json");

      // EVs: alpha 5 - 5/10*10 = 0, beta 2 - 1/4*100 = -23, gamma no prizes left = 10
      const fetchPage = fakeSite({
        alpha: gameHtml("$5", "1:2.00", [["$10", "10", "5"]]),
        beta: gameHtml("$2", "1:4.00", [["$100", "4", "1"]]),
        gamma: gameHtml("$10", "1:3.00", [["$50", "3", "0"]]),
      });

      try {
        const sorted = await main({ ...config, concurrency: 2, out, json }, { fetchPage });
        expect(sorted.map((g) => g.name)).toEqual(["gamma", "alpha", "beta"]);

        const lines = (await fs.readFile(out, "utf8")).trimEnd().split("\n");
        expect(lines).toHaveLength(4);
        expect(lines[1]).toBe(`gamma,10,1:3.00,2024-03-01,3,0,9,0,10.00,${gameUrl("gamma")}`);
        expect(lines[2]).toBe(`alpha,5,1:2.00,2024-03-01,10,5,20,10,0.00,${gameUrl("alpha")}`);
        expect(lines[3]).toBe(`beta,2,1:4.00,2024-03-01,4,1,16,4,-23.00,${gameUrl("beta")}`);

        const evs = lines.slice(1).map((l) => Number(l.split(",")[8]));
        for (let i = 1; i < evs.length; i++) expect(evs[i]).toBeLessThanOrEqual(evs[i - 1]);

        const index = JSON.parse(await fs.readFile(json, "utf8"));
        expect(index.count).toBe(3);
        expect(index.games[0]).toMatchObject({ name: "gamma", ev: 10, remainingTickets: 0, originalTickets: 9 });

        expect(info).toHaveBeenCalledWith(`Data written to ${out}`, { json });
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it("propagates a report write failure", async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ms-scratchers-"));
      const fetchPage = fakeSite({ alpha: gameHtml("$5", "1:2.00", [["$10", "10", "5"]]) });
      try {
        // the output path is an existing directory
        await expect(main({ ...config, out: dir }, { fetchPage })).rejects.toThrow();
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });
  });
});
