// scripts/scratchers/parse_game_page.ts
import { buildGame, type Game, type PrizeTier } from "../../lib/scratchers.js";
import { parseCount, parseDollars, parseOdds } from "./_util.js";
import { extractTables, type Table } from "./parse_tables.js";

export type GameMetadata = {
  price: number;        // dollars
  overallOdds: number;  // divisor
  launchDate: string;   // verbatim
};

/** Key/value table: "Ticket Price", "Overall Odds", "Launch Date". Unknown rows are ignored. */
export function parseMetadata(table: Table): GameMetadata {
  const meta: GameMetadata = { price: 0, overallOdds: 0, launchDate: "" };
  for (const row of table) {
    if (row.length < 2) continue;
    const key = row[0].toLowerCase();
    const val = row[1];

    if (key.includes("ticket price")) meta.price = parseDollars(val);
    else if (key.includes("overall odds")) meta.overallOdds = parseOdds(val);
    else if (key.includes("launch date")) meta.launchDate = val;
  }
  return meta;
}

/** Prize grid: [prize, original count, remaining count]; header row and "2nd Chance" rows skipped. */
export function parsePrizeTiers(table: Table): PrizeTier[] {
  const tiers: PrizeTier[] = [];
  for (const row of table.slice(1)) {
    if (row.length < 3) continue;
    if (row[0].toLowerCase().includes("2nd chance")) continue;

    tiers.push({
      value: parseDollars(row[0]),
      originalCount: parseCount(row[1]),
      remainingCount: parseCount(row[2]),
    });
  }
  return tiers;
}

// Table positions are fixed by the site layout: metadata first, prize grid second.
const META_TABLE = 0;
const PRIZE_TABLE = 1;

export function gameFromTables(tables: Table[], name: string, url: string): Game {
  const meta = parseMetadata(tables[META_TABLE] ?? []);
  const prizeTiers = parsePrizeTiers(tables[PRIZE_TABLE] ?? []);
  return buildGame({
    name,
    url,
    price: meta.price,
    odds: meta.overallOdds,
    launchDate: meta.launchDate,
    prizeTiers,
  });
}

export function parseGamePage(html: string, name: string, url: string): Game {
  return gameFromTables(extractTables(html), name, url);
}
