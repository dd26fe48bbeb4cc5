// scripts/scratchers/write_report.ts
import * as fs from "node:fs/promises";
import { gamesToCSV } from "../../lib/csv.js";
import {
  compareByEvDescending,
  expectedValue,
  originalTickets,
  remainingTickets,
  type Game,
} from "../../lib/scratchers.js";
import { ensureDir } from "./_util.js";

/** Sorts a copy by EV (highest first) and writes the CSV. Write errors propagate. */
export async function writeReport(games: readonly Game[], outPath: string): Promise<Game[]> {
  const sorted = games.slice().sort(compareByEvDescending);
  await ensureDir(outPath);
  await fs.writeFile(outPath, gamesToCSV(sorted), "utf8");
  return sorted;
}

/** Same games as the CSV, with the derived numbers spelled out. */
export async function writeJsonIndex(games: readonly Game[], outPath: string): Promise<void> {
  const payload = {
    updatedAt: new Date().toISOString(),
    count: games.length,
    games: games.map((g) => ({
      ...g,
      originalTickets: originalTickets(g),
      remainingTickets: remainingTickets(g),
      ev: expectedValue(g),
    })),
  };
  await ensureDir(outPath);
  await fs.writeFile(outPath, JSON.stringify(payload, null, 2), "utf8");
}
