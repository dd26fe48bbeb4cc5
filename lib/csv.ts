// lib/csv.ts
import {
  expectedValue,
  originalTickets,
  remainingTickets,
  type Game,
} from './scratchers.js';

export const REPORT_HEADER = [
  'Name',
  'Price',
  'Odds',
  'Launch Date',
  'Original Winning Tickets',
  'Remaining Winning Tickets',
  'Estimated Original Tickets',
  'Estimated Remaining Tickets',
  'EV',
  'URL',
] as const;

/** Quote only when the field would otherwise break the row. */
export function csvField(value: string): string {
  if (value === '') return value;
  const needsQuotes = /[",\r\n]/.test(value) || value.startsWith(' ');
  return needsQuotes ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatOdds(odds: number): string {
  return `1:${odds.toFixed(2)}`;
}

export function gameToRow(g: Game): string[] {
  return [
    g.name,
    String(g.price),
    formatOdds(g.odds),
    g.launchDate,
    String(g.totalOriginalPrizes),
    String(g.totalRemainingPrizes),
    String(originalTickets(g)),
    String(remainingTickets(g)),
    expectedValue(g).toFixed(2),
    g.url,
  ];
}

/** Pure helper: serializes games in the order given (callers sort). */
export function gamesToCSV(games: readonly Game[], eol: '\n' | '\r\n' = '\n'): string {
  const rows: ReadonlyArray<readonly string[]> = [REPORT_HEADER, ...games.map(gameToRow)];
  return rows.map((cells) => cells.map(csvField).join(',')).join(eol) + eol;
}
