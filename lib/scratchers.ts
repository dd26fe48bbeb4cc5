// lib/scratchers.ts
// Game model shared by the MS scraper and the report writer.
// Monetary values are whole DOLLARS; odds are stored as the divisor ("1:4.50" -> 4.5).

// -----------------------------
// Types
// -----------------------------
export type PrizeTier = Readonly<{
  value: number;           // dollars
  originalCount: number;
  remainingCount: number;
}>;

export type Game = Readonly<{
  name: string;
  price: number;           // dollars
  odds: number;            // overall odds divisor
  launchDate: string;      // as printed on the site
  prizeTiers: readonly PrizeTier[];
  totalOriginalPrizes: number;   // sum of originalCount
  totalRemainingPrizes: number;  // sum of remainingCount
  url: string;
}>;

export type GameFields = {
  name: string;
  url: string;
  price: number;
  odds: number;
  launchDate: string;
  prizeTiers: PrizeTier[];
};

// -----------------------------
// Construction
// -----------------------------
/** Builds a frozen Game; the prize totals are always derived from the tiers. */
export function buildGame(fields: GameFields): Game {
  let totalOriginalPrizes = 0;
  let totalRemainingPrizes = 0;
  for (const t of fields.prizeTiers) {
    totalOriginalPrizes += t.originalCount;
    totalRemainingPrizes += t.remainingCount;
  }

  return Object.freeze({
    name: fields.name,
    price: fields.price,
    odds: fields.odds,
    launchDate: fields.launchDate,
    prizeTiers: Object.freeze(fields.prizeTiers.map((t) => Object.freeze({ ...t }))),
    totalOriginalPrizes,
    totalRemainingPrizes,
    url: fields.url,
  });
}

// -----------------------------
// Derived values
// -----------------------------
// Math.round rounds .5 toward +Infinity; tickets round half away from zero.
function roundHalfAway(n: number): number {
  return Math.sign(n) * Math.round(Math.abs(n));
}

/** Estimated print run: odds x total winning tickets. */
export function originalTickets(g: Game): number {
  return roundHalfAway(g.odds * g.totalOriginalPrizes);
}

/** Estimated tickets still unsold, from the remaining winners. */
export function remainingTickets(g: Game): number {
  return roundHalfAway(g.odds * g.totalRemainingPrizes);
}

/**
 * Expected net cost of one ticket given the prizes still out there:
 * price minus the probability-weighted value of every remaining tier.
 * With no remaining tickets the whole price is lost.
 */
export function expectedValue(g: Game): number {
  const tickets = remainingTickets(g);
  if (tickets === 0) return g.price;

  let expectedWin = 0;
  for (const t of g.prizeTiers) {
    if (t.remainingCount <= 0 || t.value <= 0) continue;
    expectedWin += (t.remainingCount / tickets) * t.value;
  }
  return g.price - expectedWin;
}

/** Report order: numerically highest EV first. */
export function compareByEvDescending(a: Game, b: Game): number {
  return expectedValue(b) - expectedValue(a);
}
