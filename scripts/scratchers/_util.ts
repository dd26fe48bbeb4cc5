// scripts/scratchers/_util.ts
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fetch as undiciFetch } from "undici";
import type { Dispatcher } from "undici";

export async function ensureDir(filePath: string) {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
}

/* ---------------- number parsing ---------------- */
// Site cells are plain text; anything that isn't a clean integer is treated as 0.

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function toIntOrZero(s: string): number {
  const t = s.trim();
  if (!INT_RE.test(t)) return 0;
  const n = Number(t);
  return Number.isSafeInteger(n) ? n : 0;
}

/** "$1,000" -> 1000. Cents ("$5.00") are not accepted and give 0. */
export function parseDollars(s: string): number {
  return toIntOrZero(s.replace(/[$,]/g, ""));
}

/** "12,345" -> 12345 */
export function parseCount(s: string): number {
  return toIntOrZero(s.replace(/,/g, ""));
}

/** "1:4.50" -> 4.5; anything without exactly one colon gives 0. */
export function parseOdds(s: string): number {
  const parts = s.split(":");
  if (parts.length !== 2) return 0;
  const rhs = parts[1].trim();
  if (!FLOAT_RE.test(rhs)) return 0;
  const n = Number(rhs);
  return Number.isFinite(n) ? n : 0;
}

/** ".../games/lucky-7s/" -> "lucky 7s". URLs without a path segment come back unchanged. */
export function gameNameFromUrl(url: string): string {
  const parts = url.replace(/^\/+|\/+$/g, "").split("/");
  if (parts.length > 1) return parts[parts.length - 1].replace(/-/g, " ");
  return url;
}

/* ---------------- HTTP ---------------- */

export type FetchTextOptions = {
  // test seam: undici MockAgent
  dispatcher?: Dispatcher;
};

export type PageFetcher = (url: string) => Promise<string>;

/** Plain GET, no headers or timeout. Non-2xx responses reject like transport errors. */
export async function fetchText(url: string, opts: FetchTextOptions = {}): Promise<string> {
  const res = await undiciFetch(url, opts.dispatcher ? { dispatcher: opts.dispatcher } : undefined);
  if (!res.ok) {
    throw new Error(`HTTP ${res.status} ${res.statusText} for ${url}`);
  }
  return await res.text();
}
