// scripts/scratchers/config.ts
import mri from "mri";
import { z } from "zod";
import { DEFAULT_MARKER } from "./parse_lists.js";

export const DEFAULTS = {
  url: "https://www.mslottery.com/gamestatus/active/",
  out: "mslotto_games.csv",
  concurrency: 75,
  marker: DEFAULT_MARKER,
} as const;

const Config = z.object({
  url: z.string().url(),
  out: z.string().min(1),
  json: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1),
  marker: z.string().min(1),
});

export type ScraperConfig = z.infer<typeof Config>;

type Env = Record<string, string | undefined>;

// mri hands back `true` for a bare "--out"; treat that like the flag was absent
function flag(v: unknown): string | undefined {
  if (typeof v === "string" && v !== "") return v;
  if (typeof v === "number") return String(v);
  return undefined;
}

/** Flags win over env vars, env vars over the defaults. */
export function loadConfig(args: string[], env: Env = process.env): ScraperConfig {
  const argv = mri(args, {
    string: ["url", "out", "json", "concurrency", "marker"],
    alias: { c: "concurrency", o: "out" },
  });

  const parsed = Config.safeParse({
    url: flag(argv.url) ?? env.MS_SCRATCHERS_URL ?? DEFAULTS.url,
    out: flag(argv.out) ?? env.MS_SCRATCHERS_OUT ?? DEFAULTS.out,
    json: flag(argv.json) ?? env.MS_SCRATCHERS_JSON,
    concurrency: flag(argv.concurrency) ?? env.MS_SCRATCHERS_CONCURRENCY ?? DEFAULTS.concurrency,
    marker: flag(argv.marker) ?? env.MS_SCRATCHERS_MARKER ?? DEFAULTS.marker,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "config"}: ${i.message}`)
      .join("; ");
    throw new Error(`[config] invalid scraper configuration (${detail})`);
  }
  return parsed.data;
}
