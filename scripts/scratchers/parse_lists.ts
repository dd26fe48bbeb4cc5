// scripts/scratchers/parse_lists.ts
import { Parser } from "htmlparser2";

export const DEFAULT_MARKER = "col-lg-3 gamebox";

export type DiscoverOptions = {
  /** exact value of the container's class attribute */
  marker?: string;
};

/**
 * Container tracking as a tiny automaton:
 *   outside --<div class=marker>--> inside(1)
 *   inside(d) --<div>--> inside(d+1)
 *   inside(d) --</div>--> inside(d-1), or done when d reaches 0
 * Only the first marker container is scanned.
 */
type ScanState =
  | { kind: "outside" }
  | { kind: "inside"; depth: number }
  | { kind: "done" };

function onDivOpen(state: ScanState, className: string | undefined, marker: string): ScanState {
  switch (state.kind) {
    case "outside":
      return className === marker ? { kind: "inside", depth: 1 } : state;
    case "inside":
      return { kind: "inside", depth: state.depth + 1 };
    case "done":
      return state;
  }
}

function onDivClose(state: ScanState): ScanState {
  if (state.kind !== "inside") return state;
  return state.depth <= 1 ? { kind: "done" } : { kind: "inside", depth: state.depth - 1 };
}

/** hrefs of the anchors inside the marker container, in document order, de-duplicated. */
export function discoverGameLinks(html: string, opts: DiscoverOptions = {}): string[] {
  const marker = opts.marker ?? DEFAULT_MARKER;
  const seen = new Set<string>();
  const links: string[] = [];
  let state: ScanState = { kind: "outside" };

  const parser = new Parser({
    onopentag(name, attribs) {
      if (name === "div") {
        state = onDivOpen(state, attribs.class, marker);
        return;
      }
      if (name === "a" && state.kind === "inside") {
        const href = attribs.href?.trim();
        if (href && !seen.has(href)) {
          seen.add(href);
          links.push(href);
        }
      }
    },
    onclosetag(name) {
      if (name === "div") state = onDivClose(state);
    },
  });

  parser.write(html);
  parser.end();
  return links;
}
