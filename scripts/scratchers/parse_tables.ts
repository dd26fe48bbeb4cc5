// scripts/scratchers/parse_tables.ts
// Flat, single-pass table scrape over the tokenizer stream.
// Nested tables are not supported: an inner <table> restarts the current one.
import { Parser } from "htmlparser2";

export type TableRow = string[];
export type Table = TableRow[];

export function extractTables(html: string): Table[] {
  const tables: Table[] = [];
  let currentTable: Table = [];
  let currentRow: TableRow = [];

  let inTable = false;
  let inRow = false;
  let inCell = false;

  // htmlparser2 may split one text run into several chunks (entities, buffer
  // boundaries); join them and flush at the next tag like a tokenizer would.
  let pendingText = "";
  const flushText = () => {
    if (inCell) {
      const txt = pendingText.trim();
      if (txt) currentRow.push(txt);
    }
    pendingText = "";
  };

  const parser = new Parser(
    {
      ontext(data) {
        pendingText += data;
      },
      oncomment() {
        flushText();
      },
      onopentag(name) {
        flushText();
        switch (name) {
          case "table":
            inTable = true;
            currentTable = [];
            break;
          case "tr":
            if (inTable) {
              inRow = true;
              currentRow = [];
            }
            break;
          case "td":
          case "th":
            if (inRow) inCell = true;
            break;
        }
      },
      onclosetag(name) {
        flushText();
        switch (name) {
          case "td":
          case "th":
            inCell = false;
            break;
          case "tr":
            if (inRow) {
              inRow = false;
              currentTable.push(currentRow);
            }
            break;
          case "table":
            if (inTable) {
              inTable = false;
              tables.push(currentTable);
            }
            break;
        }
      },
      onend() {
        flushText();
      },
    },
    { decodeEntities: true },
  );

  parser.write(html);
  parser.end();
  return tables;
}
