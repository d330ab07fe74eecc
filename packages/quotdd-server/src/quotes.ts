import { readFile } from "node:fs/promises";
import { randomInt } from "node:crypto";
import { fileURLToPath } from "node:url";
import { QuoteListSchema, type QuoteList } from "@quotdd/contracts";

export const DEFAULT_QUOTES_FILE = fileURLToPath(new URL("../quotes.json", import.meta.url));

export class QuoteBook {
  private readonly quotes: readonly string[];

  constructor(
    quotes: readonly string[],
    private readonly random: (max: number) => number = (max) => randomInt(max),
  ) {
    if (quotes.length === 0) {
      throw new Error("Quotes are empty");
    }
    this.quotes = [...quotes];
  }

  pick(): string {
    const quote = this.quotes[this.random(this.quotes.length)];
    if (quote === undefined) {
      throw new Error("Quote index out of range");
    }
    return quote;
  }

  get size(): number {
    return this.quotes.length;
  }

  list(): readonly string[] {
    return this.quotes;
  }
}

export function parseQuotes(raw: unknown, source: string): QuoteList {
  if (Array.isArray(raw) && raw.length === 0) {
    throw new Error("Quotes are empty");
  }
  const parsed = QuoteListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid quote file ${source}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}

export async function loadQuotes(file: string = DEFAULT_QUOTES_FILE): Promise<QuoteBook> {
  const text = await readFile(file, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Invalid quote file ${file}: not valid JSON`, { cause: error });
  }
  return new QuoteBook(parseQuotes(raw, file));
}
