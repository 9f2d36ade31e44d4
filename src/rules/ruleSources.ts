import fs from "node:fs/promises";

import type { RetryingHttpClient } from "../services/integrations/http/retryingHttpClient.js";
import { RuleConfigError } from "./ruleTypes.js";

/** Produces raw rule configuration; validation happens when the table is built. */
export interface RuleSource {
  readonly name: string;
  load(): Promise<unknown>;
}

export class FileRuleSource implements RuleSource {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `file:${filePath}`;
  }

  async load(): Promise<unknown> {
    const content = await fs.readFile(this.filePath, { encoding: "utf8" });
    try {
      return JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RuleConfigError([`not valid JSON (${message})`], this.name);
    }
  }
}

export class StaticRuleSource implements RuleSource {
  constructor(
    private readonly config: unknown,
    readonly name = "static",
  ) {}

  async load(): Promise<unknown> {
    return this.config;
  }
}

const REQUIRED_COLUMNS = ["asset", "tf", "tp1", "tp2", "tp3", "sl"] as const;

interface SheetAssetDraft {
  aliases: string[];
  decimals?: number | string;
  pipSize?: string;
  priceSymbol?: string;
  timeframes: Record<string, Record<string, string>>;
}

export function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = "";
  let quoted = false;
  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (quoted) {
      if (char === "\"" && line[index + 1] === "\"") {
        current += "\"";
        index += 1;
      } else if (char === "\"") {
        quoted = false;
      } else {
        current += char;
      }
      continue;
    }
    if (char === "\"") {
      quoted = true;
    } else if (char === ",") {
      cells.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }
  cells.push(current.trim());
  return cells;
}

function normalizeHeader(cell: string): string {
  return cell.trim().toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Converts a rules sheet export (`Asset, TF, TP1, TP2, TP3, SL, Unit` plus
 * optional `Aliases`, `PipSize`, `Decimals`, `PriceSymbol`) into the same raw
 * shape as the JSON rule file.
 */
export function parseRuleSheetCsv(content: string, sourceName = "sheet"): unknown {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [headerLine, ...rows] = lines;
  if (headerLine === undefined) {
    throw new RuleConfigError(["sheet is empty"], sourceName);
  }

  const header = splitCsvLine(headerLine).map(normalizeHeader);
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new RuleConfigError([`missing columns: ${missing.join(", ")}`], sourceName);
  }

  const assets: Record<string, SheetAssetDraft> = {};
  for (const row of rows) {
    const cells = splitCsvLine(row);
    const cell = (column: string): string => {
      const index = header.indexOf(column);
      return index >= 0 ? cells[index] ?? "" : "";
    };

    const symbol = cell("asset").toUpperCase();
    if (!symbol) {
      continue;
    }
    const draft = assets[symbol] ?? { aliases: [], timeframes: {} };
    assets[symbol] = draft;

    for (const alias of cell("aliases").split(/[|,]/)) {
      const trimmed = alias.trim();
      if (trimmed && !draft.aliases.includes(trimmed)) {
        draft.aliases.push(trimmed);
      }
    }
    const decimals = cell("decimals");
    if (decimals) {
      draft.decimals = /^\d+$/.test(decimals) ? Number.parseInt(decimals, 10) : decimals;
    }
    const pipSize = cell("pipsize");
    if (pipSize) {
      draft.pipSize = pipSize;
    }
    const priceSymbol = cell("pricesymbol");
    if (priceSymbol) {
      draft.priceSymbol = priceSymbol;
    }

    draft.timeframes[cell("tf")] = {
      tp1: cell("tp1"),
      tp2: cell("tp2"),
      tp3: cell("tp3"),
      sl: cell("sl"),
      unit: cell("unit") || "%",
    };
  }

  return { assets };
}

export interface SheetRuleSourceOptions {
  readonly csvUrl: string;
  readonly http: RetryingHttpClient;
}

/** Reads rules from a spreadsheet published as CSV. */
export class SheetRuleSource implements RuleSource {
  readonly name: string;

  constructor(private readonly options: SheetRuleSourceOptions) {
    this.name = `sheet:${options.csvUrl}`;
  }

  async load(): Promise<unknown> {
    const content = await this.options.http.getText(this.options.csvUrl);
    return parseRuleSheetCsv(content, this.name);
  }
}
