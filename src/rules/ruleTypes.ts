import type { Decimal } from "decimal.js";

export type DistanceUnit = "percent" | "pips" | "points";

/** Offsets from entry for one timeframe; all four magnitudes are strictly positive. */
export interface TFRule {
  readonly tp1: Decimal;
  readonly tp2: Decimal;
  readonly tp3: Decimal;
  readonly sl: Decimal;
  readonly unit: DistanceUnit;
}

export interface AssetRule {
  readonly symbol: string;
  readonly aliases: readonly string[];
  readonly timeframes: ReadonlyMap<string, TFRule>;
  readonly pipSize: Decimal;
  /** Display precision for prices of this asset. */
  readonly decimals: number;
  /** Ticker used by live price providers when it differs from the canonical symbol. */
  readonly priceSymbol?: string;
}

export interface ResolvedRule {
  readonly asset: AssetRule;
  readonly timeframe: string;
  readonly rule: TFRule;
}

export type RuleNotFoundReason = "UNKNOWN_ASSET" | "UNKNOWN_TIMEFRAME";

export interface RuleNotFound {
  readonly kind: "rule_not_found";
  readonly reason: RuleNotFoundReason;
  readonly input: string;
  readonly message: string;
  readonly available?: readonly string[];
}

export type RuleResolution =
  | { readonly found: true; readonly resolved: ResolvedRule }
  | { readonly found: false; readonly failure: RuleNotFound };

/** Lookup surface shared by the parser and the rule store. */
export interface SymbolDirectory {
  resolveAsset(token: string): AssetRule | undefined;
  normalizeTimeframe(token: string): string | undefined;
}

export class RuleConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], source?: string) {
    const prefix = source ? `Invalid rule configuration from ${source}` : "Invalid rule configuration";
    super(`${prefix}: ${issues.join("; ")}`);
    this.name = "RuleConfigError";
    this.issues = issues;
  }
}
