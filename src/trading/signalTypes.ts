import type { Decimal } from "decimal.js";

import type { DistanceUnit, RuleNotFound } from "../rules/ruleTypes.js";

export type Direction = "LONG" | "SHORT";

export interface ParsedSignal {
  readonly direction: Direction;
  readonly assetToken: string;
  readonly timeframeToken: string;
  readonly entryPrice?: Decimal;
  readonly text: string;
}

/** Parsed signal after the rule store resolved its tokens to canonical names. */
export interface TradingIntent {
  readonly direction: Direction;
  readonly asset: string;
  readonly timeframe: string;
  readonly entryPrice?: Decimal;
}

export interface LevelDistances {
  readonly tp1: Decimal;
  readonly tp2: Decimal;
  readonly tp3: Decimal;
  readonly sl: Decimal;
}

export interface LevelResult {
  readonly direction: Direction;
  readonly asset: string;
  readonly timeframe: string;
  readonly unit: DistanceUnit;
  readonly decimals: number;
  readonly entryPrice: Decimal;
  readonly tp1Price: Decimal;
  readonly tp2Price: Decimal;
  readonly tp3Price: Decimal;
  readonly slPrice: Decimal;
  readonly rrRatio: Decimal;
  readonly distances: LevelDistances;
}

export type ParseFailureReason =
  | "NOT_A_SIGNAL"
  | "UNRECOGNIZED_DIRECTION"
  | "INCOMPLETE_MESSAGE"
  | "INVALID_PRICE";

export interface ParseFailure {
  readonly kind: "parse_failure";
  readonly reason: ParseFailureReason;
  readonly input: string;
  readonly message: string;
}

export type CalculationErrorReason = "MISSING_ENTRY_PRICE" | "ZERO_RISK_DISTANCE" | "PRICE_UNAVAILABLE";

export interface CalculationError {
  readonly kind: "calculation_error";
  readonly reason: CalculationErrorReason;
  readonly input: string;
  readonly message: string;
}

export type SignalParseResult =
  | { readonly ok: true; readonly signal: ParsedSignal }
  | { readonly ok: false; readonly failure: ParseFailure };

export type CalculationOutcome =
  | { readonly ok: true; readonly result: LevelResult }
  | { readonly ok: false; readonly failure: CalculationError };

export type PipelineStage = "parse" | "resolve" | "calculate";

export type PipelineFailure =
  | { readonly stage: "parse"; readonly error: ParseFailure }
  | { readonly stage: "resolve"; readonly error: RuleNotFound }
  | { readonly stage: "calculate"; readonly error: CalculationError };

export type FailureReason = PipelineFailure["error"]["reason"];

export function isIgnorableFailure(failure: PipelineFailure): boolean {
  return failure.stage === "parse" && failure.error.reason === "NOT_A_SIGNAL";
}

export function describeFailure(failure: PipelineFailure): string {
  return `Signal rejected at ${failure.stage} (${failure.error.reason}): ${failure.error.message}`;
}

export interface SerializedLevelResult {
  readonly direction: Direction;
  readonly asset: string;
  readonly timeframe: string;
  readonly unit: DistanceUnit;
  readonly entryPrice: string;
  readonly tp1Price: string;
  readonly tp2Price: string;
  readonly tp3Price: string;
  readonly slPrice: string;
  readonly rrRatio: string;
  readonly distances: Record<keyof LevelDistances, string>;
}

/** Decimal values rendered at the asset's display precision; the ratio keeps two places. */
export function serializeLevelResult(result: LevelResult): SerializedLevelResult {
  const price = (value: Decimal): string => value.toFixed(result.decimals);
  return {
    direction: result.direction,
    asset: result.asset,
    timeframe: result.timeframe,
    unit: result.unit,
    entryPrice: price(result.entryPrice),
    tp1Price: price(result.tp1Price),
    tp2Price: price(result.tp2Price),
    tp3Price: price(result.tp3Price),
    slPrice: price(result.slPrice),
    rrRatio: result.rrRatio.toFixed(2),
    distances: {
      tp1: result.distances.tp1.toString(),
      tp2: result.distances.tp2.toString(),
      tp3: result.distances.tp3.toString(),
      sl: result.distances.sl.toString(),
    },
  };
}
