import { Decimal } from "decimal.js";

import type { AssetRule, DistanceUnit, ResolvedRule } from "../rules/ruleTypes.js";
import type {
  CalculationErrorReason,
  CalculationOutcome,
  Direction,
  LevelResult,
} from "./signalTypes.js";

const HUNDRED = new Decimal(100);

function toDecimal(value: Decimal.Value | null | undefined): Decimal | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  try {
    const decimal = new Decimal(value);
    return decimal.isFinite() ? decimal : undefined;
  } catch {
    // decimal.js throws on malformed strings
    return undefined;
  }
}

/** Absolute price offset for a rule magnitude. */
export function distanceFor(unit: DistanceUnit, magnitude: Decimal, entry: Decimal, asset: AssetRule): Decimal {
  switch (unit) {
    case "percent":
      return entry.mul(magnitude).div(HUNDRED);
    case "pips":
      return magnitude.mul(asset.pipSize);
    case "points":
      return magnitude;
  }
}

function fail(reason: CalculationErrorReason, input: string, message: string): CalculationOutcome {
  return { ok: false, failure: { kind: "calculation_error", reason, input, message } };
}

/**
 * Applies a resolved rule to an entry price. LONG places targets above entry
 * and the stop below; SHORT mirrors both. Pure: no I/O, no clock.
 */
export function calculateLevels(
  direction: Direction,
  resolved: ResolvedRule,
  entryPrice: Decimal.Value | null | undefined,
): CalculationOutcome {
  const { asset, timeframe, rule } = resolved;
  const entry = toDecimal(entryPrice);
  if (!entry || entry.lte(0)) {
    return fail(
      "MISSING_ENTRY_PRICE",
      entryPrice === undefined || entryPrice === null ? "" : String(entryPrice),
      `A positive entry price is required for ${asset.symbol} ${timeframe}`,
    );
  }

  const sign = direction === "LONG" ? 1 : -1;
  const target = (magnitude: Decimal): Decimal =>
    entry.add(distanceFor(rule.unit, magnitude, entry, asset).mul(sign));

  const tp1Price = target(rule.tp1);
  const tp2Price = target(rule.tp2);
  const tp3Price = target(rule.tp3);
  const slPrice = entry.sub(distanceFor(rule.unit, rule.sl, entry, asset).mul(sign));

  const risk = slPrice.sub(entry).abs();
  if (risk.isZero()) {
    return fail("ZERO_RISK_DISTANCE", entry.toString(), `Stop distance for ${asset.symbol} ${timeframe} is zero`);
  }
  const reward = tp1Price.sub(entry).abs();

  const result: LevelResult = Object.freeze({
    direction,
    asset: asset.symbol,
    timeframe,
    unit: rule.unit,
    decimals: asset.decimals,
    entryPrice: entry,
    tp1Price,
    tp2Price,
    tp3Price,
    slPrice,
    rrRatio: reward.div(risk),
    distances: Object.freeze({
      tp1: rule.tp1,
      tp2: rule.tp2,
      tp3: rule.tp3,
      sl: rule.sl,
    }),
  });
  return { ok: true, result };
}
