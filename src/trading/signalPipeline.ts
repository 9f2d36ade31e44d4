import { Decimal } from "decimal.js";

import type { AssetRule, RuleResolution, SymbolDirectory } from "../rules/ruleTypes.js";
import { ConsoleLogger, type Logger } from "../telemetry/logger.js";
import { NoopMetrics, type MetricsRecorder } from "../telemetry/metrics.js";
import { calculateLevels } from "./levelCalculator.js";
import { parseSignal } from "./signalParser.js";
import {
  isIgnorableFailure,
  type CalculationError,
  type LevelResult,
  type PipelineFailure,
  type TradingIntent,
} from "./signalTypes.js";

export type PipelineState = "idle" | "parsed" | "rule_resolved" | "calculated" | "done" | "failed";

/** Current market price for an asset. Must settle promptly or honour the abort signal. */
export type PriceLookup = (asset: AssetRule, signal: AbortSignal) => Promise<Decimal.Value | null | undefined>;

export interface RuleResolver extends SymbolDirectory {
  resolve(assetToken: string, timeframeToken: string): RuleResolution;
}

export type PriceSource = "message" | "lookup";

export type PipelineOutcome =
  | {
      readonly status: "done";
      readonly intent: TradingIntent;
      readonly result: LevelResult;
      readonly priceSource: PriceSource;
      readonly trace: readonly PipelineState[];
    }
  | {
      readonly status: "failed";
      readonly failure: PipelineFailure;
      readonly trace: readonly PipelineState[];
    };

export interface SignalPipelineOptions {
  readonly rules: RuleResolver;
  readonly priceLookup?: PriceLookup;
  readonly priceTimeoutMs?: number;
  readonly logger?: Logger;
  readonly metrics?: MetricsRecorder;
}

const DEFAULT_PRICE_TIMEOUT_MS = 3_000;
const TIMED_OUT = Symbol("price-lookup-timeout");

type PriceLookupResult =
  | { readonly ok: true; readonly price: Decimal }
  | { readonly ok: false; readonly message: string };

/**
 * Parse, resolve, price, calculate. Every run is independent; the rule
 * resolver is the only shared state and it is read once per stage.
 */
export class SignalPipeline {
  private readonly logger: Logger;
  private readonly metrics: MetricsRecorder;
  private readonly priceTimeoutMs: number;

  constructor(private readonly options: SignalPipelineOptions) {
    this.logger = options.logger ?? new ConsoleLogger("pipeline");
    this.metrics = options.metrics ?? new NoopMetrics();
    this.priceTimeoutMs = options.priceTimeoutMs ?? DEFAULT_PRICE_TIMEOUT_MS;
  }

  async process(rawText: string, currentPriceLookup?: PriceLookup): Promise<PipelineOutcome> {
    const startedAt = Date.now();
    const outcome = await this.run(rawText, currentPriceLookup ?? this.options.priceLookup);
    this.record(outcome, rawText, Date.now() - startedAt);
    return outcome;
  }

  private async run(rawText: string, priceLookup: PriceLookup | undefined): Promise<PipelineOutcome> {
    const trace: PipelineState[] = ["idle"];
    const failed = (failure: PipelineFailure): PipelineOutcome => {
      trace.push("failed");
      return { status: "failed", failure, trace };
    };

    const parsed = parseSignal(rawText, { directory: this.options.rules });
    if (!parsed.ok) {
      return failed({ stage: "parse", error: parsed.failure });
    }
    trace.push("parsed");
    const { signal } = parsed;

    const resolution = this.options.rules.resolve(signal.assetToken, signal.timeframeToken);
    if (!resolution.found) {
      return failed({ stage: "resolve", error: resolution.failure });
    }
    trace.push("rule_resolved");
    const { resolved } = resolution;

    const intent: TradingIntent = Object.freeze({
      direction: signal.direction,
      asset: resolved.asset.symbol,
      timeframe: resolved.timeframe,
      entryPrice: signal.entryPrice,
    });

    let entryPrice = signal.entryPrice;
    let priceSource: PriceSource = "message";
    if (!entryPrice) {
      if (!priceLookup) {
        return failed({
          stage: "calculate",
          error: calculationError("MISSING_ENTRY_PRICE", resolved.asset.symbol, "No price in the message and no price lookup configured"),
        });
      }
      const lookup = await this.lookupPrice(priceLookup, resolved.asset);
      if (!lookup.ok) {
        return failed({
          stage: "calculate",
          error: calculationError("PRICE_UNAVAILABLE", resolved.asset.symbol, lookup.message),
        });
      }
      entryPrice = lookup.price;
      priceSource = "lookup";
    }

    const calculation = calculateLevels(intent.direction, resolved, entryPrice);
    if (!calculation.ok) {
      return failed({ stage: "calculate", error: calculation.failure });
    }
    trace.push("calculated", "done");
    return { status: "done", intent, result: calculation.result, priceSource, trace };
  }

  private async lookupPrice(lookup: PriceLookup, asset: AssetRule): Promise<PriceLookupResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(TIMED_OUT);
      }, this.priceTimeoutMs);
    });
    const pending = Promise.resolve().then(() => lookup(asset, controller.signal));

    try {
      const value = await Promise.race([pending, timeout]);
      if (value === TIMED_OUT) {
        void pending.catch((error: unknown) => {
          this.logger.warn("Price lookup failed after timeout", {
            asset: asset.symbol,
            error: error instanceof Error ? error.message : String(error),
          });
        });
        return { ok: false, message: `Price lookup for ${asset.symbol} timed out after ${this.priceTimeoutMs}ms` };
      }
      if (value === undefined || value === null) {
        return { ok: false, message: `No current price for ${asset.symbol}` };
      }
      const price = new Decimal(value);
      if (!price.isFinite() || price.lte(0)) {
        return { ok: false, message: `Price lookup for ${asset.symbol} returned ${price.toString()}` };
      }
      return { ok: true, price };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn("Price lookup failed", { asset: asset.symbol, error: message });
      return { ok: false, message: `Price lookup for ${asset.symbol} failed: ${message}` };
    } finally {
      clearTimeout(timer);
    }
  }

  private record(outcome: PipelineOutcome, rawText: string, latencyMs: number): void {
    this.metrics.observe("signal_pipeline_latency_ms", latencyMs);
    if (outcome.status === "done") {
      this.metrics.increment("signal_pipeline_outcome", { status: "done", stage: "complete" });
      this.logger.info("Signal processed", {
        asset: outcome.result.asset,
        timeframe: outcome.result.timeframe,
        direction: outcome.result.direction,
        priceSource: outcome.priceSource,
      });
      return;
    }
    const { failure } = outcome;
    this.metrics.increment("signal_pipeline_outcome", {
      status: "failed",
      stage: failure.stage,
      reason: failure.error.reason,
    });
    if (isIgnorableFailure(failure)) {
      return;
    }
    this.logger.warn("Signal rejected", {
      stage: failure.stage,
      reason: failure.error.reason,
      input: failure.error.input,
      text: rawText.slice(0, 200),
    });
  }
}

function calculationError(
  reason: CalculationError["reason"],
  input: string,
  message: string,
): CalculationError {
  return { kind: "calculation_error", reason, input, message };
}
