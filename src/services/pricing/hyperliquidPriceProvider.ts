import { HttpTransport, InfoClient } from "@nktkas/hyperliquid";
import { Decimal } from "decimal.js";

import type { AssetRule } from "../../rules/ruleTypes.js";
import type { PriceProvider } from "./priceProviders.js";

const SYMBOL_SUFFIXES = ["PERPETUAL", "PERP", "USDT", "USD", "SPOT"] as const;
const SYMBOL_ALIASES: Record<string, string> = {
  XBT: "BTC",
};

/** Subset of the info endpoint the provider needs. */
export interface MidPriceSource {
  allMids(): Promise<Record<string, string>>;
}

export function toExchangeSymbol(raw: string): string {
  let symbol = raw.trim().toUpperCase().replace(/[^A-Z0-9]/g, "");
  for (const suffix of SYMBOL_SUFFIXES) {
    if (symbol.endsWith(suffix) && symbol.length > suffix.length) {
      symbol = symbol.slice(0, -suffix.length);
      break;
    }
  }
  return SYMBOL_ALIASES[symbol] ?? symbol;
}

export interface HyperliquidPriceProviderOptions {
  readonly info?: MidPriceSource;
  readonly isTestnet?: boolean;
  readonly cacheTtlMs?: number;
  readonly now?: () => number;
}

interface MidsSnapshot {
  readonly fetchedAt: number;
  readonly mids: Record<string, string>;
}

/**
 * Mid prices from the Hyperliquid info API. One `allMids` call serves every
 * asset until the cache expires.
 */
export class HyperliquidPriceProvider implements PriceProvider {
  readonly name = "hyperliquid";
  private readonly info: MidPriceSource;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;
  private snapshot?: MidsSnapshot;
  private inflight?: Promise<MidsSnapshot>;

  constructor(options: HyperliquidPriceProviderOptions = {}) {
    this.info = options.info ?? new InfoClient({ transport: new HttpTransport({ isTestnet: options.isTestnet ?? false }) });
    this.cacheTtlMs = options.cacheTtlMs ?? 5_000;
    this.now = options.now ?? Date.now;
  }

  /** An aborted lookup never starts a request and ignores one it was waiting on. */
  async getPrice(asset: AssetRule, signal?: AbortSignal): Promise<Decimal | undefined> {
    if (signal?.aborted) {
      return undefined;
    }
    const { mids } = await this.loadMids();
    if (signal?.aborted) {
      return undefined;
    }
    const symbol = asset.priceSymbol ?? toExchangeSymbol(asset.symbol);
    const raw = mids[symbol];
    if (raw === undefined) {
      return undefined;
    }
    const price = new Decimal(raw);
    return price.isFinite() && price.gt(0) ? price : undefined;
  }

  private async loadMids(): Promise<MidsSnapshot> {
    const cached = this.snapshot;
    if (cached && this.now() - cached.fetchedAt < this.cacheTtlMs) {
      return cached;
    }
    if (!this.inflight) {
      this.inflight = this.info
        .allMids()
        .then((mids) => {
          const snapshot = { fetchedAt: this.now(), mids };
          this.snapshot = snapshot;
          return snapshot;
        })
        .finally(() => {
          this.inflight = undefined;
        });
    }
    return this.inflight;
  }
}
