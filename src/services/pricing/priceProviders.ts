import { Decimal } from "decimal.js";

import type { AssetRule } from "../../rules/ruleTypes.js";
import { toLookupKey } from "../../rules/ruleTable.js";
import { ConsoleLogger, type Logger } from "../../telemetry/logger.js";

export interface PriceProvider {
  readonly name: string;
  getPrice(asset: AssetRule, signal?: AbortSignal): Promise<Decimal | undefined>;
}

export const DEFAULT_REFERENCE_PRICES: Readonly<Record<string, string>> = {
  BTCUSD: "65000",
  ETHUSDT: "2450",
  XAUUSD: "2350",
  EURUSD: "1.0850",
  GBPUSD: "1.2650",
  USDJPY: "151.50",
  US30: "39500",
  NAS100: "17800",
};

/** Fixed reference prices keyed by canonical symbol; used offline and as the last fallback. */
export class StaticPriceProvider implements PriceProvider {
  readonly name = "static";
  private readonly prices = new Map<string, Decimal>();

  constructor(prices: Readonly<Record<string, Decimal.Value>> = DEFAULT_REFERENCE_PRICES) {
    for (const [symbol, price] of Object.entries(prices)) {
      this.prices.set(toLookupKey(symbol), new Decimal(price));
    }
  }

  async getPrice(asset: AssetRule): Promise<Decimal | undefined> {
    return this.prices.get(toLookupKey(asset.symbol));
  }

  setPrice(symbol: string, price: Decimal.Value): void {
    this.prices.set(toLookupKey(symbol), new Decimal(price));
  }
}

export interface FallbackPriceProviderOptions {
  readonly logger?: Logger;
}

/** Asks each provider in turn; the first defined price wins. */
export class FallbackPriceProvider implements PriceProvider {
  readonly name: string;
  private readonly logger: Logger;

  constructor(
    private readonly providers: readonly PriceProvider[],
    options: FallbackPriceProviderOptions = {},
  ) {
    this.name = providers.map((provider) => provider.name).join(">");
    this.logger = options.logger ?? new ConsoleLogger("pricing");
  }

  async getPrice(asset: AssetRule, signal?: AbortSignal): Promise<Decimal | undefined> {
    for (const provider of this.providers) {
      if (signal?.aborted) {
        return undefined;
      }
      try {
        const price = await provider.getPrice(asset, signal);
        if (price !== undefined) {
          return price;
        }
      } catch (error) {
        this.logger.warn("Price provider failed; trying next", {
          provider: provider.name,
          asset: asset.symbol,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return undefined;
  }
}
