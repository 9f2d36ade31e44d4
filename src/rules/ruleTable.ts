import { Decimal } from "decimal.js";

import { RuleConfigSchema, type AssetConfig } from "./ruleSchema.js";
import { compareTimeframes, normalizeTimeframe } from "./timeframes.js";
import {
  RuleConfigError,
  type AssetRule,
  type RuleResolution,
  type SymbolDirectory,
  type TFRule,
} from "./ruleTypes.js";

const DEFAULT_PIP_SIZE = new Decimal("0.0001");
const JPY_PIP_SIZE = new Decimal("0.01");
const DEFAULT_DECIMALS = 2;

/** Case-insensitive lookup key with separators dropped, so `BTC/USD` matches `btcusd`. */
export function toLookupKey(token: string): string {
  return token.trim().toUpperCase().replace(/[^A-Z0-9]/g, "");
}

function defaultPipSize(symbol: string): Decimal {
  return toLookupKey(symbol).endsWith("JPY") ? JPY_PIP_SIZE : DEFAULT_PIP_SIZE;
}

function buildTimeframes(symbol: string, config: AssetConfig, issues: string[]): Map<string, TFRule> {
  const timeframes = new Map<string, TFRule>();
  const entries = Object.entries(config.timeframes);
  if (entries.length === 0) {
    issues.push(`${symbol}: at least one timeframe rule is required`);
  }
  for (const [key, rule] of entries) {
    const timeframe = normalizeTimeframe(key);
    if (!timeframe) {
      issues.push(`${symbol}: "${key}" is not a timeframe`);
      continue;
    }
    if (timeframes.has(timeframe)) {
      issues.push(`${symbol}: timeframe "${key}" duplicates ${timeframe}`);
      continue;
    }
    timeframes.set(timeframe, Object.freeze({ ...rule }));
  }
  return new Map([...timeframes.entries()].sort(([left], [right]) => compareTimeframes(left, right)));
}

/**
 * Immutable, validated rule table. Built once per load; the store swaps whole
 * tables and never mutates one.
 */
export class RuleTable implements SymbolDirectory {
  readonly assets: readonly AssetRule[];

  private constructor(
    assets: readonly AssetRule[],
    private readonly assetsByKey: ReadonlyMap<string, AssetRule>,
    private readonly timeframeAliases: ReadonlyMap<string, string>,
  ) {
    this.assets = Object.freeze([...assets]);
  }

  /**
   * Validates raw configuration and builds a table. Every problem found is
   * collected into a single {@link RuleConfigError}.
   */
  static fromConfig(raw: unknown, sourceName?: string): RuleTable {
    const parsed = RuleConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => {
        const location = issue.path.join(".");
        return location ? `${location}: ${issue.message}` : issue.message;
      });
      throw new RuleConfigError(issues, sourceName);
    }

    const issues: string[] = [];
    const canonicalKeys = new Map<string, string>();
    for (const symbol of Object.keys(parsed.data.assets)) {
      const key = toLookupKey(symbol);
      if (!key) {
        issues.push(`"${symbol}" is not a valid asset symbol`);
        continue;
      }
      const existing = canonicalKeys.get(key);
      if (existing !== undefined) {
        issues.push(`asset "${symbol}" duplicates "${existing}"`);
        continue;
      }
      canonicalKeys.set(key, symbol);
    }

    const assets: AssetRule[] = [];
    const assetsByKey = new Map<string, AssetRule>();
    const aliasOwners = new Map<string, string>();
    for (const [key, rawSymbol] of canonicalKeys) {
      const config = parsed.data.assets[rawSymbol];
      const symbol = rawSymbol.trim().toUpperCase();
      const aliases: string[] = [];
      for (const alias of config.aliases) {
        const aliasKey = toLookupKey(alias);
        if (!aliasKey || aliasKey === key) {
          continue;
        }
        const canonicalOwner = canonicalKeys.get(aliasKey);
        if (canonicalOwner !== undefined) {
          issues.push(`${symbol}: alias "${alias}" is the canonical symbol of ${canonicalOwner.toUpperCase()}`);
          continue;
        }
        const aliasOwner = aliasOwners.get(aliasKey);
        if (aliasOwner === symbol) {
          continue;
        }
        if (aliasOwner !== undefined) {
          issues.push(`${symbol}: alias "${alias}" is already used by ${aliasOwner}`);
          continue;
        }
        aliasOwners.set(aliasKey, symbol);
        aliases.push(alias.toUpperCase());
      }

      const asset: AssetRule = Object.freeze({
        symbol,
        aliases: Object.freeze(aliases),
        timeframes: buildTimeframes(symbol, config, issues),
        pipSize: config.pipSize ?? defaultPipSize(symbol),
        decimals: config.decimals ?? DEFAULT_DECIMALS,
        priceSymbol: config.priceSymbol?.toUpperCase(),
      });
      assets.push(asset);
      assetsByKey.set(key, asset);
      for (const alias of aliases) {
        assetsByKey.set(toLookupKey(alias), asset);
      }
    }

    const timeframeAliases = new Map<string, string>();
    for (const [alias, target] of Object.entries(parsed.data.timeframeAliases)) {
      const timeframe = normalizeTimeframe(target);
      if (!timeframe) {
        issues.push(`timeframe alias "${alias}" points at unknown timeframe "${target}"`);
        continue;
      }
      timeframeAliases.set(alias.trim().toUpperCase(), timeframe);
    }

    if (issues.length > 0) {
      throw new RuleConfigError(issues, sourceName);
    }
    return new RuleTable(assets, assetsByKey, timeframeAliases);
  }

  resolveAsset(token: string): AssetRule | undefined {
    const key = toLookupKey(token);
    return key ? this.assetsByKey.get(key) : undefined;
  }

  normalizeTimeframe(token: string): string | undefined {
    const alias = this.timeframeAliases.get(token.trim().toUpperCase());
    return alias ?? normalizeTimeframe(token);
  }

  resolve(assetToken: string, timeframeToken: string): RuleResolution {
    const asset = this.resolveAsset(assetToken);
    if (!asset) {
      return {
        found: false,
        failure: {
          kind: "rule_not_found",
          reason: "UNKNOWN_ASSET",
          input: assetToken,
          message: `Asset "${assetToken}" is not configured`,
        },
      };
    }

    const available = [...asset.timeframes.keys()];
    const timeframe = this.normalizeTimeframe(timeframeToken);
    if (!timeframe) {
      return {
        found: false,
        failure: {
          kind: "rule_not_found",
          reason: "UNKNOWN_TIMEFRAME",
          input: timeframeToken,
          message: `Timeframe "${timeframeToken}" is not recognized`,
          available,
        },
      };
    }

    const rule = asset.timeframes.get(timeframe);
    if (!rule) {
      return {
        found: false,
        failure: {
          kind: "rule_not_found",
          reason: "UNKNOWN_TIMEFRAME",
          input: timeframeToken,
          message: `No ${timeframe} rule for ${asset.symbol} (available: ${available.join(", ")})`,
          available,
        },
      };
    }

    return { found: true, resolved: { asset, timeframe, rule } };
  }
}
