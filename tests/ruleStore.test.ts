import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileRuleSource, StaticRuleSource, type RuleSource } from "../src/rules/ruleSources.js";
import { RuleStore } from "../src/rules/ruleStore.js";
import { RuleTable } from "../src/rules/ruleTable.js";
import { RuleConfigError } from "../src/rules/ruleTypes.js";
import { SilentLogger } from "../src/telemetry/logger.js";
import { buildTestTable, loadTestRuleConfig, requireAsset } from "./fixtures/ruleFixtures.js";

const tf = { tp1: 1, tp2: 2, tp3: 3, sl: 1 };

function configIssues(raw: unknown): readonly string[] {
  try {
    RuleTable.fromConfig(raw);
  } catch (error) {
    if (error instanceof RuleConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected the configuration to be rejected");
}

describe("RuleTable", () => {
  const table = buildTestTable();

  it("resolves aliases to the same asset record as the canonical symbol", () => {
    const canonical = table.resolve("BTCUSD", "M5");
    const alias = table.resolve("btc", "5m");
    expect(canonical.found && alias.found).toBe(true);
    if (canonical.found && alias.found) {
      expect(alias.resolved.asset).toBe(canonical.resolved.asset);
      expect(alias.resolved.rule).toBe(canonical.resolved.rule);
      expect(alias.resolved.timeframe).toBe("M5");
    }
  });

  it("ignores case and separators in asset tokens", () => {
    expect(table.resolveAsset("btc/usd")?.symbol).toBe("BTCUSD");
    expect(table.resolveAsset("Gold")?.symbol).toBe("XAUUSD");
    expect(table.resolveAsset("///")).toBeUndefined();
  });

  it("reports an unknown asset", () => {
    const resolution = table.resolve("NASDAQ", "15m");
    expect(resolution).toEqual({
      found: false,
      failure: {
        kind: "rule_not_found",
        reason: "UNKNOWN_ASSET",
        input: "NASDAQ",
        message: "Asset \"NASDAQ\" is not configured",
      },
    });
  });

  it("lists available timeframes when the asset has no rule for the requested one", () => {
    const resolution = table.resolve("BTC", "H4");
    expect(resolution).toEqual({
      found: false,
      failure: {
        kind: "rule_not_found",
        reason: "UNKNOWN_TIMEFRAME",
        input: "H4",
        message: "No H4 rule for BTCUSD (available: M5, H1)",
        available: ["M5", "H1"],
      },
    });
  });

  it("reports a timeframe token that is not a timeframe", () => {
    const resolution = table.resolve("BTC", "WEEKLY");
    expect(resolution.found).toBe(false);
    if (!resolution.found) {
      expect(resolution.failure.reason).toBe("UNKNOWN_TIMEFRAME");
      expect(resolution.failure.message).toBe("Timeframe \"WEEKLY\" is not recognized");
    }
  });

  it("applies configured timeframe aliases before the grammar", () => {
    const resolution = table.resolve("GOLD", "scalp");
    expect(resolution.found && resolution.resolved.timeframe).toBe("M1");
  });

  it("canonicalizes timeframe keys and sorts them by duration", () => {
    expect([...requireAsset(table, "BTCUSD").timeframes.keys()]).toEqual(["M5", "H1"]);
    expect([...requireAsset(table, "EURUSD").timeframes.keys()]).toEqual(["M15"]);
    expect([...requireAsset(table, "USDJPY").timeframes.keys()]).toEqual(["H1"]);
  });

  it("defaults pip size by quote currency and reads units", () => {
    expect(requireAsset(table, "EURUSD").pipSize.toString()).toBe("0.0001");
    expect(requireAsset(table, "USDJPY").pipSize.toString()).toBe("0.01");
    expect(requireAsset(table, "XAUUSD").timeframes.get("M1")?.unit).toBe("points");
    expect(requireAsset(table, "BTCUSD").timeframes.get("M5")?.unit).toBe("percent");
  });

  it("rejects non-positive magnitudes", () => {
    const issues = configIssues({ assets: { BTCUSD: { timeframes: { M5: { ...tf, sl: 0 } } } } });
    expect(issues).toEqual(["assets.BTCUSD.timeframes.M5.sl: must be greater than zero"]);
  });

  it("rejects unknown units", () => {
    const issues = configIssues({ assets: { BTCUSD: { timeframes: { M5: { ...tf, unit: "bps" } } } } });
    expect(issues).toEqual(["assets.BTCUSD.timeframes.M5.unit: unit must be one of %, pips, points"]);
  });

  it("rejects an alias shared by two assets", () => {
    const issues = configIssues({
      assets: {
        BTCUSD: { aliases: ["BTC"], timeframes: { M5: tf } },
        BTCUSDT: { aliases: ["btc"], timeframes: { M5: tf } },
      },
    });
    expect(issues).toEqual(["BTCUSDT: alias \"btc\" is already used by BTCUSD"]);
  });

  it("rejects an alias that is another asset's symbol", () => {
    const issues = configIssues({
      assets: {
        BTCUSD: { aliases: ["ETHUSD"], timeframes: { M5: tf } },
        ETHUSD: { timeframes: { M5: tf } },
      },
    });
    expect(issues).toEqual(["BTCUSD: alias \"ETHUSD\" is the canonical symbol of ETHUSD"]);
  });

  it("collects timeframe key problems in one error", () => {
    const issues = configIssues({
      timeframeAliases: { SWING: "weekly" },
      assets: {
        BTCUSD: { timeframes: { "5m": tf, M5: tf, weekly: tf } },
        ETHUSD: { timeframes: {} },
      },
    });
    expect(issues).toEqual([
      "BTCUSD: timeframe \"M5\" duplicates M5",
      "BTCUSD: \"weekly\" is not a timeframe",
      "ETHUSD: at least one timeframe rule is required",
      "timeframe alias \"SWING\" points at unknown timeframe \"weekly\"",
    ]);
  });

  it("names the source in the error message", () => {
    expect(() => RuleTable.fromConfig({ assets: "none" }, "file:rules.json")).toThrow(
      /^Invalid rule configuration from file:rules\.json: assets: /,
    );
  });
});

describe("RuleStore", () => {
  const logger = new SilentLogger();

  it("opens from a source and describes the active table", async () => {
    const clock = () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    const store = await RuleStore.open(new StaticRuleSource(loadTestRuleConfig()), { logger, clock });
    expect(store.describe()).toEqual({
      version: 1,
      source: "static",
      loadedAt: "2024-01-02T03:04:05.000Z",
      assetCount: 4,
    });
  });

  it("swaps in a new table on reload", async () => {
    const store = await RuleStore.open(new StaticRuleSource(loadTestRuleConfig()), { logger });
    const next = new StaticRuleSource(
      { assets: { ETHUSD: { aliases: ["ETH"], timeframes: { M5: tf } } } },
      "next",
    );

    const status = await store.reload(next);

    expect(status.version).toBe(2);
    expect(status.source).toBe("next");
    expect(store.resolve("ETH", "M5").found).toBe(true);
    expect(store.resolve("BTC", "M5").found).toBe(false);
  });

  it("keeps the previous table when the new configuration is invalid", async () => {
    const store = await RuleStore.open(new StaticRuleSource(loadTestRuleConfig()), { logger });
    const broken = new StaticRuleSource({ assets: { BTCUSD: { timeframes: { M5: { ...tf, tp1: -1 } } } } });

    await expect(store.reload(broken)).rejects.toBeInstanceOf(RuleConfigError);

    expect(store.describe().version).toBe(1);
    expect(store.resolve("BTC", "M5").found).toBe(true);
  });

  it("serves the old table until a reload completes", async () => {
    const store = await RuleStore.open(new StaticRuleSource(loadTestRuleConfig()), { logger });
    let release: (config: unknown) => void = () => undefined;
    const slow: RuleSource = {
      name: "slow",
      load: () =>
        new Promise((resolve) => {
          release = resolve;
        }),
    };

    const reloading = store.reload(slow);
    expect(store.resolve("GOLD", "M1").found).toBe(true);

    release({ assets: { ETHUSD: { timeframes: { M5: tf } } } });
    await reloading;

    expect(store.resolve("GOLD", "M1").found).toBe(false);
    expect(store.resolve("ETHUSD", "M5").found).toBe(true);
  });

  it("refuses to reload without a source", async () => {
    const store = new RuleStore(buildTestTable(), { logger });
    await expect(store.reload()).rejects.toThrow("No rule source configured for reload");
  });
});

describe("FileRuleSource", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "rules-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("loads the bundled rule file", async () => {
    const rulesPath = fileURLToPath(new URL("../config/rules.json", import.meta.url));
    const store = await RuleStore.open(new FileRuleSource(rulesPath), { logger: new SilentLogger() });

    const gold = store.resolve("gold", "1m");
    expect(gold.found && gold.resolved.asset.symbol).toBe("XAUUSD");
    expect(store.resolve("nasdaq", "15m").found).toBe(false);
  });

  it("reports malformed JSON as a configuration error", async () => {
    const filePath = path.join(tempDir, "rules.json");
    await fs.writeFile(filePath, "{ not json", "utf8");

    await expect(new FileRuleSource(filePath).load()).rejects.toBeInstanceOf(RuleConfigError);
  });
});
