import { ConsoleLogger, type Logger } from "../telemetry/logger.js";
import { RuleTable } from "./ruleTable.js";
import type { RuleSource } from "./ruleSources.js";
import type { AssetRule, RuleResolution, SymbolDirectory } from "./ruleTypes.js";

export interface RuleStoreOptions {
  readonly source?: RuleSource;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

export type RuleStoreStatus = {
  readonly version: number;
  readonly source: string;
  readonly loadedAt: string;
  readonly assetCount: number;
};

interface ActiveTable {
  readonly table: RuleTable;
  readonly version: number;
  readonly source: string;
  readonly loadedAt: Date;
}

/**
 * Holds the active rule table behind a single reference. Reload builds and
 * validates a complete replacement before swapping it in, so a lookup sees
 * either the old table or the new one.
 */
export class RuleStore implements SymbolDirectory {
  private active: ActiveTable;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(table: RuleTable, private readonly options: RuleStoreOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger("rules");
    this.clock = options.clock ?? (() => new Date());
    this.active = {
      table,
      version: 1,
      source: options.source?.name ?? "inline",
      loadedAt: this.clock(),
    };
  }

  static async open(source: RuleSource, options: Omit<RuleStoreOptions, "source"> = {}): Promise<RuleStore> {
    const table = RuleTable.fromConfig(await source.load(), source.name);
    return new RuleStore(table, { ...options, source });
  }

  get table(): RuleTable {
    return this.active.table;
  }

  resolve(assetToken: string, timeframeToken: string): RuleResolution {
    return this.active.table.resolve(assetToken, timeframeToken);
  }

  resolveAsset(token: string): AssetRule | undefined {
    return this.active.table.resolveAsset(token);
  }

  normalizeTimeframe(token: string): string | undefined {
    return this.active.table.normalizeTimeframe(token);
  }

  listAssets(): readonly AssetRule[] {
    return this.active.table.assets;
  }

  describe(): RuleStoreStatus {
    const { version, source, loadedAt, table } = this.active;
    return {
      version,
      source,
      loadedAt: loadedAt.toISOString(),
      assetCount: table.assets.length,
    };
  }

  /**
   * Loads and validates a new table from `source` (or the configured source).
   * On failure the current table stays active and the error is rethrown.
   */
  async reload(source: RuleSource | undefined = this.options.source): Promise<RuleStoreStatus> {
    if (!source) {
      throw new Error("No rule source configured for reload");
    }
    let table: RuleTable;
    try {
      table = RuleTable.fromConfig(await source.load(), source.name);
    } catch (error) {
      this.logger.error("Rule reload rejected; keeping previous table", {
        source: source.name,
        version: this.active.version,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
    this.replace(table, source.name);
    return this.describe();
  }

  replace(table: RuleTable, sourceName = "inline"): void {
    this.active = {
      table,
      version: this.active.version + 1,
      source: sourceName,
      loadedAt: this.clock(),
    };
    this.logger.info("Rule table activated", {
      version: this.active.version,
      source: sourceName,
      assets: table.assets.length,
    });
  }
}
