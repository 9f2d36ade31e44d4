import type { AssetRule } from "../../rules/ruleTypes.js";
import type { SignalDispatcher } from "../../runtime/signalDispatcher.js";
import { ConsoleLogger, type Logger } from "../../telemetry/logger.js";
import { describeFailure } from "../../trading/signalTypes.js";
import { formatTimestamp } from "../formatting/signalFormatter.js";
import type { ChatId, TelegramApi, TelegramUpdate } from "../integrations/telegram/telegramClient.js";

export interface AssetCatalog {
  listAssets(): readonly AssetRule[];
}

export interface TelegramSignalBotOptions {
  readonly api: TelegramApi;
  readonly dispatcher: SignalDispatcher;
  readonly catalog: AssetCatalog;
  readonly pollTimeoutSeconds?: number;
  /** Pause after a failed poll before trying again. */
  readonly retryDelayMs?: number;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

export interface BotStats {
  readonly signalsSent: number;
  readonly rejections: number;
  readonly deliveryErrors: number;
  readonly lastSignalAt?: string;
}

const START_TEXT = [
  "👋 *Signal levels bot*",
  "",
  "Send a signal such as `LONG BTCUSD M5` or `buy gold 1m @2350.50` and I reply with take-profit and stop-loss levels.",
  "",
  "/help explains the format",
  "/assets lists configured assets",
  "/stats shows counters",
].join("\n");

const HELP_TEXT = [
  "*Signal format*",
  "`<direction> <asset> <timeframe> [@price]`",
  "",
  "Direction: LONG, BUY, L, SHORT, SELL, S (or 🟢 / 🔴)",
  "Asset: symbol or alias, e.g. BTCUSD, BTC, GOLD",
  "Timeframe: M5, 5m, 5, H1, 1h, D1",
  "Price: optional, e.g. @65000 or @2350.50; without it the current price is used",
].join("\n");

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export class TelegramSignalBot {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly pollTimeoutSeconds: number;
  private readonly retryDelayMs: number;
  private offset?: number;
  private running = false;
  private loop?: Promise<void>;
  private stats: BotStats = { signalsSent: 0, rejections: 0, deliveryErrors: 0 };

  constructor(private readonly options: TelegramSignalBotOptions) {
    this.logger = options.logger ?? new ConsoleLogger("telegram");
    this.clock = options.clock ?? (() => new Date());
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 30;
    this.retryDelayMs = options.retryDelayMs ?? 5_000;
  }

  getStats(): BotStats {
    return this.stats;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.runLoop();
    this.logger.info("Polling for updates", { timeoutSeconds: this.pollTimeoutSeconds });
  }

  /** Resolves once the in-flight poll has finished. */
  async stop(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = undefined;
  }

  /** Fetches and handles one batch of updates; returns how many were handled. */
  async pollOnce(): Promise<number> {
    const updates = await this.options.api.getUpdates(this.offset, this.pollTimeoutSeconds);
    for (const update of updates) {
      this.offset = update.update_id + 1;
      try {
        await this.handleUpdate(update);
      } catch (error) {
        this.logger.error("Failed to handle update", {
          updateId: update.update_id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return updates.length;
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    const text = message?.text?.trim();
    if (!message || !text) {
      return;
    }
    const chatId = message.chat.id;

    if (text.startsWith("/")) {
      await this.handleCommand(chatId, text);
      return;
    }

    const result = await this.options.dispatcher.dispatch(text, { source: "telegram", originChatId: chatId });
    switch (result.status) {
      case "ignored":
        return;
      case "rejected":
        this.stats = { ...this.stats, rejections: this.stats.rejections + 1 };
        await this.options.api.sendMessage(chatId, `❌ ${describeFailure(result.outcome.failure)}`);
        return;
      case "done": {
        const failedDeliveries = [result.delivery.channel, result.delivery.webhook]
          .filter((status) => status === "failed").length;
        this.stats = {
          signalsSent: this.stats.signalsSent + 1,
          rejections: this.stats.rejections,
          deliveryErrors: this.stats.deliveryErrors + failedDeliveries,
          lastSignalAt: formatTimestamp(this.clock()),
        };
        await this.options.api.sendMessage(chatId, result.formatted.telegramMessage, { parseMode: "Markdown" });
      }
    }
  }

  private async handleCommand(chatId: ChatId, text: string): Promise<void> {
    const command = (text.split(/\s+/)[0] ?? "").split("@")[0].toLowerCase();
    switch (command) {
      case "/start":
        await this.options.api.sendMessage(chatId, START_TEXT, { parseMode: "Markdown" });
        return;
      case "/help":
        await this.options.api.sendMessage(chatId, HELP_TEXT, { parseMode: "Markdown" });
        return;
      case "/assets":
        await this.options.api.sendMessage(chatId, this.describeAssets());
        return;
      case "/stats":
        await this.options.api.sendMessage(chatId, this.describeStats());
        return;
      default:
        await this.options.api.sendMessage(chatId, `Unknown command ${command}. Try /help.`);
    }
  }

  private describeAssets(): string {
    const assets = this.options.catalog.listAssets();
    if (assets.length === 0) {
      return "No assets configured.";
    }
    const lines = assets.map((asset) => {
      const aliases = asset.aliases.length > 0 ? ` (${asset.aliases.join(", ")})` : "";
      return `• ${asset.symbol}${aliases}: ${[...asset.timeframes.keys()].join(", ")}`;
    });
    return ["Configured assets:", ...lines].join("\n");
  }

  private describeStats(): string {
    const { signalsSent, rejections, deliveryErrors, lastSignalAt } = this.stats;
    return [
      `Signals sent: ${signalsSent}`,
      `Rejected: ${rejections}`,
      `Delivery errors: ${deliveryErrors}`,
      `Last signal: ${lastSignalAt ?? "never"}`,
    ].join("\n");
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        this.logger.warn("Polling failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        if (this.running) {
          await sleep(this.retryDelayMs);
        }
      }
    }
  }
}
