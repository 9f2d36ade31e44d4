import { getAppConfig, type AppConfig } from "../config/configManager.js";
import { FileRuleSource, SheetRuleSource, type RuleSource } from "../rules/ruleSources.js";
import { RuleStore } from "../rules/ruleStore.js";
import { SignalFormatter } from "../services/formatting/signalFormatter.js";
import { RetryingHttpClient } from "../services/integrations/http/retryingHttpClient.js";
import { TelegramClient, type TelegramApi } from "../services/integrations/telegram/telegramClient.js";
import { HyperliquidPriceProvider } from "../services/pricing/hyperliquidPriceProvider.js";
import {
  FallbackPriceProvider,
  StaticPriceProvider,
  type PriceProvider,
} from "../services/pricing/priceProviders.js";
import { TelegramSignalBot } from "../services/telegramBot/telegramSignalBot.js";
import { ConsoleLogger } from "../telemetry/logger.js";
import { InMemoryMetrics } from "../telemetry/metrics.js";
import { NotificationService } from "../telemetry/notificationService.js";
import { SignalPipeline } from "../trading/signalPipeline.js";
import { SignalDispatcher } from "./signalDispatcher.js";

export interface SignalRuntime {
  readonly config: AppConfig;
  readonly rules: RuleStore;
  readonly ruleSource: RuleSource;
  readonly prices: PriceProvider;
  readonly pipeline: SignalPipeline;
  readonly formatter: SignalFormatter;
  readonly notifier: NotificationService;
  readonly dispatcher: SignalDispatcher;
  readonly metrics: InMemoryMetrics;
  readonly telegramBot?: TelegramSignalBot;
}

export interface RuntimeOverrides {
  readonly ruleSource?: RuleSource;
  readonly prices?: PriceProvider;
  readonly telegram?: TelegramApi;
}

function createRuleSource(config: AppConfig, metrics: InMemoryMetrics): RuleSource {
  const { rules } = config;
  if (rules.source === "sheet") {
    if (!rules.sheetCsvUrl) {
      throw new Error("RULES_SOURCE=sheet requires RULES_SHEET_CSV_URL");
    }
    const http = new RetryingHttpClient({
      name: "rules_sheet",
      http: rules.sheetHttp,
      logger: new ConsoleLogger("rules", config.logLevel),
      metrics,
    });
    return new SheetRuleSource({ csvUrl: rules.sheetCsvUrl, http });
  }
  return new FileRuleSource(rules.filePath);
}

function createPriceProvider(config: AppConfig): PriceProvider {
  const fallback = new StaticPriceProvider();
  if (config.pricing.provider === "static") {
    return fallback;
  }
  const live = new HyperliquidPriceProvider({
    isTestnet: config.pricing.isTestnet,
    cacheTtlMs: config.pricing.cacheTtlMs,
  });
  return new FallbackPriceProvider([live, fallback], {
    logger: new ConsoleLogger("pricing", config.logLevel),
  });
}

function createTelegramApi(config: AppConfig, metrics: InMemoryMetrics): TelegramApi | undefined {
  const { botToken, http } = config.telegram;
  if (!botToken) {
    return undefined;
  }
  const client = new RetryingHttpClient({
    name: "telegram",
    http,
    logger: new ConsoleLogger("telegram", config.logLevel),
    metrics,
  });
  return new TelegramClient(client, botToken);
}

/** Builds every long-lived service from configuration. Loading the rule table is the only I/O. */
export async function createSignalRuntime(
  config: AppConfig = getAppConfig(),
  overrides: RuntimeOverrides = {},
): Promise<SignalRuntime> {
  const metrics = new InMemoryMetrics();
  const logger = (scope: string) => new ConsoleLogger(scope, config.logLevel);

  const ruleSource = overrides.ruleSource ?? createRuleSource(config, metrics);
  const rules = await RuleStore.open(ruleSource, { logger: logger("rules") });
  const prices = overrides.prices ?? createPriceProvider(config);

  const pipeline = new SignalPipeline({
    rules,
    priceLookup: (asset, signal) => prices.getPrice(asset, signal),
    priceTimeoutMs: config.pricing.lookupTimeoutMs,
    logger: logger("pipeline"),
    metrics,
  });
  const formatter = new SignalFormatter({
    template: config.formatting.template,
    signature: config.formatting.signature,
  });

  const telegram = overrides.telegram ?? createTelegramApi(config, metrics);
  const notifier = new NotificationService({
    telegram,
    channelId: config.telegram.channelId,
    webhookUrl: config.delivery.webhookUrl,
    timeoutMs: config.delivery.timeoutMs,
    logger: logger("notify"),
    metrics,
  });
  const dispatcher = new SignalDispatcher({
    pipeline,
    formatter,
    notifier,
    logger: logger("dispatch"),
  });

  const telegramBot = telegram
    ? new TelegramSignalBot({
        api: telegram,
        dispatcher,
        catalog: rules,
        pollTimeoutSeconds: config.telegram.pollTimeoutSeconds,
        logger: logger("telegram"),
      })
    : undefined;

  return {
    config,
    rules,
    ruleSource,
    prices,
    pipeline,
    formatter,
    notifier,
    dispatcher,
    metrics,
    telegramBot,
  };
}
