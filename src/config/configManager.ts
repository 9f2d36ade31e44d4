import path from "node:path";

import { parseLogLevel, type LogLevel } from "../telemetry/logger.js";
import { EnvSecretStore, type SecretStore } from "../storage/secretStore.js";

export interface RetryPolicyConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
}

export interface HttpClientConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly rateLimitPerSecond: number;
  readonly retry: RetryPolicyConfig;
}

export type RuleSourceKind = "file" | "sheet";
export type PriceProviderKind = "static" | "hyperliquid";

export interface RulesConfig {
  readonly source: RuleSourceKind;
  readonly filePath: string;
  readonly sheetCsvUrl?: string;
  readonly sheetHttp: HttpClientConfig;
}

export interface PricingConfig {
  readonly provider: PriceProviderKind;
  readonly lookupTimeoutMs: number;
  readonly cacheTtlMs: number;
  readonly isTestnet: boolean;
}

export interface TelegramConfig {
  readonly botToken?: string;
  readonly channelId?: string;
  readonly pollTimeoutSeconds: number;
  readonly http: HttpClientConfig;
}

export interface DeliveryConfig {
  readonly webhookUrl?: string;
  readonly timeoutMs: number;
}

export interface FormattingConfig {
  readonly template: string;
  readonly signature: string;
}

export interface AppConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly webhookSecret?: string;
  readonly rules: RulesConfig;
  readonly pricing: PricingConfig;
  readonly telegram: TelegramConfig;
  readonly delivery: DeliveryConfig;
  readonly formatting: FormattingConfig;
}

export interface ConfigProvider {
  getAppConfig(): AppConfig;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function buildHttpConfig(
  env: NodeJS.ProcessEnv,
  prefix: string,
  defaults: HttpClientConfig,
): HttpClientConfig {
  const baseUrl = env[`${prefix}_BASE_URL`] ?? defaults.baseUrl;
  const timeoutMs = parseNumber(env[`${prefix}_TIMEOUT_MS`], defaults.timeoutMs);
  const rateLimitPerSecond = parseNumber(
    env[`${prefix}_RATE_LIMIT_PER_SECOND`],
    defaults.rateLimitPerSecond,
  );
  const maxAttempts = parseNumber(env[`${prefix}_RETRY_MAX_ATTEMPTS`], defaults.retry.maxAttempts);
  const initialDelayMs = parseNumber(
    env[`${prefix}_RETRY_INITIAL_DELAY_MS`],
    defaults.retry.initialDelayMs,
  );
  const backoffMultiplier = parseNumber(
    env[`${prefix}_RETRY_BACKOFF_MULTIPLIER`],
    defaults.retry.backoffMultiplier,
  );
  const maxDelayMs = parseNumber(
    env[`${prefix}_RETRY_MAX_DELAY_MS`],
    defaults.retry.maxDelayMs,
  );

  return {
    baseUrl,
    timeoutMs,
    rateLimitPerSecond,
    retry: {
      maxAttempts,
      initialDelayMs,
      backoffMultiplier,
      maxDelayMs,
    },
  };
}

// Long polling holds the request open for the poll timeout, so the HTTP timeout sits above it.
const DEFAULT_TELEGRAM_HTTP: HttpClientConfig = {
  baseUrl: "https://api.telegram.org/",
  timeoutMs: 40_000,
  rateLimitPerSecond: 20,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 500,
    backoffMultiplier: 2,
    maxDelayMs: 5_000,
  },
};

const DEFAULT_SHEET_HTTP: HttpClientConfig = {
  baseUrl: "https://docs.google.com/",
  timeoutMs: 10_000,
  rateLimitPerSecond: 2,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 400,
    backoffMultiplier: 2,
    maxDelayMs: 4_000,
  },
};

export const DEFAULT_RULES_FILE = "config/rules.json";

export class ConfigManager implements ConfigProvider {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly secretStore: SecretStore = new EnvSecretStore("SIGNAL_", env),
  ) {}

  getAppConfig(): AppConfig {
    return {
      port: parseNumber(this.env.PORT, 3000),
      logLevel: parseLogLevel(this.env.LOG_LEVEL),
      webhookSecret: this.secretStore.getSecret("WEBHOOK_SECRET"),
      rules: this.getRulesConfig(),
      pricing: this.getPricingConfig(),
      telegram: this.getTelegramConfig(),
      delivery: {
        webhookUrl: optionalString(this.env.OUTGOING_WEBHOOK_URL),
        timeoutMs: parseNumber(this.env.OUTGOING_WEBHOOK_TIMEOUT_MS, 5_000),
      },
      formatting: {
        template: optionalString(this.env.SIGNAL_TEMPLATE) ?? "standard",
        signature: this.env.SIGNAL_SIGNATURE ?? "",
      },
    };
  }

  getRulesConfig(): RulesConfig {
    const sheetCsvUrl = optionalString(this.env.RULES_SHEET_CSV_URL);
    const requested = optionalString(this.env.RULES_SOURCE)?.toLowerCase();
    const source: RuleSourceKind = requested === "sheet" || (requested === undefined && sheetCsvUrl)
      ? "sheet"
      : "file";
    return {
      source,
      filePath: path.resolve(optionalString(this.env.RULES_FILE) ?? DEFAULT_RULES_FILE),
      sheetCsvUrl,
      sheetHttp: buildHttpConfig(this.env, "RULES_SHEET", DEFAULT_SHEET_HTTP),
    };
  }

  getPricingConfig(): PricingConfig {
    const provider = optionalString(this.env.PRICE_PROVIDER)?.toLowerCase() === "hyperliquid"
      ? "hyperliquid"
      : "static";
    return {
      provider,
      lookupTimeoutMs: parseNumber(this.env.PRICE_LOOKUP_TIMEOUT_MS, 3_000),
      cacheTtlMs: parseNumber(this.env.PRICE_CACHE_TTL_MS, 5_000),
      isTestnet: parseBoolean(this.env.HYPERLIQUID_TESTNET, false),
    };
  }

  getTelegramConfig(): TelegramConfig {
    return {
      botToken: this.secretStore.getSecret("TELEGRAM_BOT_TOKEN"),
      channelId: optionalString(this.env.TELEGRAM_CHANNEL_ID),
      pollTimeoutSeconds: parseNumber(this.env.TELEGRAM_POLL_TIMEOUT_SECONDS, 30),
      http: buildHttpConfig(this.env, "TELEGRAM", DEFAULT_TELEGRAM_HTTP),
    };
  }
}

export const defaultConfigManager = new ConfigManager();

export function getAppConfig(): AppConfig {
  return defaultConfigManager.getAppConfig();
}
