import type { Decimal } from "decimal.js";

import type { DistanceUnit } from "../../rules/ruleTypes.js";
import {
  serializeLevelResult,
  type Direction,
  type LevelResult,
  type SerializedLevelResult,
} from "../../trading/signalTypes.js";

export type TemplateName = "standard" | "compact" | "premium" | "minimal";

const TEMPLATES: Record<TemplateName, string> = {
  standard: [
    "{direction_emoji} *{direction} {asset}* | {timeframe}",
    "",
    "📍 Entry: `{entry}`",
    "",
    "🎯 TP1: `{tp1}` (+{tp1_distance}{unit})",
    "🎯 TP2: `{tp2}` (+{tp2_distance}{unit})",
    "🎯 TP3: `{tp3}` (+{tp3_distance}{unit})",
    "",
    "🛑 SL: `{sl}` (-{sl_distance}{unit})",
    "",
    "📊 R:R = 1:{rr}",
    "⏰ {timestamp}",
    "{signature}",
  ].join("\n"),
  compact: [
    "{direction_emoji} *{direction} {asset}* {timeframe} @ `{entry}`",
    "TP: `{tp1}` / `{tp2}` / `{tp3}`",
    "SL: `{sl}` | R:R 1:{rr}",
    "{signature}",
  ].join("\n"),
  premium: [
    "━━━━━━━━━━━━━━━━━━",
    "{direction_emoji} *{direction} SIGNAL*",
    "━━━━━━━━━━━━━━━━━━",
    "",
    "💎 *Asset:* {asset}",
    "⏱ *Timeframe:* {timeframe}",
    "📍 *Entry:* `{entry}`",
    "",
    "*Targets*",
    "├ TP1: `{tp1}` (+{tp1_distance}{unit})",
    "├ TP2: `{tp2}` (+{tp2_distance}{unit})",
    "└ TP3: `{tp3}` (+{tp3_distance}{unit})",
    "",
    "*Stop loss*",
    "└ SL: `{sl}` (-{sl_distance}{unit})",
    "",
    "📊 *Risk/Reward:* 1:{rr}",
    "⏰ {timestamp}",
    "━━━━━━━━━━━━━━━━━━",
    "{signature}",
  ].join("\n"),
  minimal: [
    "{direction} {asset} {timeframe}",
    "Entry: {entry}",
    "TP: {tp1} | {tp2} | {tp3}",
    "SL: {sl}",
  ].join("\n"),
};

const DIRECTION_EMOJI: Record<Direction, string> = {
  LONG: "🟢",
  SHORT: "🔴",
};

const UNIT_SUFFIX: Record<DistanceUnit, string> = {
  percent: "%",
  pips: " pips",
  points: " pts",
};

export interface WebhookPayload {
  readonly action: "long" | "short";
  readonly symbol: string;
  readonly timeframe: string;
  readonly price: number;
  readonly targets: {
    readonly tp1: number;
    readonly tp2: number;
    readonly tp3: number;
  };
  readonly stoploss: number;
  readonly risk_reward: number;
  readonly timestamp: string;
}

export interface SignalDocument {
  readonly signal: SerializedLevelResult;
  readonly telegram: string;
  readonly plainText: string;
  readonly template: string;
  readonly generatedAt: string;
}

export interface FormattedSignal {
  readonly telegramMessage: string;
  readonly plainText: string;
  readonly webhookPayload: WebhookPayload;
  readonly json: SignalDocument;
}

export interface SignalFormatterOptions {
  /** A template name, or a custom template containing `{placeholder}` fields. */
  readonly template?: string;
  readonly signature?: string;
  readonly clock?: () => Date;
}

function isTemplateName(value: string): value is TemplateName {
  return value in TEMPLATES;
}

export function availableTemplates(): TemplateName[] {
  return ["standard", "compact", "premium", "minimal"];
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `DD/MM/YYYY HH:mm:ss UTC` */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${date.getUTCFullYear()}`;
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} ${time} UTC`;
}

export function stripMarkdown(text: string): string {
  return text.replace(/[*`_]/g, "");
}

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export class SignalFormatter {
  readonly templateName: string;
  private readonly template: string;
  private readonly signature: string;
  private readonly clock: () => Date;

  constructor(options: SignalFormatterOptions = {}) {
    const requested = options.template?.trim() || "standard";
    if (isTemplateName(requested)) {
      this.templateName = requested;
      this.template = TEMPLATES[requested];
    } else if (/\{\w+\}/.test(requested)) {
      this.templateName = "custom";
      this.template = requested;
    } else {
      throw new Error(`Unknown signal template "${requested}" (available: ${availableTemplates().join(", ")})`);
    }
    this.signature = options.signature ?? "";
    this.clock = options.clock ?? (() => new Date());
  }

  format(result: LevelResult): FormattedSignal {
    const now = this.clock();
    const price = (value: Decimal): string => value.toFixed(result.decimals);
    const values: Record<string, string> = {
      direction_emoji: DIRECTION_EMOJI[result.direction],
      direction: result.direction,
      asset: result.asset,
      timeframe: result.timeframe,
      entry: price(result.entryPrice),
      tp1: price(result.tp1Price),
      tp2: price(result.tp2Price),
      tp3: price(result.tp3Price),
      sl: price(result.slPrice),
      tp1_distance: result.distances.tp1.toString(),
      tp2_distance: result.distances.tp2.toString(),
      tp3_distance: result.distances.tp3.toString(),
      sl_distance: result.distances.sl.toString(),
      unit: UNIT_SUFFIX[result.unit],
      rr: result.rrRatio.toFixed(2),
      timestamp: formatTimestamp(now),
      signature: this.signature,
    };

    const telegramMessage = fillTemplate(this.template, values).trimEnd();
    const plainText = stripMarkdown(telegramMessage);
    const webhookPayload = this.buildWebhookPayload(result, now);
    return {
      telegramMessage,
      plainText,
      webhookPayload,
      json: {
        signal: serializeLevelResult(result),
        telegram: telegramMessage,
        plainText,
        template: this.templateName,
        generatedAt: now.toISOString(),
      },
    };
  }

  private buildWebhookPayload(result: LevelResult, now: Date): WebhookPayload {
    const price = (value: Decimal): number => value.toDecimalPlaces(result.decimals).toNumber();
    return {
      action: result.direction === "LONG" ? "long" : "short",
      symbol: result.asset,
      timeframe: result.timeframe,
      price: price(result.entryPrice),
      targets: {
        tp1: price(result.tp1Price),
        tp2: price(result.tp2Price),
        tp3: price(result.tp3Price),
      },
      stoploss: price(result.slPrice),
      risk_reward: result.rrRatio.toDecimalPlaces(2).toNumber(),
      timestamp: now.toISOString(),
    };
  }
}
