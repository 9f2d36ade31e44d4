import type { FormattedSignal } from "../services/formatting/signalFormatter.js";
import type { ChatId, TelegramApi } from "../services/integrations/telegram/telegramClient.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { NoopMetrics, type MetricsRecorder } from "./metrics.js";

export type DeliveryStatus = "sent" | "skipped" | "failed";

export interface DeliveryReport {
  readonly channel: DeliveryStatus;
  readonly webhook: DeliveryStatus;
}

export interface NotificationServiceOptions {
  readonly telegram?: TelegramApi;
  readonly channelId?: ChatId;
  readonly webhookUrl?: string;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
  readonly metrics?: MetricsRecorder;
}

export interface PublishOptions {
  /** Chat that already received the signal as a reply; the channel post is skipped for it. */
  readonly originChatId?: ChatId;
}

const DEFAULT_TIMEOUT_MS = 5_000;

/**
 * Fans a formatted signal out to the Telegram channel and the outgoing
 * webhook. Delivery problems are logged and reported, never thrown.
 */
export class NotificationService {
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsRecorder;

  constructor(private readonly options: NotificationServiceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? new ConsoleLogger("notify");
    this.metrics = options.metrics ?? new NoopMetrics();
  }

  get channelConfigured(): boolean {
    return this.options.telegram !== undefined && this.options.channelId !== undefined;
  }

  async publishSignal(formatted: FormattedSignal, publishOptions: PublishOptions = {}): Promise<DeliveryReport> {
    const [channel, webhook] = await Promise.all([
      this.postToChannel(formatted, publishOptions.originChatId),
      this.postToWebhook(formatted),
    ]);
    return { channel, webhook };
  }

  private async postToChannel(formatted: FormattedSignal, originChatId: ChatId | undefined): Promise<DeliveryStatus> {
    const { telegram, channelId } = this.options;
    if (!telegram || channelId === undefined) {
      return "skipped";
    }
    if (originChatId !== undefined && String(originChatId) === String(channelId)) {
      return "skipped";
    }
    try {
      await telegram.sendMessage(channelId, formatted.telegramMessage, { parseMode: "Markdown" });
      this.metrics.increment("signal_delivery", { target: "channel", status: "sent" });
      return "sent";
    } catch (error) {
      this.metrics.increment("signal_delivery", { target: "channel", status: "failed" });
      this.logger.warn("Failed to post signal to channel", {
        channelId,
        error: error instanceof Error ? error.message : String(error),
      });
      return "failed";
    }
  }

  private async postToWebhook(formatted: FormattedSignal): Promise<DeliveryStatus> {
    if (!this.options.webhookUrl) {
      return "skipped";
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref?.();

    try {
      const response = await fetch(this.options.webhookUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(formatted.webhookPayload),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Webhook responded with status ${response.status}`);
      }
      this.metrics.increment("signal_delivery", { target: "webhook", status: "sent" });
      return "sent";
    } catch (error) {
      this.metrics.increment("signal_delivery", { target: "webhook", status: "failed" });
      this.logger.warn("Failed to deliver webhook notification", {
        error: error instanceof Error ? error.message : String(error),
      });
      return "failed";
    } finally {
      clearTimeout(timeout);
    }
  }
}
