import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SignalFormatter } from "../src/services/formatting/signalFormatter.js";
import type { TelegramApi } from "../src/services/integrations/telegram/telegramClient.js";
import { SilentLogger } from "../src/telemetry/logger.js";
import { InMemoryMetrics } from "../src/telemetry/metrics.js";
import { NotificationService } from "../src/telemetry/notificationService.js";
import { levelsFor } from "./fixtures/ruleFixtures.js";

const formatted = new SignalFormatter({ clock: () => new Date(Date.UTC(2024, 2, 5, 9, 7, 3)) }).format(
  levelsFor("SHORT", "XAUUSD", "M15", "2350"),
);

function createTelegram() {
  return {
    getUpdates: vi.fn<TelegramApi["getUpdates"]>().mockResolvedValue([]),
    sendMessage: vi.fn<TelegramApi["sendMessage"]>().mockResolvedValue(undefined),
  };
}

describe("NotificationService", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const logger = new SilentLogger();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("skips every target when nothing is configured", async () => {
    const service = new NotificationService({ logger });

    expect(service.channelConfigured).toBe(false);
    await expect(service.publishSignal(formatted)).resolves.toEqual({ channel: "skipped", webhook: "skipped" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("posts the webhook payload as JSON", async () => {
    fetchMock.mockResolvedValue(new Response("ok", { status: 200 }));
    const metrics = new InMemoryMetrics();
    const service = new NotificationService({ webhookUrl: "https://hooks.test/signals", logger, metrics });

    const report = await service.publishSignal(formatted);

    expect(report).toEqual({ channel: "skipped", webhook: "sent" });
    const url = fetchMock.mock.calls[0]?.[0];
    const init = fetchMock.mock.calls[0]?.[1];
    expect(url).toBe("https://hooks.test/signals");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      action: "short",
      symbol: "XAUUSD",
      timeframe: "M15",
      price: 2350,
      targets: { tp1: 2344, tp2: 2338, tp3: 2332 },
      stoploss: 2358,
      risk_reward: 0.75,
      timestamp: "2024-03-05T09:07:03.000Z",
    });
    expect(metrics.getCounter("signal_delivery", { target: "webhook", status: "sent" })).toBe(1);
  });

  it("reports a failed webhook without throwing", async () => {
    fetchMock.mockResolvedValue(new Response("boom", { status: 500 }));
    const service = new NotificationService({ webhookUrl: "https://hooks.test/signals", logger });

    await expect(service.publishSignal(formatted)).resolves.toEqual({ channel: "skipped", webhook: "failed" });
  });

  it("posts to the channel with Markdown", async () => {
    const telegram = createTelegram();
    const service = new NotificationService({ telegram, channelId: "@signals", logger });

    const report = await service.publishSignal(formatted, { originChatId: 42 });

    expect(service.channelConfigured).toBe(true);
    expect(report.channel).toBe("sent");
    expect(telegram.sendMessage).toHaveBeenCalledWith("@signals", formatted.telegramMessage, { parseMode: "Markdown" });
  });

  it("does not repost to the channel the signal came from", async () => {
    const telegram = createTelegram();
    const service = new NotificationService({ telegram, channelId: "-100123", logger });

    const report = await service.publishSignal(formatted, { originChatId: -100123 });

    expect(report.channel).toBe("skipped");
    expect(telegram.sendMessage).not.toHaveBeenCalled();
  });

  it("reports a failed channel post", async () => {
    const telegram = createTelegram();
    telegram.sendMessage.mockRejectedValue(new Error("chat not found"));
    const service = new NotificationService({ telegram, channelId: "@signals", logger });

    await expect(service.publishSignal(formatted)).resolves.toEqual({ channel: "failed", webhook: "skipped" });
  });
});
