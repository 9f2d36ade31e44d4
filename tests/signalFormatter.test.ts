import { describe, expect, it } from "vitest";

import {
  SignalFormatter,
  availableTemplates,
  formatTimestamp,
  stripMarkdown,
} from "../src/services/formatting/signalFormatter.js";
import { levelsFor } from "./fixtures/ruleFixtures.js";

const clock = () => new Date(Date.UTC(2024, 2, 5, 9, 7, 3));
const btcLong = levelsFor("LONG", "BTCUSD", "M5", "65000");

describe("SignalFormatter", () => {
  it("renders the standard template", () => {
    const formatted = new SignalFormatter({ clock }).format(btcLong);

    expect(formatted.telegramMessage).toBe(
      [
        "🟢 *LONG BTCUSD* | M5",
        "",
        "📍 Entry: `65000.00`",
        "",
        "🎯 TP1: `65650.00` (+1%)",
        "🎯 TP2: `66300.00` (+2%)",
        "🎯 TP3: `67275.00` (+3.5%)",
        "",
        "🛑 SL: `64025.00` (-1.5%)",
        "",
        "📊 R:R = 1:0.67",
        "⏰ 05/03/2024 09:07:03 UTC",
      ].join("\n"),
    );
    expect(formatted.plainText.split("\n")[0]).toBe("🟢 LONG BTCUSD | M5");
    expect(formatted.plainText.split("\n")[2]).toBe("📍 Entry: 65000.00");
  });

  it("builds the webhook payload at the asset precision", () => {
    const formatted = new SignalFormatter({ clock }).format(btcLong);

    expect(formatted.webhookPayload).toEqual({
      action: "long",
      symbol: "BTCUSD",
      timeframe: "M5",
      price: 65000,
      targets: { tp1: 65650, tp2: 66300, tp3: 67275 },
      stoploss: 64025,
      risk_reward: 0.67,
      timestamp: "2024-03-05T09:07:03.000Z",
    });
  });

  it("describes the signal as a JSON document", () => {
    const { json } = new SignalFormatter({ clock, template: "minimal" }).format(btcLong);

    expect(json.template).toBe("minimal");
    expect(json.generatedAt).toBe("2024-03-05T09:07:03.000Z");
    expect(json.signal.tp3Price).toBe("67275.00");
    expect(json.telegram).toBe(json.plainText);
  });

  it("appends the signature in the compact template", () => {
    const formatted = new SignalFormatter({ clock, template: "compact", signature: "Signals Desk" }).format(btcLong);

    expect(formatted.telegramMessage).toBe(
      [
        "🟢 *LONG BTCUSD* M5 @ `65000.00`",
        "TP: `65650.00` / `66300.00` / `67275.00`",
        "SL: `64025.00` | R:R 1:0.67",
        "Signals Desk",
      ].join("\n"),
    );
  });

  it("labels pip and point distances", () => {
    const formatter = new SignalFormatter({ clock });
    const eur = formatter.format(levelsFor("SHORT", "EURUSD", "M15", "1.0850")).telegramMessage.split("\n");
    const gold = formatter.format(levelsFor("LONG", "XAUUSD", "M1", "2350.50")).telegramMessage.split("\n");

    expect(eur[0]).toBe("🔴 *SHORT EURUSD* | M15");
    expect(eur[4]).toBe("🎯 TP1: `1.08350` (+15 pips)");
    expect(eur[8]).toBe("🛑 SL: `1.08700` (-20 pips)");
    expect(gold[4]).toBe("🎯 TP1: `2352.50` (+2 pts)");
  });

  it("fills custom templates and leaves unknown fields alone", () => {
    const formatter = new SignalFormatter({ clock, template: "{asset} {direction} {entry} {unknown}" });

    expect(formatter.templateName).toBe("custom");
    expect(formatter.format(btcLong).telegramMessage).toBe("BTCUSD LONG 65000.00 {unknown}");
  });

  it("rejects an unknown template name", () => {
    expect(() => new SignalFormatter({ template: "fancy" })).toThrow(
      "Unknown signal template \"fancy\" (available: standard, compact, premium, minimal)",
    );
  });
});

describe("formatting helpers", () => {
  it("lists templates", () => {
    expect(availableTemplates()).toEqual(["standard", "compact", "premium", "minimal"]);
  });

  it("formats timestamps in UTC", () => {
    expect(formatTimestamp(new Date(Date.UTC(2025, 11, 31, 23, 59, 0)))).toBe("31/12/2025 23:59:00 UTC");
  });

  it("strips markdown markers", () => {
    expect(stripMarkdown("*bold* `code` _em_")).toBe("bold code em");
  });
});
