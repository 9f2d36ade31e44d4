import { describe, expect, it, vi } from "vitest";

import { ConsoleLogger } from "../src/telemetry/logger.js";
import { InMemoryMetrics } from "../src/telemetry/metrics.js";

describe("ConsoleLogger", () => {
  it("prefixes the scope and drops messages above the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("rules", "warn");

    logger.info("loaded");
    logger.warn("slow source", { ms: 1200 });
    logger.error("reload rejected");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[rules] slow source", { ms: 1200 });
    expect(error).toHaveBeenCalledWith("[rules] reload rejected");
  });
});

describe("InMemoryMetrics", () => {
  it("keys counters by sorted tags and summarizes observations", () => {
    const metrics = new InMemoryMetrics();
    metrics.increment("signal_delivery", { target: "webhook", status: "sent" });
    metrics.increment("signal_delivery", { status: "sent", target: "webhook" });
    metrics.observe("latency_ms", 4);
    metrics.observe("latency_ms", 10);
    metrics.observe("latency_ms", Number.NaN);

    expect(metrics.snapshot()).toEqual({
      counters: { "signal_delivery{status=sent,target=webhook}": 2 },
      observations: { latency_ms: { count: 2, sum: 14, min: 4, max: 10 } },
    });

    metrics.reset();
    expect(metrics.getCounter("signal_delivery", { status: "sent", target: "webhook" })).toBe(0);
  });
});
