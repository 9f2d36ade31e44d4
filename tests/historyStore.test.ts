import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  appendSignalHistory,
  getSignalHistory,
  summarizeSignalHistory,
} from "../src/storage/historyStore.js";

describe("signal history", () => {
  let tempDir: string;
  let previousDataDir: string | undefined;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "signal-history-"));
    previousDataDir = process.env.SIGNAL_DATA_DIR;
    process.env.SIGNAL_DATA_DIR = tempDir;
  });

  afterEach(async () => {
    if (previousDataDir === undefined) {
      delete process.env.SIGNAL_DATA_DIR;
    } else {
      process.env.SIGNAL_DATA_DIR = previousDataDir;
    }
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("returns an empty history before anything is written", async () => {
    await expect(getSignalHistory()).resolves.toEqual([]);
    await expect(summarizeSignalHistory()).resolves.toEqual({
      total: 0,
      completed: 0,
      rejected: 0,
      lastSignalAt: undefined,
    });
  });

  it("reads records newest first and honours the limit", async () => {
    await appendSignalHistory({
      source: "telegram",
      text: "LONG BTC M5 @65000",
      status: "done",
      direction: "LONG",
      asset: "BTCUSD",
      timeframe: "M5",
      entryPrice: "65000",
      timestamp: Date.UTC(2024, 2, 5, 9, 0, 0),
    });
    await appendSignalHistory({
      source: "webhook",
      text: "sell nasdaq 15m",
      status: "failed",
      stage: "resolve",
      reason: "UNKNOWN_ASSET",
      timestamp: Date.UTC(2024, 2, 5, 9, 5, 0),
    });
    const latest = await appendSignalHistory({
      source: "cli",
      text: "buy gold 1m @2350.50",
      status: "done",
      asset: "XAUUSD",
      timestamp: Date.UTC(2024, 2, 5, 9, 10, 0),
    });

    const items = await getSignalHistory(2);

    expect(items).toHaveLength(2);
    expect(items[0]).toEqual(latest);
    expect(items[1]?.reason).toBe("UNKNOWN_ASSET");
    await expect(summarizeSignalHistory()).resolves.toEqual({
      total: 3,
      completed: 2,
      rejected: 1,
      lastSignalAt: "2024-03-05T09:10:00.000Z",
    });
  });

  it("skips lines that are not valid records", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await appendSignalHistory({ source: "cli", text: "LONG BTC M5", status: "done" });
    await fs.appendFile(path.join(tempDir, "signal-history.ndjson"), "{broken\n{\"id\":1}\n", "utf8");

    const items = await getSignalHistory();

    expect(items.map((item) => item.text)).toEqual(["LONG BTC M5"]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
