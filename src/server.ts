import crypto from "node:crypto";

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";

import { RuleConfigError } from "./rules/ruleTypes.js";
import { createSignalRuntime, type SignalRuntime } from "./runtime/serviceRegistry.js";
import type { DispatchResult } from "./runtime/signalDispatcher.js";
import { getSignalHistory, summarizeSignalHistory } from "./storage/historyStore.js";
import { ConsoleLogger } from "./telemetry/logger.js";

export const SAMPLE_SIGNAL = "LONG BTCUSD M5 @65000";

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(body: JsonRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = body[key];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

function secretsMatch(expected: string, provided: string | undefined): boolean {
  if (provided === undefined) {
    return false;
  }
  const expectedBuffer = Buffer.from(expected);
  const providedBuffer = Buffer.from(provided);
  return expectedBuffer.length === providedBuffer.length && crypto.timingSafeEqual(expectedBuffer, providedBuffer);
}

function requireSecret(secret: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!secret) {
      next();
      return;
    }
    const body: unknown = req.body;
    const provided = req.get("x-webhook-secret") ?? (isRecord(body) ? pickString(body, ["secret"]) : undefined);
    if (!secretsMatch(secret, provided)) {
      res.status(401).json({ error: "Invalid webhook secret" });
      return;
    }
    next();
  };
}

/**
 * Turns a TradingView-style alert (`action`, `ticker`, `interval`, `close`)
 * into signal text. Exchange prefixes such as `BINANCE:` are dropped.
 */
export function buildSignalTextFromAlert(body: JsonRecord): string | undefined {
  const action = pickString(body, ["action", "side", "direction"]);
  const ticker = pickString(body, ["ticker", "symbol"]);
  const interval = pickString(body, ["interval", "timeframe"]);
  if (!action || !ticker || !interval) {
    return undefined;
  }
  const symbol = ticker.split(":").pop() ?? ticker;
  const timeframe = /^D$/i.test(interval) ? "1D" : interval;
  const price = pickString(body, ["close", "price"]);
  const parts = [action, symbol, timeframe];
  if (price) {
    parts.push(`@${price}`);
  }
  return parts.join(" ");
}

function sendDispatchResult(res: Response, result: DispatchResult): void {
  switch (result.status) {
    case "done":
      res.json({ status: "success", signal: result.formatted.json, delivery: result.delivery });
      return;
    case "ignored":
      res.status(202).json({ status: "ignored", reason: result.outcome.failure.error.reason });
      return;
    case "rejected": {
      const { failure } = result.outcome;
      res.status(422).json({ error: failure.error.message, stage: failure.stage, reason: failure.error.reason });
    }
  }
}

export function createServer(runtime: SignalRuntime): Express {
  const app = express();
  const checkSecret = requireSecret(runtime.config.webhookSecret);

  app.use(express.json());
  app.use(express.text({ type: "text/*" }));

  app.get("/", (_req: Request, res: Response) => {
    res.json({
      status: "running",
      service: "signal-levels",
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      telegramConfigured: runtime.telegramBot !== undefined,
      channelConfigured: runtime.notifier.channelConfigured,
      rules: runtime.rules.describe(),
    });
  });

  app.post("/webhook", checkSecret, async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const text = isRecord(body) ? buildSignalTextFromAlert(body) : undefined;
    if (!text) {
      res.status(400).json({ error: "Alert must include action, ticker and interval" });
      return;
    }
    try {
      const result = await runtime.dispatcher.dispatch(text, { source: "webhook" });
      sendDispatchResult(res, result);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unable to process alert";
      res.status(500).json({ error: message });
    }
  });

  app.post("/webhook/raw", checkSecret, async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const text = typeof body === "string"
      ? body.trim()
      : isRecord(body)
        ? pickString(body, ["message", "text"]) ?? ""
        : "";
    if (!text) {
      res.status(400).json({ error: "Signal text is required" });
      return;
    }
    try {
      const result = await runtime.dispatcher.dispatch(text, { source: "webhook" });
      sendDispatchResult(res, result);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unable to process signal";
      res.status(500).json({ error: message });
    }
  });

  app.get("/test", async (_req: Request, res: Response) => {
    try {
      const result = await runtime.dispatcher.dispatch(SAMPLE_SIGNAL, { source: "webhook", deliver: false });
      sendDispatchResult(res, result);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unable to render sample signal";
      res.status(500).json({ error: message });
    }
  });

  app.post("/api/rules/reload", checkSecret, async (_req: Request, res: Response) => {
    try {
      const status = await runtime.rules.reload();
      res.json({ status: "reloaded", rules: status });
    } catch (error) {
      if (error instanceof RuleConfigError) {
        res.status(422).json({ error: error.message, issues: error.issues });
        return;
      }
      const message = error instanceof Error ? error.message : "Unable to reload rules";
      res.status(500).json({ error: message });
    }
  });

  app.get("/api/assets", (_req: Request, res: Response) => {
    const items = runtime.rules.listAssets().map((asset) => ({
      symbol: asset.symbol,
      aliases: asset.aliases,
      timeframes: [...asset.timeframes.keys()],
      pipSize: asset.pipSize.toString(),
      decimals: asset.decimals,
    }));
    res.json({ items });
  });

  app.get("/api/history", async (req: Request, res: Response) => {
    const limit = Number.parseInt(String(req.query.limit ?? "20"), 10);
    try {
      const items = await getSignalHistory(Number.isFinite(limit) && limit > 0 ? limit : undefined);
      res.json({ items });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unable to load signal history";
      res.status(500).json({ error: message });
    }
  });

  app.get("/api/stats", async (_req: Request, res: Response) => {
    try {
      const history = await summarizeSignalHistory();
      res.json({ history, telegram: runtime.telegramBot?.getStats() });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unable to load stats";
      res.status(500).json({ error: message });
    }
  });

  app.get("/api/metrics", (_req: Request, res: Response) => {
    res.json(runtime.metrics.snapshot());
  });

  return app;
}

async function main(): Promise<void> {
  const logger = new ConsoleLogger("server");
  const runtime = await createSignalRuntime();
  const app = createServer(runtime);
  const { port } = runtime.config;

  const server = app.listen(port, () => {
    logger.info(`Webhook server listening on http://localhost:${port}`, runtime.rules.describe());
  });
  if (!runtime.config.webhookSecret) {
    logger.warn("WEBHOOK_SECRET is not set; webhook routes accept unauthenticated requests");
  }
  runtime.telegramBot?.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("Shutting down", { signal });
    server.close();
    void runtime.telegramBot?.stop().catch((error: unknown) => {
      logger.error("Telegram bot did not stop cleanly", { error });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

if (!process.env.VITEST_WORKER_ID) {
  main().catch((error: unknown) => {
    console.error("[server] fatal error:", error);
    process.exitCode = 1;
  });
}
