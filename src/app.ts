#!/usr/bin/env node
import { createSignalRuntime } from "./runtime/serviceRegistry.js";
import { describeFailure } from "./trading/signalTypes.js";

const DEFAULT_SIGNAL = "LONG BTCUSD M5";

function getSignalText(): string {
  const override = process.env.SIGNAL_TEXT?.trim();
  if (override) {
    return override;
  }
  const fromArgs = process.argv.slice(2).join(" ").trim();
  if (fromArgs.length > 0) {
    return fromArgs;
  }
  return DEFAULT_SIGNAL;
}

async function main() {
  const signalText = getSignalText();
  console.log("[signal] raw text:", signalText);

  const runtime = await createSignalRuntime();
  const result = await runtime.dispatcher.dispatch(signalText, { source: "cli", deliver: false });

  switch (result.status) {
    case "done":
      console.log(result.formatted.plainText);
      console.log("[signal] webhook payload:", JSON.stringify(result.formatted.webhookPayload, null, 2));
      if (result.outcome.priceSource === "lookup") {
        console.log(`[signal] entry price from ${runtime.prices.name} provider`);
      }
      return;
    case "ignored":
      console.log("[signal] not a trading signal; nothing to do.");
      return;
    case "rejected":
      console.error(`[signal] ${describeFailure(result.outcome.failure)}`);
      process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("[signal] fatal error:", error);
  process.exitCode = 1;
});
