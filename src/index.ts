export * from "./rules/ruleTypes.js";
export { RuleTable, toLookupKey } from "./rules/ruleTable.js";
export { RuleStore, type RuleStoreStatus } from "./rules/ruleStore.js";
export { FileRuleSource, SheetRuleSource, StaticRuleSource, parseRuleSheetCsv, type RuleSource } from "./rules/ruleSources.js";
export { normalizeTimeframe } from "./rules/timeframes.js";
export * from "./trading/signalTypes.js";
export { parseSignal, parsePriceText, tokenizeSignalText } from "./trading/signalParser.js";
export { calculateLevels } from "./trading/levelCalculator.js";
export { SignalPipeline, type PipelineOutcome, type PriceLookup } from "./trading/signalPipeline.js";
export { SignalFormatter, availableTemplates, type FormattedSignal } from "./services/formatting/signalFormatter.js";
export { FallbackPriceProvider, StaticPriceProvider, type PriceProvider } from "./services/pricing/priceProviders.js";
export { HyperliquidPriceProvider } from "./services/pricing/hyperliquidPriceProvider.js";
export { NotificationService } from "./telemetry/notificationService.js";
export { createSignalRuntime, type SignalRuntime } from "./runtime/serviceRegistry.js";
