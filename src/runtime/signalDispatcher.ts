import type { FormattedSignal, SignalFormatter } from "../services/formatting/signalFormatter.js";
import type { ChatId } from "../services/integrations/telegram/telegramClient.js";
import {
  appendSignalHistory,
  type SignalHistoryInput,
  type SignalSource,
} from "../storage/historyStore.js";
import { ConsoleLogger, type Logger } from "../telemetry/logger.js";
import type { DeliveryReport, NotificationService } from "../telemetry/notificationService.js";
import type { PipelineOutcome, SignalPipeline } from "../trading/signalPipeline.js";
import { isIgnorableFailure } from "../trading/signalTypes.js";

export type HistoryWriter = (record: SignalHistoryInput) => Promise<unknown>;

export interface SignalDispatcherOptions {
  readonly pipeline: SignalPipeline;
  readonly formatter: SignalFormatter;
  readonly notifier?: NotificationService;
  readonly history?: HistoryWriter;
  readonly logger?: Logger;
}

export interface DispatchOptions {
  readonly source: SignalSource;
  /** When false the signal is computed and formatted but not published. */
  readonly deliver?: boolean;
  readonly originChatId?: ChatId;
}

export type DispatchResult =
  | {
      readonly status: "done";
      readonly outcome: Extract<PipelineOutcome, { status: "done" }>;
      readonly formatted: FormattedSignal;
      readonly delivery: DeliveryReport;
    }
  | {
      readonly status: "ignored" | "rejected";
      readonly outcome: Extract<PipelineOutcome, { status: "failed" }>;
    };

const SKIPPED_DELIVERY: DeliveryReport = { channel: "skipped", webhook: "skipped" };

/** Runs one message through the pipeline and hands the result to delivery and history. */
export class SignalDispatcher {
  private readonly logger: Logger;
  private readonly history: HistoryWriter;

  constructor(private readonly options: SignalDispatcherOptions) {
    this.logger = options.logger ?? new ConsoleLogger("dispatch");
    this.history = options.history ?? appendSignalHistory;
  }

  async dispatch(text: string, dispatchOptions: DispatchOptions): Promise<DispatchResult> {
    const outcome = await this.options.pipeline.process(text);
    const deliver = dispatchOptions.deliver ?? true;

    if (outcome.status === "failed") {
      if (isIgnorableFailure(outcome.failure)) {
        return { status: "ignored", outcome };
      }
      if (deliver) {
        await this.recordHistory({
          source: dispatchOptions.source,
          text,
          status: "failed",
          stage: outcome.failure.stage,
          reason: outcome.failure.error.reason,
        });
      }
      return { status: "rejected", outcome };
    }

    const formatted = this.options.formatter.format(outcome.result);
    const delivery = deliver && this.options.notifier
      ? await this.options.notifier.publishSignal(formatted, { originChatId: dispatchOptions.originChatId })
      : SKIPPED_DELIVERY;

    if (deliver) {
      await this.recordHistory({
        source: dispatchOptions.source,
        text,
        status: "done",
        direction: outcome.result.direction,
        asset: outcome.result.asset,
        timeframe: outcome.result.timeframe,
        entryPrice: outcome.result.entryPrice.toString(),
      });
    }

    return { status: "done", outcome, formatted, delivery };
  }

  private async recordHistory(record: SignalHistoryInput): Promise<void> {
    try {
      await this.history(record);
    } catch (error) {
      this.logger.warn("Failed to append signal history", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
