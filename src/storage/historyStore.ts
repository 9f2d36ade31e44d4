import crypto from "node:crypto";

import { z } from "zod";

import { appendNdjsonRecord, readNdjsonRecords } from "./ndjsonStore.js";

const SIGNAL_HISTORY_FILE = "signal-history.ndjson";

export type SignalSource = "telegram" | "webhook" | "cli";

const SignalHistoryRecordSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  source: z.enum(["telegram", "webhook", "cli"]),
  text: z.string(),
  status: z.enum(["done", "failed"]),
  direction: z.enum(["LONG", "SHORT"]).optional(),
  asset: z.string().optional(),
  timeframe: z.string().optional(),
  entryPrice: z.string().optional(),
  stage: z.enum(["parse", "resolve", "calculate"]).optional(),
  reason: z.string().optional(),
});

export type SignalHistoryRecord = z.infer<typeof SignalHistoryRecordSchema>;

export type SignalHistoryInput = Omit<SignalHistoryRecord, "id" | "timestamp"> & {
  readonly timestamp?: number;
};

export interface SignalHistorySummary {
  readonly total: number;
  readonly completed: number;
  readonly rejected: number;
  readonly lastSignalAt?: string;
}

export async function appendSignalHistory(record: SignalHistoryInput): Promise<SignalHistoryRecord> {
  const entry: SignalHistoryRecord = {
    ...record,
    id: crypto.randomUUID(),
    timestamp: record.timestamp ?? Date.now(),
  };
  await appendNdjsonRecord({ fileName: SIGNAL_HISTORY_FILE, record: entry });
  return entry;
}

export async function getSignalHistory(limit?: number): Promise<SignalHistoryRecord[]> {
  return readNdjsonRecords({
    fileName: SIGNAL_HISTORY_FILE,
    limit,
    mapper: (item) => {
      const parsed = SignalHistoryRecordSchema.safeParse(item);
      return parsed.success ? parsed.data : undefined;
    },
  });
}

export async function summarizeSignalHistory(): Promise<SignalHistorySummary> {
  const records = await getSignalHistory();
  const completed = records.filter((record) => record.status === "done");
  const latest = completed[0];
  return {
    total: records.length,
    completed: completed.length,
    rejected: records.length - completed.length,
    lastSignalAt: latest ? new Date(latest.timestamp).toISOString() : undefined,
  };
}
