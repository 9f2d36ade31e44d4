import { Decimal } from "decimal.js";
import { z } from "zod";

import type { DistanceUnit } from "./ruleTypes.js";

const DECIMAL_TEXT = /^\d+(?:\.\d+)?$/;

const UNIT_TAGS: Record<string, DistanceUnit> = {
  "%": "percent",
  percent: "percent",
  pct: "percent",
  pip: "pips",
  pips: "pips",
  point: "points",
  points: "points",
  pts: "points",
};

export const PositiveDecimalSchema = z
  .union([z.number().finite(), z.string().trim().regex(DECIMAL_TEXT, "expected a decimal number")])
  .transform((value) => new Decimal(value))
  .refine((value) => value.gt(0), { message: "must be greater than zero" });

export const DistanceUnitSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => value in UNIT_TAGS, { message: "unit must be one of %, pips, points" })
  .transform((value): DistanceUnit => UNIT_TAGS[value] ?? "percent");

export const TimeframeRuleSchema = z.object({
  tp1: PositiveDecimalSchema,
  tp2: PositiveDecimalSchema,
  tp3: PositiveDecimalSchema,
  sl: PositiveDecimalSchema,
  unit: DistanceUnitSchema.default("%"),
});

export const AssetConfigSchema = z.object({
  aliases: z.array(z.string().trim().min(1)).default([]),
  decimals: z.number().int().min(0).max(12).optional(),
  pipSize: PositiveDecimalSchema.optional(),
  priceSymbol: z.string().trim().min(1).optional(),
  timeframes: z.record(z.string(), TimeframeRuleSchema),
});

export const RuleConfigSchema = z.object({
  timeframeAliases: z.record(z.string(), z.string()).default({}),
  assets: z.record(z.string(), AssetConfigSchema),
});

export type AssetConfig = z.output<typeof AssetConfigSchema>;
