import { Decimal } from "decimal.js";

import type { SymbolDirectory } from "../rules/ruleTypes.js";
import { isQualifiedTimeframe } from "../rules/timeframes.js";
import type { Direction, ParseFailureReason, SignalParseResult } from "./signalTypes.js";

const DIRECTION_KEYWORDS: Readonly<Record<string, Direction>> = {
  LONG: "LONG",
  BUY: "LONG",
  L: "LONG",
  SHORT: "SHORT",
  SELL: "SHORT",
  S: "SHORT",
};

const DIRECTION_EMOJI: ReadonlyArray<readonly [string, Direction]> = [
  ["🟢", "LONG"],
  ["🟩", "LONG"],
  ["📈", "LONG"],
  ["⬆", "LONG"],
  ["🔴", "SHORT"],
  ["🟥", "SHORT"],
  ["📉", "SHORT"],
  ["⬇", "SHORT"],
];

const PLAIN_DECIMAL = /^\d+(?:\.\d+)?$/;
const GROUPED_DECIMAL = /^\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;
const COMMA_DECIMAL = /^\d+,\d+$/;

const PRICE_MARKER = "@";

export interface SignalParserOptions {
  /** Consulted only to tell signal-shaped text apart from chatter. */
  readonly directory?: SymbolDirectory;
}

interface PriceMarker {
  readonly raw: string;
  /** Number of words that precede the marker. */
  readonly slot: number;
}

function cleanToken(token: string): string {
  return token.replace(/^[^A-Z0-9@]+|[^A-Z0-9@]+$/g, "");
}

function replaceDirectionEmoji(text: string): string {
  let result = text.replace(/\uFE0F/g, "");
  for (const [emoji, direction] of DIRECTION_EMOJI) {
    result = result.split(emoji).join(` ${direction} `);
  }
  return result;
}

export function tokenizeSignalText(text: string): string[] {
  return replaceDirectionEmoji(text)
    .toUpperCase()
    .split(/[\s;]+/)
    .map(cleanToken)
    .filter((token) => token.length > 0);
}

/**
 * Accepts `2350.50`, grouped thousands (`65,000.5`) and a decimal comma
 * (`2350,5`). Anything else, or a value that is not above zero, yields undefined.
 */
export function parsePriceText(raw: string): Decimal | undefined {
  const value = raw.trim();
  let normalized: string;
  if (PLAIN_DECIMAL.test(value)) {
    normalized = value;
  } else if (GROUPED_DECIMAL.test(value)) {
    normalized = value.replace(/,/g, "");
  } else if (COMMA_DECIMAL.test(value)) {
    normalized = value.replace(",", ".");
  } else {
    return undefined;
  }
  const price = new Decimal(normalized);
  return price.gt(0) ? price : undefined;
}

/**
 * Pulls `@price` markers out of the token stream. A marker may stand alone
 * (`@ 65000`), lead a token (`@65000`) or trail a word (`M5@65000`).
 */
function splitPriceMarkers(tokens: readonly string[]): { words: string[]; markers: PriceMarker[] } {
  const words: string[] = [];
  const markers: PriceMarker[] = [];
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    const at = token.indexOf(PRICE_MARKER);
    let raw = at === -1 ? "" : token.slice(at + PRICE_MARKER.length);
    // "desk@example.com" stays a word
    if (at === -1 || (at > 0 && raw !== "" && !/^\d/.test(raw))) {
      words.push(token);
      continue;
    }
    if (at > 0) {
      words.push(token.slice(0, at));
    }
    if (!raw) {
      raw = tokens[index + 1] ?? "";
      index += 1;
    }
    markers.push({ raw, slot: words.length });
  }
  return { words, markers };
}

function looksLikeSignal(
  words: readonly string[],
  markers: readonly PriceMarker[],
  directory: SymbolDirectory | undefined,
): boolean {
  if (markers.length > 0) {
    return true;
  }
  if (words.some((word) => isQualifiedTimeframe(word))) {
    return true;
  }
  if (!directory) {
    return false;
  }
  if (words.some((word) => directory.resolveAsset(word) !== undefined)) {
    return true;
  }
  // Configured timeframe aliases ("SCALP") count in the third slot; bare numbers do not.
  const timeframeSlot = words[2];
  return timeframeSlot !== undefined && !/^\d+$/.test(timeframeSlot)
    && directory.normalizeTimeframe(timeframeSlot) !== undefined;
}

function fail(reason: ParseFailureReason, input: string, message: string): SignalParseResult {
  return { ok: false, failure: { kind: "parse_failure", reason, input, message } };
}

/**
 * Reads `<direction> <asset> <timeframe> [@price]` out of free text.
 *
 * The asset and timeframe come back as raw tokens; the rule store resolves
 * them. Checks run in order: direction, structure, price.
 */
export function parseSignal(rawText: string, options: SignalParserOptions = {}): SignalParseResult {
  const text = rawText.trim();
  if (!text) {
    return fail("NOT_A_SIGNAL", rawText, "Message is empty");
  }

  const tokens = tokenizeSignalText(text);
  // An emoji followed by its own keyword ("🟢 LONG ...") counts once.
  const leadingDirection = DIRECTION_KEYWORDS[tokens[0] ?? ""];
  if (leadingDirection !== undefined && DIRECTION_KEYWORDS[tokens[1] ?? ""] === leadingDirection) {
    tokens.splice(1, 1);
  }

  if (tokens.length === 0) {
    return fail("NOT_A_SIGNAL", text, "Message has no words");
  }
  const { words, markers } = splitPriceMarkers(tokens);

  const direction = DIRECTION_KEYWORDS[words[0] ?? ""];
  if (direction === undefined || markers.some((marker) => marker.slot === 0)) {
    if (!looksLikeSignal(words, markers, options.directory)) {
      return fail("NOT_A_SIGNAL", text, "No trading signal found");
    }
    return fail(
      "UNRECOGNIZED_DIRECTION",
      tokens[0] ?? text,
      `"${tokens[0] ?? text}" is not a direction (expected LONG, BUY, L, SHORT, SELL or S)`,
    );
  }

  const assetToken = words[1];
  if (assetToken === undefined) {
    return fail("INCOMPLETE_MESSAGE", text, "Asset is missing after the direction");
  }
  if (markers.some((marker) => marker.slot < 2)) {
    return fail("INCOMPLETE_MESSAGE", text, "Price must come after the asset, not in its place");
  }
  const timeframeToken = words[2];
  if (timeframeToken === undefined) {
    return fail("INCOMPLETE_MESSAGE", text, "Timeframe is missing after the asset");
  }

  if (markers.length > 1) {
    return fail("INVALID_PRICE", text, "Message contains more than one price");
  }
  const marker = markers[0];
  let entryPrice: Decimal | undefined;
  if (marker) {
    entryPrice = parsePriceText(marker.raw);
    if (!entryPrice) {
      return fail("INVALID_PRICE", `${PRICE_MARKER}${marker.raw}`, `"${marker.raw}" is not a positive price`);
    }
  }

  return {
    ok: true,
    signal: {
      direction,
      assetToken,
      timeframeToken,
      entryPrice,
      text,
    },
  };
}
