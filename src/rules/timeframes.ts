const MINUTES_PER_HOUR = 60;
const MINUTES_PER_DAY = 1_440;

const PREFIXED_PATTERN = /^([MHD])(\d{1,4})$/;
const SUFFIXED_PATTERN = /^(\d{1,4})(MINS|MIN|M|HR|H|D)?$/;

const UNIT_MINUTES: Record<string, number> = {
  M: 1,
  MIN: 1,
  MINS: 1,
  H: MINUTES_PER_HOUR,
  HR: MINUTES_PER_HOUR,
  D: MINUTES_PER_DAY,
};

interface TimeframeMatch {
  readonly minutes: number;
  readonly qualified: boolean;
}

function matchTimeframe(token: string): TimeframeMatch | undefined {
  const value = token.trim().toUpperCase();
  const prefixed = PREFIXED_PATTERN.exec(value);
  if (prefixed) {
    const count = Number.parseInt(prefixed[2], 10);
    const unit = UNIT_MINUTES[prefixed[1]];
    return count > 0 && unit !== undefined ? { minutes: count * unit, qualified: true } : undefined;
  }
  const suffixed = SUFFIXED_PATTERN.exec(value);
  if (suffixed) {
    const count = Number.parseInt(suffixed[1], 10);
    const unitToken = suffixed[2];
    const unit = unitToken === undefined ? 1 : UNIT_MINUTES[unitToken];
    return count > 0 && unit !== undefined
      ? { minutes: count * unit, qualified: unitToken !== undefined }
      : undefined;
  }
  return undefined;
}

export function formatTimeframe(minutes: number): string {
  if (minutes % MINUTES_PER_DAY === 0) {
    return `D${minutes / MINUTES_PER_DAY}`;
  }
  if (minutes % MINUTES_PER_HOUR === 0) {
    return `H${minutes / MINUTES_PER_HOUR}`;
  }
  return `M${minutes}`;
}

export function timeframeToMinutes(token: string): number | undefined {
  return matchTimeframe(token)?.minutes;
}

/**
 * Canonical form for `M5`, `5m`, `5`, `15min`, `1H`, `H1`, `D1`, `1d`...
 * expressed in the largest whole unit (`60` becomes `H1`).
 */
export function normalizeTimeframe(token: string): string | undefined {
  const match = matchTimeframe(token);
  return match ? formatTimeframe(match.minutes) : undefined;
}

/** True only for tokens that carry a unit letter; bare numbers are too ambiguous to count. */
export function isQualifiedTimeframe(token: string): boolean {
  return matchTimeframe(token)?.qualified ?? false;
}

export function compareTimeframes(left: string, right: string): number {
  return (timeframeToMinutes(left) ?? Number.MAX_SAFE_INTEGER) - (timeframeToMinutes(right) ?? Number.MAX_SAFE_INTEGER);
}
