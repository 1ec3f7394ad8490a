const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface TimeLayoutOptions {
  /** ISO date (YYYY-MM-DD) of the first day of week 1. */
  baselineStart: string;
  /** Number of weeks in the window. */
  totalWeeks: number;
  /** Number of discrete columns (characters or pixel cells) available. */
  columnBudget: number;
}

/** Inclusive column range occupied by a week range. */
export interface ColumnSpan {
  first: number;
  last: number;
}

export interface TimeLayout extends TimeLayoutOptions {
  /** Column where a 1-based week starts, clamped to [0, columnBudget - 1]. */
  weekToColumn(week: number): number;
  /** Columns allotted to a week. Earlier weeks absorb the remainder. */
  weekWidth(week: number): number;
  /** Columns covered by weeks startWeek..endWeek. Always at least one column. */
  span(startWeek: number, endWeek: number): ColumnSpan;
  /** ISO date of the first day of a 1-based week. */
  weekStartDate(week: number): string;
}

function parseIsoDate(value: string): number {
  const match = ISO_DATE.exec(value);
  if (!match) throw new Error(`Invalid baseline start date: "${value}" (expected YYYY-MM-DD)`);
  const [, y, m, d] = match;
  const time = Date.UTC(Number(y), Number(m) - 1, Number(d));
  if (new Date(time).toISOString().slice(0, 10) !== value) {
    throw new Error(`Invalid baseline start date: "${value}"`);
  }
  return time;
}

/**
 * Map calendar weeks onto a fixed column budget. Each week gets
 * floor(budget / weeks) columns and the first (budget % weeks) weeks get one
 * more, so boundaries depend only on the inputs.
 */
export function createTimeLayout(options: TimeLayoutOptions): TimeLayout {
  const { baselineStart, totalWeeks, columnBudget } = options;
  if (!Number.isInteger(totalWeeks) || totalWeeks < 1) {
    throw new Error(`totalWeeks must be a positive integer, got ${totalWeeks}`);
  }
  if (!Number.isInteger(columnBudget) || columnBudget < 1) {
    throw new Error(`columnBudget must be a positive integer, got ${columnBudget}`);
  }
  const baseline = parseIsoDate(baselineStart);
  const base = Math.floor(columnBudget / totalWeeks);
  const extra = columnBudget % totalWeeks;
  const lastColumn = columnBudget - 1;

  const clampWeek = (week: number): number =>
    Math.min(Math.max(Math.trunc(week), 1), totalWeeks);

  /** Unclamped start offset of a week inside the budget. */
  const offset = (week: number): number => {
    const before = clampWeek(week) - 1;
    return before * base + Math.min(before, extra);
  };

  const weekWidth = (week: number): number => {
    const w = Math.trunc(week);
    if (w < 1 || w > totalWeeks) return 0;
    return base + (w - 1 < extra ? 1 : 0);
  };

  const weekToColumn = (week: number): number => Math.min(offset(week), lastColumn);

  const span = (startWeek: number, endWeek: number): ColumnSpan => {
    const first = weekToColumn(startWeek);
    const end = Math.max(startWeek, endWeek);
    const rawLast = offset(end) + weekWidth(clampWeek(end)) - 1;
    return { first, last: Math.min(Math.max(rawLast, first), lastColumn) };
  };

  const weekStartDate = (week: number): string =>
    new Date(baseline + (Math.trunc(week) - 1) * 7 * DAY_MS).toISOString().slice(0, 10);

  return { baselineStart, totalWeeks, columnBudget, weekToColumn, weekWidth, span, weekStartDate };
}
