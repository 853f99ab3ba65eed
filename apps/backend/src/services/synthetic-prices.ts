import { eachDayOfInterval, format, isWeekend, subDays } from "date-fns";
import catalog from "../data/ticker-catalog.json";
import { CatalogEntry, DailyBar } from "../types";

const CATALOG: Record<string, CatalogEntry> = catalog;

export const DAY_FORMAT = "yyyy-MM-dd";

/**
 * Weekdays from `lookbackDays` calendar days before `end` through `end`,
 * formatted as YYYY-MM-DD in local time, oldest first.
 */
export function tradingDaysInWindow(end: Date, lookbackDays: number): string[] {
  return eachDayOfInterval({ start: subDays(end, lookbackDays), end })
    .filter((day) => !isWeekend(day))
    .map((day) => format(day, DAY_FORMAT));
}

export function catalogEntryFor(symbol: string): CatalogEntry {
  return (
    CATALOG[symbol] ?? {
      name: `${symbol} Inc.`,
      sector: "Unknown",
      basePrice: 100,
    }
  );
}

const between = (random: () => number, min: number, max: number) => min + (max - min) * random();

/**
 * Random walk of daily bars over `days`. Days present in `existing` are
 * skipped and do not move the walk.
 */
export function generateSyntheticBars(input: {
  basePrice: number;
  days: string[];
  existing?: ReadonlySet<string>;
  random?: () => number;
}): DailyBar[] {
  const random = input.random ?? Math.random;
  const existing = input.existing ?? new Set<string>();
  const bars: DailyBar[] = [];
  let price = input.basePrice * between(random, 0.95, 1.05);

  for (const date of input.days) {
    if (existing.has(date)) {
      continue;
    }

    price = price * (1 + between(random, -0.03, 0.03));
    const open = price * between(random, 0.99, 1.01);
    const high = Math.max(open, price) * between(random, 1.0, 1.02);
    const low = Math.min(open, price) * between(random, 0.98, 1.0);
    const volume = Math.floor(between(random, 50_000_000, 150_000_000));

    bars.push({ date, open, high, low, close: price, volume });
  }

  return bars;
}
