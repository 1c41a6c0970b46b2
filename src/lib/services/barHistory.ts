// src/lib/services/barHistory.ts
// Stored daily-bar history: merging new downloads, validation, as-of slicing.

import { z } from 'zod';
import type { Bar, IsoDate } from '../../types';
import { createLogger } from '../logger';
import { isIsoDate } from '../utils/tradingCalendar';

const logger = createLogger('barHistory');

// Shape of an imported bar file row (JSON array of objects)
export const BarRowSchema = z.object({
    date: z.string().refine(isIsoDate, 'expected YYYY-MM-DD'),
    open: z.coerce.number(),
    high: z.coerce.number(),
    low: z.coerce.number(),
    close: z.coerce.number(),
    volume: z.coerce.number(),
});

/**
 * Parses raw rows into bars, skipping rows that fail the schema.
 * Price sanity is left to validateBars.
 */
export function parseBarRows(symbol: string, rows: readonly unknown[]): Bar[] {
    const bars: Bar[] = [];
    rows.forEach((row, i) => {
        const parsed = BarRowSchema.safeParse(row);
        if (parsed.success) {
            bars.push(parsed.data);
        } else {
            logger.warn(`${symbol}: skipping malformed bar row ${i}`, { issues: parsed.error.issues.length });
        }
    });
    return bars;
}

/**
 * Merges `incoming` into `stored`. Incoming bars win on the same date;
 * the result is ascending with one bar per date.
 */
export function mergeBars(stored: readonly Bar[], incoming: readonly Bar[]): Bar[] {
    const byDate = new Map<IsoDate, Bar>();
    for (const bar of stored) byDate.set(bar.date, bar);
    for (const bar of incoming) byDate.set(bar.date, bar);
    return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}

function isUsableBar(bar: Bar): boolean {
    const prices = [bar.open, bar.high, bar.low, bar.close];
    return (
        isIsoDate(bar.date) &&
        prices.every(p => Number.isFinite(p) && p > 0) &&
        Number.isFinite(bar.volume) &&
        bar.volume >= 0
    );
}

/**
 * Drops rows with a bad date, non-positive/non-finite prices or a date not
 * after the previous kept bar.
 */
export function validateBars(symbol: string, bars: readonly Bar[]): Bar[] {
    const out: Bar[] = [];
    let dropped = 0;
    for (const bar of bars) {
        const prev = out[out.length - 1];
        if (!isUsableBar(bar) || (prev && bar.date <= prev.date)) {
            dropped++;
            continue;
        }
        out.push(bar);
    }
    if (dropped > 0) {
        logger.warn(`${symbol}: dropped ${dropped} invalid or out-of-order bars`);
    }
    return out;
}

/** Prefix of an ascending series up to and including `date` */
export function barsUpTo(bars: readonly Bar[], date: IsoDate): Bar[] {
    let end = bars.length;
    while (end > 0 && bars[end - 1].date > date) end--;
    return bars.slice(0, end);
}
