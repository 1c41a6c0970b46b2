// src/lib/utils/swingUtils.ts
// =============================================================================
// SWING HIGH / LOW DETECTION
//
// Ordered fallback policy, every step a pure function:
//   1. centered window W = swingWindow   (findSwings)
//   2. centered window W = 3             (findSwings)
//   3. rolling max/min over the last 60 bars (rollingExtremes)
// A window attempt succeeds only if it finds at least one swing high AND one
// swing low. The reported pair comes from selectTrendAwarePair().
// =============================================================================

import type { Bar, SwingMethod } from '../../types';
import { highest, lowest, mean } from '../indicators';
import { subtractMonths } from './tradingCalendar';

const FALLBACK_WINDOW = 3;
const ROLLING_WINDOW = 60;
const MIN_LOOKBACK_BARS = 10;
const TREND_MID_PERIOD = 20;

export interface SwingIndices {
    highs: number[];
    lows: number[];
}

export interface SwingPair {
    swingHigh: number;
    swingLow: number;
    method: SwingMethod;
}

export interface SwingOptions {
    swingWindow: number;
    fibLookbackMonths: number;
    /** Period of the close average that decides up/down trend */
    trendPeriod?: number;
}

/**
 * Indices i (W <= i < n - W) whose high / low is the extreme of [i-W, i+W].
 * Ties count: every bar equal to the window max is a swing high.
 */
export function findSwings(highs: readonly number[], lows: readonly number[], window: number): SwingIndices {
    const n = highs.length;
    const result: SwingIndices = { highs: [], lows: [] };

    for (let i = window; i < n - window; i++) {
        const windowHighs = highs.slice(i - window, i + window + 1);
        const windowLows = lows.slice(i - window, i + window + 1);
        if (highs[i] === highest(windowHighs)) result.highs.push(i);
        if (lows[i] === lowest(windowLows)) result.lows.push(i);
    }

    return result;
}

/** Last-resort pair: extremes of the trailing `window` bars */
export function rollingExtremes(
    highs: readonly number[],
    lows: readonly number[],
    window = ROLLING_WINDOW
): { swingHigh: number; swingLow: number } {
    const size = Math.min(window, highs.length);
    return {
        swingHigh: highest(highs.slice(-size)),
        swingLow: lowest(lows.slice(-size)),
    };
}

/**
 * Picks the move currently in force rather than the global extremes.
 *
 * Uptrend   : latest swing low, then the highest swing high after it
 *             (highest of all swing highs if none comes after).
 * Downtrend : latest swing high, then the lowest swing low after it
 *             (lowest of all swing lows if none comes after).
 *
 * Both index lists must be non-empty and ascending.
 */
export function selectTrendAwarePair(
    highs: readonly number[],
    lows: readonly number[],
    swings: SwingIndices,
    uptrend: boolean
): { swingHigh: number; swingLow: number } {
    if (uptrend) {
        const latestLow = swings.lows[swings.lows.length - 1];
        const after = swings.highs.filter(i => i > latestLow);
        const candidates = after.length > 0 ? after : swings.highs;
        const bestHigh = candidates.reduce((best, i) => (highs[i] > highs[best] ? i : best), candidates[0]);
        return { swingHigh: highs[bestHigh], swingLow: lows[latestLow] };
    }

    const latestHigh = swings.highs[swings.highs.length - 1];
    const after = swings.lows.filter(i => i > latestHigh);
    const candidates = after.length > 0 ? after : swings.lows;
    const bestLow = candidates.reduce((best, i) => (lows[i] < lows[best] ? i : best), candidates[0]);
    return { swingHigh: highs[latestHigh], swingLow: lows[bestLow] };
}

/**
 * Bars dated within the last `months` months of the final bar.
 * Falls back to the whole series when fewer than 10 bars remain.
 */
export function lookbackWindow(bars: readonly Bar[], months: number): readonly Bar[] {
    if (bars.length === 0) return bars;
    const cutoff = subtractMonths(bars[bars.length - 1].date, months);
    const recent = bars.filter(b => b.date >= cutoff);
    return recent.length < MIN_LOOKBACK_BARS ? bars : recent;
}

/**
 * Swing pair for a series ending at the reference bar.
 * `bars` must be non-empty.
 */
export function detectSwingPair(bars: readonly Bar[], options: SwingOptions): SwingPair {
    const sub = lookbackWindow(bars, options.fibLookbackMonths);
    const highs = sub.map(b => b.high);
    const lows = sub.map(b => b.low);
    const closes = sub.map(b => b.close);
    const close = closes[closes.length - 1];

    const attempts: { window: number; method: SwingMethod }[] = [
        { window: options.swingWindow, method: 'primary-window' },
        { window: FALLBACK_WINDOW, method: 'fallback-window' },
    ];

    for (const attempt of attempts) {
        const swings = findSwings(highs, lows, attempt.window);
        if (swings.highs.length === 0 || swings.lows.length === 0) continue;

        const period = Math.min(options.trendPeriod ?? TREND_MID_PERIOD, closes.length);
        const mid = mean(closes.slice(-period));
        const pair = selectTrendAwarePair(highs, lows, swings, close >= mid);
        return { ...pair, method: attempt.method };
    }

    return { ...rollingExtremes(highs, lows), method: 'rolling-extremes' };
}
