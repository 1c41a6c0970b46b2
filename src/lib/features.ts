// src/lib/features.ts
// =============================================================================
// FEATURE ENGINE
// Snapshot of moving averages, volume, swing points and retracement levels
// as of the last bar of the input. Pure: same bars in → same snapshot out.
// =============================================================================

import type { Bar, FeatureSnapshot, FibLevel, PriceVsSma } from '../types';
import { config, type AnalysisConfig } from './config/settings';
import { InsufficientDataError } from './errors';
import { calculateSMA, round2, valueAt } from './indicators';
import { detectSwingPair } from './utils/swingUtils';

export type FeatureResult =
    | { ok: true; snapshot: FeatureSnapshot }
    | { ok: false; reason: 'insufficient-data'; required: number; actual: number };

/**
 * Computes the feature snapshot for the series ending at its last bar.
 * @throws InsufficientDataError when there are fewer bars than `smaPeriod`
 */
export function computeFeatures(bars: readonly Bar[], options: AnalysisConfig = config.analysis): FeatureSnapshot {
    if (bars.length < options.smaPeriod) {
        throw new InsufficientDataError(options.smaPeriod, bars.length);
    }

    const last = bars[bars.length - 1];
    const prev = bars.length >= 2 ? bars[bars.length - 2] : last;

    const close = last.close;
    const pctChange = prev.close ? round2(((close - prev.close) / prev.close) * 100) : 0;

    const sma = valueAt(calculateSMA(bars.map(b => b.close), options.smaPeriod)) ?? null;
    const volumeSma = valueAt(calculateSMA(bars.map(b => b.volume), options.smaPeriod)) ?? null;
    const volumeSpike = volumeSma !== null && volumeSma > 0 && last.volume > volumeSma * options.volumeSpikeRatio;

    const swing = detectSwingPair(bars, {
        swingWindow: options.swingWindow,
        fibLookbackMonths: options.fibLookbackMonths,
        trendPeriod: options.smaPeriod,
    });

    const fibLevels = fibonacciLevels(swing.swingHigh, swing.swingLow, options.fibLevels);
    const { support, resistance } = nearestLevels(close, fibLevels.map(l => l.price));

    return {
        date: last.date,
        close,
        pctChange,
        sma,
        priceVsSma: priceVsSma(close, sma),
        volume: last.volume,
        volumeSma,
        volumeSpike,
        swingHigh: swing.swingHigh,
        swingLow: swing.swingLow,
        swingMethod: swing.method,
        fibLevels,
        nearestSupport: support,
        nearestResistance: resistance,
        atFibSupport: isNearLevel(close, support, options.fibProximityPct),
        atFibResistance: isNearLevel(close, resistance, options.fibProximityPct),
    };
}

/** Non-throwing variant for callers that treat short history as a normal case */
export function tryComputeFeatures(bars: readonly Bar[], options: AnalysisConfig = config.analysis): FeatureResult {
    if (bars.length < options.smaPeriod) {
        return { ok: false, reason: 'insufficient-data', required: options.smaPeriod, actual: bars.length };
    }
    return { ok: true, snapshot: computeFeatures(bars, options) };
}

export function priceVsSma(close: number, sma: number | null): PriceVsSma {
    if (sma === null) return 'unknown';
    return close > sma ? 'above' : 'below';
}

/** level(r) = swingHigh − r × (swingHigh − swingLow), rounded to 2 dp */
export function fibonacciLevels(swingHigh: number, swingLow: number, ratios: readonly number[]): FibLevel[] {
    const diff = swingHigh - swingLow;
    return ratios.map(ratio => ({ ratio, price: round2(swingHigh - ratio * diff) }));
}

/**
 * Support: largest level strictly below close (else the lowest level).
 * Resistance: smallest level strictly above close (else the highest level).
 */
export function nearestLevels(close: number, prices: readonly number[]): { support: number; resistance: number } {
    const sorted = [...prices].sort((a, b) => a - b);
    const below = sorted.filter(p => p < close);
    const above = sorted.filter(p => p > close);
    return {
        support: below.length > 0 ? below[below.length - 1] : sorted[0],
        resistance: above.length > 0 ? above[0] : sorted[sorted.length - 1],
    };
}

export function isNearLevel(close: number, level: number, proximityPct: number): boolean {
    if (level === 0) return false;
    return Math.abs(close - level) / level <= proximityPct;
}
