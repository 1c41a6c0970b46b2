// src/lib/indicators.ts
// =============================================================================
// TECHNICAL INDICATORS
// Pure functions – no side effects, no external state
// Used by: features, strategies
// Series functions return arrays that end at the last input value
// (length = input length − period + 1), empty when input is too short.
// =============================================================================

import * as ti from 'technicalindicators';
import type { BollingerBandsOutput } from 'technicalindicators/declarations/volatility/BollingerBands';

// -----------------------------------------------------------------------------
// 1. MOVING AVERAGES
// -----------------------------------------------------------------------------
export function calculateSMA(values: readonly number[], period: number = 20): number[] {
    if (values.length < period) return [];
    return ti.sma({ values: [...values], period });
}

// -----------------------------------------------------------------------------
// 2. BOLLINGER BANDS (sample standard deviation, n − 1)
// -----------------------------------------------------------------------------
/**
 * technicalindicators divides by n; the multiplier is rescaled by
 * √(n / (n − 1)) so the band width matches a sample deviation.
 */
export function calculateBollingerBands(
    values: readonly number[],
    period = 20,
    stdDev = 2
): BollingerBandsOutput[] {
    if (values.length < period || period < 2) return [];
    return ti.bollingerbands({
        values: [...values],
        period,
        stdDev: stdDev * Math.sqrt(period / (period - 1)),
    });
}

// -----------------------------------------------------------------------------
// 3. WINDOW HELPERS
// -----------------------------------------------------------------------------

/** Value `offset` steps back from the end (0 = last) */
export function valueAt(series: readonly number[], offset = 0): number | undefined {
    const idx = series.length - 1 - offset;
    return idx >= 0 ? series[idx] : undefined;
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return NaN;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function highest(values: readonly number[]): number {
    return values.reduce((max, v) => (v > max ? v : max), -Infinity);
}

export function lowest(values: readonly number[]): number {
    return values.reduce((min, v) => (v < min ? v : min), Infinity);
}

/** Round to 2 decimals – prices, ratios and percentages in outputs */
export function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}
