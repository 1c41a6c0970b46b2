import { describe, it, expect } from 'vitest';
import {
    computeFeatures,
    fibonacciLevels,
    isNearLevel,
    nearestLevels,
    priceVsSma,
    tryComputeFeatures,
} from '../../src/lib/features';
import { InsufficientDataError } from '../../src/lib/errors';
import {
    detectSwingPair,
    findSwings,
    lookbackWindow,
    rollingExtremes,
    selectTrendAwarePair,
} from '../../src/lib/utils/swingUtils';
import { subtractMonths } from '../../src/lib/utils/tradingCalendar';
import { TEST_OPTIONS, barsFromCloses, makeBars } from '../helpers/bars';

/** 110 → 100 (swing low at 10), up to 118 (swing high at 19), back to 108 */
function vShapeCloses(): number[] {
    const closes: number[] = [];
    for (let i = 0; i < 10; i++) closes.push(110 - i);
    for (let i = 10; i < 20; i++) closes.push(100 + (i - 10) * 2);
    for (let i = 20; i < 30; i++) closes.push(118 - (i - 19));
    return closes;
}

describe('findSwings', () => {
    it('marks centred window extremes', () => {
        const highs = [1, 2, 5, 2, 1, 2, 1];
        const lows = [3, 2, 1, 2, 3, 2, 3];
        expect(findSwings(highs, lows, 2)).toEqual({ highs: [2], lows: [2] });
    });

    it('finds nothing in a monotonic series', () => {
        const values = Array.from({ length: 20 }, (_, i) => i);
        expect(findSwings(values, values, 3)).toEqual({ highs: [], lows: [] });
    });
});

describe('selectTrendAwarePair', () => {
    const highs = [10, 12, 11, 15, 13, 14];
    const lows = [5, 6, 4, 7, 8, 6];

    it('uptrend: latest swing low and the highest swing high after it', () => {
        expect(selectTrendAwarePair(highs, lows, { highs: [1, 3], lows: [2] }, true)).toEqual({
            swingHigh: 15,
            swingLow: 4,
        });
    });

    it('downtrend: latest swing high and the lowest swing low after it', () => {
        expect(selectTrendAwarePair(highs, lows, { highs: [1, 3], lows: [2, 4] }, false)).toEqual({
            swingHigh: 15,
            swingLow: 8,
        });
    });

    it('falls back to any swing high when none follows the latest low', () => {
        expect(selectTrendAwarePair(highs, lows, { highs: [1], lows: [2] }, true)).toEqual({
            swingHigh: 12,
            swingLow: 4,
        });
    });
});

describe('detectSwingPair', () => {
    it('uses the primary window when it finds both swings', () => {
        const bars = barsFromCloses(vShapeCloses());
        expect(detectSwingPair(bars, { swingWindow: 5, fibLookbackMonths: 6, trendPeriod: 20 })).toEqual({
            swingHigh: 118.5,
            swingLow: 99.5,
            method: 'primary-window',
        });
    });

    it('falls back to the narrower window', () => {
        // swing low at 4, swing high at 9: visible with W=3, not with W=5 (too close to the end)
        const closes = [110, 108, 106, 104, 100, 102, 104, 106, 108, 112, 111, 110, 109];
        const bars = barsFromCloses(closes);
        const pair = detectSwingPair(bars, { swingWindow: 5, fibLookbackMonths: 6 });
        expect(pair.method).toBe('fallback-window');
        expect(pair.swingHigh).toBe(112.5);
        expect(pair.swingLow).toBe(99.5);
    });

    it('ends with rolling extremes when no window finds swings', () => {
        const bars = barsFromCloses(Array.from({ length: 30 }, (_, i) => 100 + i));
        expect(detectSwingPair(bars, { swingWindow: 5, fibLookbackMonths: 6 })).toEqual({
            swingHigh: 129.5,
            swingLow: 99.5,
            method: 'rolling-extremes',
        });
    });

    it('rollingExtremes looks at the trailing window only', () => {
        expect(rollingExtremes([9, 1, 2, 3], [0, 1, 2, 3], 3)).toEqual({ swingHigh: 3, swingLow: 1 });
    });
});

describe('lookbackWindow', () => {
    it('keeps bars within the months before the last bar', () => {
        const bars = barsFromCloses(Array.from({ length: 180 }, () => 100));
        const cutoff = subtractMonths(bars[bars.length - 1].date, 6);
        const recent = lookbackWindow(bars, 6);
        expect(recent.length).toBeLessThan(bars.length);
        expect(recent[0].date >= cutoff).toBe(true);
        expect(bars[bars.length - recent.length - 1].date < cutoff).toBe(true);
    });

    it('uses the whole series when fewer than 10 bars remain', () => {
        const old = makeBars([{ close: 1 }, { close: 2 }, { close: 3 }, { close: 4 }, { close: 5 }], '2023-01-02');
        const recent = makeBars([{ close: 6 }, { close: 7 }, { close: 8 }, { close: 9 }, { close: 10 }], '2024-01-01');
        const bars = [...old, ...recent];
        expect(lookbackWindow(bars, 6)).toHaveLength(10);
    });
});

describe('retracement levels', () => {
    it('derives prices from the swing pair', () => {
        expect(fibonacciLevels(110, 100, [0, 0.382, 0.5, 1])).toEqual([
            { ratio: 0, price: 110 },
            { ratio: 0.382, price: 106.18 },
            { ratio: 0.5, price: 105 },
            { ratio: 1, price: 100 },
        ]);
    });

    it('finds the nearest level on each side', () => {
        expect(nearestLevels(104, [110, 105, 100])).toEqual({ support: 100, resistance: 105 });
        expect(nearestLevels(120, [110, 105, 100])).toEqual({ support: 110, resistance: 110 });
        expect(nearestLevels(90, [110, 105, 100])).toEqual({ support: 100, resistance: 100 });
    });

    it('measures proximity relative to the level', () => {
        expect(isNearLevel(104, 105, 0.015)).toBe(true);
        expect(isNearLevel(100, 105, 0.015)).toBe(false);
        expect(isNearLevel(100, 0, 0.015)).toBe(false);
    });
});

describe('computeFeatures', () => {
    const specs = vShapeCloses().map((close, i, all) => ({ close, volume: i === all.length - 1 ? 1500 : 1000 }));
    const bars = makeBars(specs);

    it('builds the snapshot as of the last bar', () => {
        const snap = computeFeatures(bars, TEST_OPTIONS);

        expect(snap.date).toBe(bars[29].date);
        expect(snap.close).toBe(108);
        expect(snap.pctChange).toBe(-0.92);
        expect(snap.sma).toBe(110.75);
        expect(snap.priceVsSma).toBe('below');
        expect(snap.volumeSma).toBe(1025);
        expect(snap.volumeSpike).toBe(true);
        expect(snap.swingHigh).toBe(118.5);
        expect(snap.swingLow).toBe(99.5);
        expect(snap.swingMethod).toBe('primary-window');
        expect(snap.fibLevels.map(l => l.price)).toEqual([118.5, 114.02, 111.24, 109, 106.76, 103.57, 99.5]);
        expect(snap.nearestSupport).toBe(106.76);
        expect(snap.nearestResistance).toBe(109);
        expect(snap.atFibSupport).toBe(true);
        expect(snap.atFibResistance).toBe(true);
    });

    it('is unaffected by bars after the reference day', () => {
        const extended = [...bars, ...makeBars([{ close: 150, volume: 9000 }], '2024-02-12')];
        expect(computeFeatures(extended.slice(0, 30), TEST_OPTIONS)).toEqual(computeFeatures(bars, TEST_OPTIONS));
    });

    it('throws InsufficientDataError below the SMA period', () => {
        expect(() => computeFeatures(bars.slice(0, 19), TEST_OPTIONS)).toThrow(InsufficientDataError);
    });

    it('tryComputeFeatures reports short history as a value', () => {
        expect(tryComputeFeatures(bars.slice(0, 5), TEST_OPTIONS)).toEqual({
            ok: false,
            reason: 'insufficient-data',
            required: 20,
            actual: 5,
        });
    });

    it('priceVsSma is unknown without an average', () => {
        expect(priceVsSma(10, null)).toBe('unknown');
        expect(priceVsSma(10, 9)).toBe('above');
    });
});
