import { describe, it, expect } from 'vitest';
import { barsUpTo, mergeBars, parseBarRows, validateBars } from '../../src/lib/services/barHistory';
import type { Bar } from '../../src/types';

const bar = (date: string, close: number, overrides: Partial<Bar> = {}): Bar => ({
    date,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000,
    ...overrides,
});

describe('mergeBars', () => {
    it('lets incoming bars replace stored bars on the same date', () => {
        const stored = [bar('2024-01-02', 10), bar('2024-01-03', 11)];
        const incoming = [bar('2024-01-03', 12), bar('2024-01-04', 13)];

        expect(mergeBars(stored, incoming).map(b => [b.date, b.close])).toEqual([
            ['2024-01-02', 10],
            ['2024-01-03', 12],
            ['2024-01-04', 13],
        ]);
    });

    it('sorts ascending whatever the input order', () => {
        const merged = mergeBars([bar('2024-01-04', 13)], [bar('2024-01-02', 10)]);
        expect(merged.map(b => b.date)).toEqual(['2024-01-02', '2024-01-04']);
    });
});

describe('validateBars', () => {
    it('drops unusable and out-of-order rows', () => {
        const bars = [
            bar('2024-01-02', 10),
            bar('2024-01-03', 11, { low: 0 }),
            bar('2024-01-04', 12, { close: NaN }),
            bar('2024-01-05', 13),
            bar('2024-01-05', 14),
            bar('2024-01-04', 15),
            bar('2024-02-30', 16),
            bar('2024-01-08', 17, { volume: -1 }),
            bar('2024-01-09', 18),
        ];

        expect(validateBars('HPG', bars).map(b => b.date)).toEqual(['2024-01-02', '2024-01-05', '2024-01-09']);
    });
});

describe('barsUpTo', () => {
    const bars = [bar('2024-01-02', 10), bar('2024-01-03', 11), bar('2024-01-05', 12)];

    it('keeps bars on or before the date', () => {
        expect(barsUpTo(bars, '2024-01-03')).toHaveLength(2);
        expect(barsUpTo(bars, '2024-01-04')).toHaveLength(2);
        expect(barsUpTo(bars, '2024-01-10')).toHaveLength(3);
    });

    it('is empty before the first bar', () => {
        expect(barsUpTo(bars, '2023-12-29')).toEqual([]);
    });
});

describe('parseBarRows', () => {
    it('coerces numeric strings and skips malformed rows', () => {
        const rows: unknown[] = [
            { date: '2024-01-02', open: '10', high: '11', low: '9', close: '10.5', volume: '1200' },
            { date: '02/01/2024', open: 10, high: 11, low: 9, close: 10, volume: 1 },
            { date: '2024-01-03', open: 10, high: 11, low: 9 },
            'not a row',
        ];

        expect(parseBarRows('HPG', rows)).toEqual([
            { date: '2024-01-02', open: 10, high: 11, low: 9, close: 10.5, volume: 1200 },
        ]);
    });
});
