import { describe, it, expect } from 'vitest';
import { buildComparison, evaluateStrategies, formatComparison, monthlySummary } from '../../src/lib/services/evaluator';
import type { TradingStrategy } from '../../src/lib/strategies';
import type { Bar, TradeProposal, TradeRecord } from '../../src/types';
import { TEST_OPTIONS, barsFromCloses } from '../helpers/bars';

function trade(overrides: Partial<TradeRecord>): TradeRecord {
    return {
        symbol: 'HPG',
        strategy: 'alpha',
        signalDate: '2024-01-15',
        entryDate: '2024-01-16',
        exitDate: '2024-01-18',
        direction: 'up',
        entryPrice: 100,
        target: 110,
        stop: 95,
        holdingHorizonDays: 3,
        exitPrice: 105,
        exitReason: 'horizon-expired',
        shares: 1000,
        pnl: 5000,
        pnlPercent: 5,
        result: 'win',
        ...overrides,
    };
}

const TRADES: TradeRecord[] = [
    trade({}),
    trade({
        signalDate: '2024-02-01',
        direction: 'down',
        entryPrice: 50,
        exitPrice: 52,
        pnl: -2000,
        pnlPercent: -4,
        result: 'loss',
    }),
    trade({ signalDate: '2024-02-05', direction: 'sideways', pnl: 1000, pnlPercent: 1, result: 'win' }),
    trade({ strategy: 'beta', entryPrice: 20, exitPrice: 21, pnl: 1000, pnlPercent: 5 }),
];

describe('buildComparison', () => {
    const comparison = buildComparison(TRADES);

    it('ranks by return on capital', () => {
        expect(comparison.map(c => [c.rank, c.strategy])).toEqual([
            [1, 'beta'],
            [2, 'alpha'],
        ]);
    });

    it('aggregates directional trades only', () => {
        const alpha = comparison[1];
        expect(alpha).toMatchObject({
            totalTrades: 2,
            wins: 1,
            losses: 1,
            winRate: 50,
            totalCapital: 150000,
            totalPnl: 3000,
            returnOnCapital: 2,
            avgReturnPct: 0.5,
            avgPnlPerTrade: 1500,
            directionalAccuracy: 50,
            upSignals: 1,
            upCorrect: 1,
            upAccuracy: 100,
            downSignals: 1,
            downCorrect: 0,
            downAccuracy: 0,
        });
    });

    it('includes every trade in the monthly P&L', () => {
        expect(comparison[1].monthlyPnl).toEqual({ '2024-01': 5000, '2024-02': -1000 });
    });

    it('is empty without trades', () => {
        expect(buildComparison([])).toEqual([]);
    });
});

describe('monthlySummary', () => {
    it('groups one symbol/strategy by signal month', () => {
        expect(monthlySummary(TRADES, 'HPG', 'alpha')).toEqual([
            { month: '2024-01', trades: 1, wins: 1, pnl: 5000 },
            { month: '2024-02', trades: 2, wins: 1, pnl: -1000 },
        ]);
    });

    it('returns nothing for an unknown strategy', () => {
        expect(monthlySummary(TRADES, 'HPG', 'gamma')).toEqual([]);
    });
});

describe('evaluateStrategies', () => {
    it('simulates every strategy and compares them', () => {
        const bars = barsFromCloses(Array.from({ length: 70 }, (_, i) => 100 + (i % 3)));
        const fixed = (id: string, direction: 'up' | 'down'): TradingStrategy => ({
            id,
            generateSignal: (history: readonly Bar[]): TradeProposal => {
                const close = history[history.length - 1].close;
                const sign = direction === 'up' ? 1 : -1;
                return {
                    direction,
                    target: close + sign * 50,
                    stop: close - sign * 50,
                    rewardRiskRatio: 1,
                    holdingHorizonDays: 3,
                    rationale: id,
                };
            },
        });
        const strategies = [fixed('one', 'up'), fixed('two', 'down')];

        const { trades, comparison } = evaluateStrategies('HPG', bars, strategies, 100, TEST_OPTIONS);

        // lookback 60, 70 bars → days 60..68 for each strategy
        expect(trades).toHaveLength(18);
        expect(comparison.map(c => c.strategy).sort()).toEqual(['one', 'two']);
        expect(formatComparison(comparison)).toHaveLength(2);
    });
});
