// src/lib/services/evaluator.ts

/**
 * Strategy comparison over simulated trades.
 * - Per-strategy stats use directional trades only (sideways rows excluded)
 * - Monthly P&L is keyed by signal month (YYYY-MM) and includes every trade
 * - Ranking: return on capital, descending
 */
import type { Bar, TradeRecord } from '../../types';
import { config, type AnalysisConfig } from '../config/settings';
import { round2, roundTo } from '../indicators';
import { createLogger } from '../logger';
import type { TradingStrategy } from '../strategies/types';
import { simulate } from './simulation';

const logger = createLogger('evaluator');

export interface StrategyComparison {
    rank: number;
    strategy: string;
    totalTrades: number;
    wins: number;
    losses: number;
    winRate: number;                 // percent, 1 dp
    totalCapital: number;            // Σ entryPrice × shares
    totalPnl: number;
    returnOnCapital: number;         // percent, 2 dp
    avgReturnPct: number;            // mean pnlPercent, 2 dp
    avgPnlPerTrade: number;
    directionalAccuracy: number;     // percent, 1 dp
    upSignals: number;
    upCorrect: number;
    upAccuracy: number;
    downSignals: number;
    downCorrect: number;
    downAccuracy: number;
    monthlyPnl: Record<string, number>;
}

export interface MonthlyRow {
    month: string;
    trades: number;
    wins: number;
    pnl: number;
}

export interface EvaluationResult {
    trades: TradeRecord[];
    comparison: StrategyComparison[];
}

const pct1 = (part: number, total: number): number => (total > 0 ? roundTo((part / total) * 100, 1) : 0);

/**
 * Simulates every strategy on one symbol and ranks them.
 */
export function evaluateStrategies(
    symbol: string,
    bars: readonly Bar[],
    strategies: readonly TradingStrategy[],
    shares: number = config.simulation.shares,
    options: AnalysisConfig = config.analysis
): EvaluationResult {
    const trades: TradeRecord[] = [];
    for (const strategy of strategies) {
        logger.info(`Simulating ${symbol} / ${strategy.id} ...`);
        trades.push(...simulate(symbol, bars, strategy, shares, options));
    }

    if (trades.length === 0) {
        logger.warn(`No trades generated for ${symbol}`);
    }

    return { trades, comparison: buildComparison(trades) };
}

export function buildComparison(trades: readonly TradeRecord[]): StrategyComparison[] {
    const byStrategy = new Map<string, TradeRecord[]>();
    for (const t of trades) {
        const group = byStrategy.get(t.strategy) ?? [];
        group.push(t);
        byStrategy.set(t.strategy, group);
    }

    const rows: Omit<StrategyComparison, 'rank'>[] = [];

    for (const [strategy, group] of byStrategy) {
        const active = group.filter(t => t.direction !== 'sideways');
        const total = active.length;
        const wins = active.filter(t => t.result === 'win').length;
        const losses = active.filter(t => t.result === 'loss').length;
        const totalPnl = active.reduce((sum, t) => sum + t.pnl, 0);
        const totalCapital = active.reduce((sum, t) => sum + t.entryPrice * t.shares, 0);

        const ups = active.filter(t => t.direction === 'up');
        const downs = active.filter(t => t.direction === 'down');
        const upCorrect = ups.filter(t => t.exitPrice > t.entryPrice).length;
        const downCorrect = downs.filter(t => t.exitPrice < t.entryPrice).length;

        rows.push({
            strategy,
            totalTrades: total,
            wins,
            losses,
            winRate: pct1(wins, total),
            totalCapital: Math.round(totalCapital),
            totalPnl,
            returnOnCapital: totalCapital > 0 ? round2((totalPnl / totalCapital) * 100) : 0,
            avgReturnPct: total > 0 ? round2(active.reduce((sum, t) => sum + t.pnlPercent, 0) / total) : 0,
            avgPnlPerTrade: total > 0 ? Math.round(totalPnl / total) : 0,
            directionalAccuracy: pct1(upCorrect + downCorrect, ups.length + downs.length),
            upSignals: ups.length,
            upCorrect,
            upAccuracy: pct1(upCorrect, ups.length),
            downSignals: downs.length,
            downCorrect,
            downAccuracy: pct1(downCorrect, downs.length),
            monthlyPnl: monthlyPnl(group),
        });
    }

    return rows
        .sort((a, b) => b.returnOnCapital - a.returnOnCapital)
        .map((row, i) => ({ rank: i + 1, ...row }));
}

function monthlyPnl(trades: readonly TradeRecord[]): Record<string, number> {
    const out: Record<string, number> = {};
    for (const t of [...trades].sort((a, b) => a.signalDate.localeCompare(b.signalDate))) {
        const month = t.signalDate.slice(0, 7);
        out[month] = (out[month] ?? 0) + t.pnl;
    }
    return out;
}

/**
 * Month-by-month summary of one symbol/strategy, oldest first.
 */
export function monthlySummary(trades: readonly TradeRecord[], symbol: string, strategy: string): MonthlyRow[] {
    const rows = new Map<string, MonthlyRow>();
    for (const t of trades) {
        if (t.symbol !== symbol || t.strategy !== strategy) continue;
        const month = t.signalDate.slice(0, 7);
        const row = rows.get(month) ?? { month, trades: 0, wins: 0, pnl: 0 };
        row.trades++;
        if (t.result === 'win') row.wins++;
        row.pnl += t.pnl;
        rows.set(month, row);
    }
    return [...rows.values()].sort((a, b) => a.month.localeCompare(b.month));
}

/** One line per strategy, for the console ranking */
export function formatComparison(comparison: readonly StrategyComparison[]): string[] {
    return comparison.map(
        c =>
            `#${c.rank} ${c.strategy}: ${c.totalTrades} trades, win rate ${c.winRate}%, ` +
            `P&L ${c.totalPnl} on ${c.totalCapital} (${c.returnOnCapital}%), ` +
            `direction ${c.directionalAccuracy}% (up ${c.upCorrect}/${c.upSignals}, down ${c.downCorrect}/${c.downSignals})`
    );
}
