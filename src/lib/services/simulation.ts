// src/lib/services/simulation.ts

/**
 * Walk-forward simulation of one strategy over one symbol's daily bars.
 * - Signal on day d sees bars[0..d] only (prefix slice, no lookahead)
 * - Entry at the open of day d+1
 * - Exits checked on days d+2 .. d+1+h, target before stop on every bar
 * - Horizon expiry closes at the close of the last bar in the window,
 *   or at the last available bar when the series ends first
 * - Overlapping trades are allowed: every signal day is simulated on its own
 */
import type { Bar, TradeProposal, TradeRecord } from '../../types';
import { config, type AnalysisConfig } from '../config/settings';
import { errorMessage, isValidProposal } from '../errors';
import { round2 } from '../indicators';
import { createLogger } from '../logger';
import type { TradingStrategy } from '../strategies/types';
import {
    classifyResult,
    clampHorizon,
    evaluateExit,
    horizonExit,
    pnlPerShare,
    type ExitDecision,
} from '../utils/exitRules';

const logger = createLogger('simulation');

export interface SimulationSummary {
    symbol: string;
    strategy: string;
    trades: number;
    wins: number;
    losses: number;
    winRate: number;       // percent, 2 dp
    totalPnl: number;
}

export function simulate(
    symbol: string,
    bars: readonly Bar[],
    strategy: TradingStrategy,
    shares: number = config.simulation.shares,
    options: AnalysisConfig = config.analysis
): TradeRecord[] {
    const n = bars.length;
    const records: TradeRecord[] = [];
    let skipped = 0;

    // Need at least the lookback plus an entry bar
    for (let d = options.simulationMinLookback; d <= n - 2; d++) {
        const history = bars.slice(0, d + 1);

        let proposal: TradeProposal;
        try {
            proposal = strategy.generateSignal(history);
        } catch (err) {
            logger.debug(`${symbol} ${bars[d].date}: ${strategy.id} raised, day skipped`, { error: errorMessage(err) });
            skipped++;
            continue;
        }

        if (!isValidProposal(proposal)) {
            skipped++;
            continue;
        }

        const entryBar = bars[d + 1];
        const entryPrice = entryBar.open;
        if (!(entryPrice > 0)) {
            skipped++;
            continue;
        }

        const horizon = clampHorizon(proposal.holdingHorizonDays, options.tPlusMin, options.tPlusMax);
        const lastIdx = Math.min(d + 1 + horizon, n - 1);

        let exit: ExitDecision | null = null;
        let exitIdx = lastIdx;
        for (let i = d + 2; i <= lastIdx; i++) {
            exit = evaluateExit(proposal.direction, proposal.target, proposal.stop, bars[i]);
            if (exit) {
                exitIdx = i;
                break;
            }
        }
        if (!exit) {
            exit = horizonExit(bars[lastIdx]);
        }

        const perShare = pnlPerShare(proposal.direction, entryPrice, exit.price);
        const rawPnl = shares * perShare;
        const pnl = Math.round(rawPnl);

        records.push({
            symbol,
            strategy: strategy.id,
            signalDate: bars[d].date,
            entryDate: entryBar.date,
            exitDate: bars[exitIdx].date,
            direction: proposal.direction,
            entryPrice: round2(entryPrice),
            target: round2(proposal.target),
            stop: round2(proposal.stop),
            holdingHorizonDays: horizon,
            exitPrice: round2(exit.price),
            exitReason: exit.reason,
            shares,
            pnl,
            pnlPercent: round2((perShare / entryPrice) * 100),
            result: classifyResult(rawPnl),     // ← sign of the unrounded P&L
        });
    }

    const summary = summarizeTrades(symbol, strategy.id, records);
    logger.info(
        `${symbol} ${strategy.id}: ${summary.trades} trades, win rate ${summary.winRate}%, P&L ${summary.totalPnl}`,
        { skipped }
    );

    return records;
}

export function summarizeTrades(symbol: string, strategy: string, records: readonly TradeRecord[]): SimulationSummary {
    const wins = records.filter(r => r.result === 'win').length;
    const losses = records.filter(r => r.result === 'loss').length;
    return {
        symbol,
        strategy,
        trades: records.length,
        wins,
        losses,
        winRate: records.length > 0 ? round2((wins / records.length) * 100) : 0,
        totalPnl: records.reduce((sum, r) => sum + r.pnl, 0),
    };
}
