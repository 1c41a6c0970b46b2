// src/lib/dailyRun.ts
// =============================================================================
// END-OF-DAY RUNNER
// Per symbol, isolated from the others:
//   1. load stored bars, keep those dated <= today
//   2. apply the latest bar to live positions (pending → open → closed)
//   3. read the feature snapshot into a prediction
//   4. ask every strategy for a proposal, record directional ones
// After the loop the tracker is saved once.
// =============================================================================

import type { Bar, FeatureSnapshot, IsoDate, Position, Prediction, TradeProposal } from '../types';
import { config, type AnalysisConfig } from './config/settings';
import { errorMessage } from './errors';
import { tryComputeFeatures } from './features';
import { createLogger } from './logger';
import { predict } from './predictor';
import { barsUpTo, validateBars } from './services/barHistory';
import type { PositionTracker } from './services/positionTracker';
import { ALL_STRATEGIES, type TradingStrategy } from './strategies';

const logger = createLogger('dailyRun');

/** Where stored daily bars come from (dbService in production) */
export interface BarSource {
    getBars(symbol: string): Promise<Bar[]>;
}

export interface DailyRunParams {
    today: IsoDate;
    symbols: readonly string[];
    barSource: BarSource;
    tracker: PositionTracker;
    strategies?: readonly TradingStrategy[];
    options?: AnalysisConfig;
}

export interface SignalEntry {
    symbol: string;
    strategy: string;
    signalDate: IsoDate;
    proposal: TradeProposal;
    tracked: boolean;
}

export interface DailyRunSummary {
    date: IsoDate;
    signals: SignalEntry[];
    /** "SYMBOL(strategy)" labels */
    upSignals: string[];
    downSignals: string[];
    closed: Position[];
    failedSymbols: string[];
    features: Record<string, FeatureSnapshot>;
    predictions: Record<string, Prediction>;
}

export async function runDaily(params: DailyRunParams): Promise<DailyRunSummary> {
    const { today, symbols, barSource, tracker } = params;
    const strategies = params.strategies ?? ALL_STRATEGIES;
    const options = params.options ?? config.analysis;

    const summary: DailyRunSummary = {
        date: today,
        signals: [],
        upSignals: [],
        downSignals: [],
        closed: [],
        failedSymbols: [],
        features: {},
        predictions: {},
    };

    logger.info(`=== Daily run: ${today} (${symbols.length} symbols) ===`);

    for (const symbol of symbols) {
        try {
            const stored = validateBars(symbol, await barSource.getBars(symbol));
            const history = barsUpTo(stored, today);
            if (history.length === 0) {
                logger.warn(`${symbol}: no data available, skipping.`);
                continue;
            }

            const bar = history[history.length - 1];
            if (bar.date !== today) {
                logger.warn(`${symbol}: today (${today}) not in data, using last available bar (${bar.date})`);
            }
            const asOf = bar.date;

            summary.closed.push(...tracker.updatePositions(asOf, symbol, bar));

            const features = tryComputeFeatures(history, options);
            if (features.ok) {
                summary.features[symbol] = features.snapshot;
                summary.predictions[symbol] = predict(features.snapshot);
            }

            for (const strategy of strategies) {
                try {
                    const proposal = strategy.generateSignal(history);
                    const tracked = tracker.addSignal(symbol, strategy.id, asOf, proposal, bar.close);
                    summary.signals.push({ symbol, strategy: strategy.id, signalDate: asOf, proposal, tracked });

                    const label = `${symbol}(${strategy.id})`;
                    if (proposal.direction === 'up') summary.upSignals.push(label);
                    if (proposal.direction === 'down') summary.downSignals.push(label);
                } catch (err) {
                    logger.error(`${symbol}/${strategy.id}: signal generation failed`, { error: errorMessage(err) });
                }
            }
        } catch (err) {
            summary.failedSymbols.push(symbol);
            logger.error(`${symbol}: processing failed`, { error: errorMessage(err) });
        }
    }

    await tracker.save();

    logger.info(
        `Daily run complete: ${summary.upSignals.length} up, ${summary.downSignals.length} down, ` +
            `${summary.closed.length} closed, ${summary.failedSymbols.length} failed`
    );

    return summary;
}
