// src/types/index.ts
// =============================================================================
// CORE TYPE DEFINITIONS – SHARED BY EVERY MODULE
// Imported by: features, strategies, simulation, positionTracker, db, dailyRun
// Dates are ISO calendar days ('YYYY-MM-DD'); one bar = one trading day.
// =============================================================================

/** ISO calendar date, e.g. '2024-01-10' */
export type IsoDate = string;

/**
 * One trading day of price data.
 * Sequences are strictly ascending by date with no duplicates.
 */
export interface Bar {
    date: IsoDate;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/** Intraday extremes and close – all the exit rules ever look at */
export type ExitBar = Pick<Bar, 'high' | 'low' | 'close'>;

/** Directional call of a proposal. 'sideways' = no signal today */
export type Direction = 'up' | 'down' | 'sideways';

/** Only directional proposals become live positions */
export type TradeDirection = Exclude<Direction, 'sideways'>;

export type PriceVsSma = 'above' | 'below' | 'unknown';

/** Which attempt of the swing fallback chain produced the pair */
export type SwingMethod = 'primary-window' | 'fallback-window' | 'rolling-extremes';

/** One retracement ratio and its derived price */
export interface FibLevel {
    ratio: number;
    price: number;
}

/**
 * Technical snapshot of a series as of its last bar.
 * Recomputed on every call, never mutated.
 */
export interface FeatureSnapshot {
    date: IsoDate;
    close: number;
    /** Percent change vs. prior close (2 dp) */
    pctChange: number;

    sma: number | null;
    priceVsSma: PriceVsSma;

    volume: number;
    volumeSma: number | null;
    volumeSpike: boolean;

    swingHigh: number;
    swingLow: number;
    swingMethod: SwingMethod;

    fibLevels: FibLevel[];
    nearestSupport: number;
    nearestResistance: number;
    atFibSupport: boolean;
    atFibResistance: boolean;
}

/**
 * Output of TradingStrategy.generateSignal()
 *
 * up   : target > reference close > stop
 * down : target < reference close < stop
 * sideways : neutral default band, never traded live
 */
export interface TradeProposal {
    direction: Direction;
    target: number;
    stop: number;
    rewardRiskRatio: number;
    /** Recommended holding horizon in trading days */
    holdingHorizonDays: number;
    rationale: string;
}

/**
 * Read of a single feature snapshot (see lib/predictor).
 * successRate is the win rate implied by the reward:risk ratio, in percent.
 */
export interface Prediction {
    trend: Direction;
    target: number;
    stop: number;
    rewardRiskRatio: number;
    successRate: number;
    rationale: string;
}

export type ExitReason = 'target-hit' | 'stop-hit' | 'horizon-expired';

export type TradeResult = 'win' | 'loss' | 'breakeven';

/**
 * One simulated trade. Immutable once produced by the simulation engine.
 */
export interface TradeRecord {
    symbol: string;
    strategy: string;
    signalDate: IsoDate;
    entryDate: IsoDate;
    exitDate: IsoDate;
    direction: Direction;
    entryPrice: number;
    target: number;
    stop: number;
    holdingHorizonDays: number;
    exitPrice: number;
    exitReason: ExitReason;
    shares: number;
    /** Absolute P&L, rounded to whole currency units */
    pnl: number;
    /** P&L as % of entry price (2 dp) */
    pnlPercent: number;
    result: TradeResult;
}

export type PositionStatus = 'pending' | 'open' | 'closed';

/**
 * Live-tracked proposal. Identity = (symbol, strategy, signalDate).
 * Also the persisted row shape.
 */
export interface Position {
    symbol: string;
    strategy: string;
    signalDate: IsoDate;
    direction: TradeDirection;
    recommendedEntry: number;
    target: number;
    stop: number;
    holdingHorizonDays: number;
    entryDate: IsoDate;
    entryPrice: number | null;
    expectedExitDate: IsoDate;
    exitDate: IsoDate | null;
    exitPrice: number | null;
    exitReason: ExitReason | null;
    pnlPercent: number | null;
    status: PositionStatus;
}
