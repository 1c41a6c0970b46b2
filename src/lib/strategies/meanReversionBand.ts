// src/lib/strategies/meanReversionBand.ts
// ---------------------------------------------------------------
// MEAN-REVERSION BAND STRATEGY: Bollinger(20, 2σ) touch-then-reclaim
//
// Anti-whipsaw filters (all must pass, else neutral):
//   1. Confirmation : previous bar's extreme pierced the band, today's
//                     close is back inside
//   2. Capitulation : touch-bar volume >= its own 20-bar average
//   3. Bandwidth    : (upper − lower) / middle >= 3%
//   4. SMA50 filter : up only if SMA50 flat/rising over 5 bars,
//                     down only if flat/falling
//
// Target = middle band. Stop = outer band ∓ 1.5%.
// ---------------------------------------------------------------

import type { Bar, TradeProposal } from '../../types';
import { config, type AnalysisConfig } from '../config/settings';
import { tryComputeFeatures } from '../features';
import { calculateBollingerBands, calculateSMA, round2, valueAt } from '../indicators';
import { recommendHoldingHorizon } from './holdingHorizon';
import type { TradingStrategy } from './types';

const BB_PERIOD = 20;
const BB_STD = 2;
const MIN_BARS = 52;                        // ← max(BB_PERIOD + 2, SMA50 + 2)
const MIN_BANDWIDTH = 0.03;
const TREND_PERIOD = 50;
const TREND_SLOPE_BARS = 5;
const VOLUME_PERIOD = 20;
const CAPITULATION_VOLUME_RATIO = 1.0;      // ← distinct from the 1.2× headline spike
const STOP_MARGIN = 0.015;
const NEUTRAL_TARGET_PCT = 0.02;
const NEUTRAL_STOP_PCT = 0.01;

export class MeanReversionBandStrategy implements TradingStrategy {
    readonly id = 'mean-reversion-band';

    constructor(private readonly options: AnalysisConfig = config.analysis) {}

    generateSignal(history: readonly Bar[]): TradeProposal {
        const closes = history.map(b => b.close);
        const entry = closes[closes.length - 1];

        if (history.length < MIN_BARS) {
            return this._neutral(entry);
        }

        const bands = calculateBollingerBands(closes, BB_PERIOD, BB_STD);
        const current = bands[bands.length - 1];
        const previous = bands[bands.length - 2];
        if (!current || !previous) {
            return this._neutral(entry);
        }
        const { middle, upper, lower } = current;

        // Filter 3: bands wide enough for a move back to the middle
        const bandwidth = middle > 0 ? (upper - lower) / middle : 0;
        if (bandwidth < MIN_BANDWIDTH) {
            return this._neutral(entry);
        }

        // Filter 4: SMA50 direction over the last week
        const sma50 = calculateSMA(closes, TREND_PERIOD);
        const sma50Now = valueAt(sma50);
        const sma50Before = valueAt(sma50, TREND_SLOPE_BARS);
        if (sma50Now === undefined || sma50Before === undefined) {
            return this._neutral(entry);
        }
        const trendUp = sma50Now >= sma50Before;
        const trendDown = sma50Now <= sma50Before;

        // Filter 1: touch bar (d-1) pierced, confirmation bar (d) closed inside
        const touch = history[history.length - 2];
        const upConfirmed = touch.low <= previous.lower && entry > lower;
        const downConfirmed = touch.high >= previous.upper && entry < upper;

        // Filter 2: capitulation volume on the touch bar
        const volumeOk = this._isCapitulationVolume(history);

        let proposal: Omit<TradeProposal, 'rewardRiskRatio' | 'holdingHorizonDays'> | null = null;

        if (upConfirmed && trendUp && volumeOk) {
            proposal = {
                direction: 'up',
                target: round2(middle),
                stop: round2(lower * (1 - STOP_MARGIN)),
                rationale:
                    `Band reclaim: intraday low ${touch.low.toFixed(2)} pierced the lower band ` +
                    `${previous.lower.toFixed(2)}, close ${entry.toFixed(2)} is back inside. ` +
                    `High touch-bar volume. Bandwidth ${(bandwidth * 100).toFixed(1)}%. ` +
                    `SMA50 rising (${sma50Before.toFixed(2)} → ${sma50Now.toFixed(2)}). ` +
                    `Expect reversion to the middle band ${middle.toFixed(2)}.`,
            };
        } else if (downConfirmed && trendDown && volumeOk) {
            proposal = {
                direction: 'down',
                target: round2(middle),
                stop: round2(upper * (1 + STOP_MARGIN)),
                rationale:
                    `Band rejection: intraday high ${touch.high.toFixed(2)} pierced the upper band ` +
                    `${previous.upper.toFixed(2)}, close ${entry.toFixed(2)} is back inside. ` +
                    `High touch-bar volume. Bandwidth ${(bandwidth * 100).toFixed(1)}%. ` +
                    `SMA50 falling (${sma50Before.toFixed(2)} → ${sma50Now.toFixed(2)}). ` +
                    `Expect reversion to the middle band ${middle.toFixed(2)}.`,
            };
        }

        // Target must sit on the far side of the close from the stop
        if (
            !proposal ||
            (proposal.direction === 'up' && proposal.target <= entry) ||
            (proposal.direction === 'down' && proposal.target >= entry)
        ) {
            return this._neutral(entry);
        }

        const risk = Math.abs(entry - proposal.stop);
        const rewardRiskRatio = risk > 0 ? round2(Math.abs(proposal.target - entry) / risk) : 0;
        const features = tryComputeFeatures(history, this.options);
        const volumeSpike = features.ok && features.snapshot.volumeSpike;

        return {
            ...proposal,
            rewardRiskRatio,
            holdingHorizonDays: recommendHoldingHorizon(rewardRiskRatio, volumeSpike, this.options),
        };
    }

    /** Touch-bar volume >= its 20-bar average; passes when there is too little history to judge */
    private _isCapitulationVolume(history: readonly Bar[]): boolean {
        if (history.length < VOLUME_PERIOD + 2) return true;
        const volumes = history.map(b => b.volume);
        const avgAtTouch = valueAt(calculateSMA(volumes, VOLUME_PERIOD), 1);
        if (avgAtTouch === undefined || avgAtTouch <= 0) return true;
        return volumes[volumes.length - 2] >= avgAtTouch * CAPITULATION_VOLUME_RATIO;
    }

    private _neutral(entry: number): TradeProposal {
        const target = round2(entry * (1 + NEUTRAL_TARGET_PCT));
        const stop = round2(entry * (1 - NEUTRAL_STOP_PCT));
        const risk = Math.abs(entry - stop);
        return {
            direction: 'sideways',
            target,
            stop,
            rewardRiskRatio: risk > 0 ? round2(Math.abs(target - entry) / risk) : 0,
            holdingHorizonDays: this.options.tPlusMax,
            rationale: 'Price is inside the bands with no confirmed reclaim; no signal.',
        };
    }
}
