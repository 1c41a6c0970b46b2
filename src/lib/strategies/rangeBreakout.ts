// src/lib/strategies/rangeBreakout.ts
// ---------------------------------------------------------------
// RANGE-BREAKOUT STRATEGY: N-day high/low breakout + volume confirmation
//
//   up   : close >= max(high of previous N bars), volume >= 1.5× SMA20,
//          SMA20 rising over 5 bars
//   down : close <= min(low of previous N bars),  volume >= 1.5× SMA20,
//          SMA20 falling over 5 bars
//
// Fixed offsets: +7% / −3% (mirrored for down) → reward:risk 2.33
// ---------------------------------------------------------------

import type { Bar, TradeProposal } from '../../types';
import { config, type AnalysisConfig } from '../config/settings';
import { calculateSMA, highest, lowest, round2, valueAt } from '../indicators';
import { recommendHoldingHorizon } from './holdingHorizon';
import type { TradingStrategy } from './types';

const N_PERIOD = 20;          // ← lookback for the breakout level, excludes today
const VOLUME_PERIOD = 20;
const VOL_RATIO = 1.5;
const TREND_PERIOD = 20;
const TREND_SLOPE_BARS = 5;
const TP_PCT = 0.07;
const SL_PCT = 0.03;

export class RangeBreakoutStrategy implements TradingStrategy {
    readonly id = 'range-breakout';

    constructor(private readonly options: AnalysisConfig = config.analysis) {}

    generateSignal(history: readonly Bar[]): TradeProposal {
        const entry = history[history.length - 1].close;

        if (history.length < N_PERIOD + TREND_SLOPE_BARS) {
            return this._neutral(entry);
        }

        const prior = history.slice(-(N_PERIOD + 1), -1);
        const resistance = highest(prior.map(b => b.high));
        const support = lowest(prior.map(b => b.low));

        const volumes = history.map(b => b.volume);
        const volSma = valueAt(calculateSMA(volumes, VOLUME_PERIOD));
        const curVol = volumes[volumes.length - 1];
        if (volSma === undefined || volSma <= 0) {
            return this._neutral(entry);
        }
        const volumeOk = curVol >= volSma * VOL_RATIO;

        const sma20 = calculateSMA(history.map(b => b.close), TREND_PERIOD);
        const smaNow = valueAt(sma20);
        const smaBefore = valueAt(sma20, TREND_SLOPE_BARS);
        if (smaNow === undefined || smaBefore === undefined) {
            return this._neutral(entry);
        }

        const rewardRiskRatio = round2(TP_PCT / SL_PCT);
        const volumeSpike = curVol >= volSma * this.options.volumeSpikeRatio;
        const holdingHorizonDays = recommendHoldingHorizon(rewardRiskRatio, volumeSpike, this.options);
        const volMultiple = (curVol / volSma).toFixed(1);

        if (entry >= resistance && volumeOk && smaNow > smaBefore) {
            const target = round2(entry * (1 + TP_PCT));
            return {
                direction: 'up',
                target,
                stop: round2(entry * (1 - SL_PCT)),
                rewardRiskRatio,
                holdingHorizonDays,
                rationale:
                    `Close ${entry.toFixed(2)} broke the ${N_PERIOD}-day resistance ${resistance.toFixed(2)}. ` +
                    `Volume ${curVol.toFixed(0)} = ${volMultiple}× SMA20 confirms buying. ` +
                    `SMA20 rising (${smaBefore.toFixed(2)} → ${smaNow.toFixed(2)}). ` +
                    `Expect +${(TP_PCT * 100).toFixed(0)}% to ${target.toFixed(2)}.`,
            };
        }

        if (entry <= support && volumeOk && smaNow < smaBefore) {
            const target = round2(entry * (1 - TP_PCT));
            return {
                direction: 'down',
                target,
                stop: round2(entry * (1 + SL_PCT)),
                rewardRiskRatio,
                holdingHorizonDays,
                rationale:
                    `Close ${entry.toFixed(2)} broke the ${N_PERIOD}-day support ${support.toFixed(2)}. ` +
                    `Volume ${curVol.toFixed(0)} = ${volMultiple}× SMA20 confirms selling. ` +
                    `SMA20 falling (${smaBefore.toFixed(2)} → ${smaNow.toFixed(2)}). ` +
                    `Expect −${(TP_PCT * 100).toFixed(0)}% to ${target.toFixed(2)}.`,
            };
        }

        return this._neutral(entry);
    }

    private _neutral(entry: number): TradeProposal {
        return {
            direction: 'sideways',
            target: round2(entry * (1 + TP_PCT)),
            stop: round2(entry * (1 - SL_PCT)),
            rewardRiskRatio: round2(TP_PCT / SL_PCT),
            holdingHorizonDays: this.options.tPlusMax,
            rationale: `No confirmed breakout of the ${N_PERIOD}-day range on strong volume.`,
        };
    }
}
