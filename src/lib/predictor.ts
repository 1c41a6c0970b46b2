// src/lib/predictor.ts
// =============================================================================
// SNAPSHOT PREDICTOR
// Reads one FeatureSnapshot into a trend call with target / stop:
//   up       : above SMA + volume spike + at Fibonacci support
//   down     : below SMA + at Fibonacci resistance
//   sideways : anything else, bounded by the nearest levels
// Pure; no strategy state, no history beyond the snapshot.
// =============================================================================

import type { Direction, FeatureSnapshot, Prediction } from '../types';
import { round2, roundTo } from './indicators';

const UP_TARGET_RATIO = 0.236;
const UP_FALLBACK_RATIO = 0;
const DOWN_TARGET_RATIO = 0.618;
const DOWN_FALLBACK_RATIO = 1;
const SWING_STOP_MARGIN = 0.02;         // ← stop 2% beyond the swing extreme
const NEUTRAL_SUCCESS_RATE = 50;

export function predict(snapshot: FeatureSnapshot): Prediction {
    const trend = classifyTrend(snapshot);
    const { close } = snapshot;

    let target: number;
    let stop: number;
    if (trend === 'up') {
        const raw = levelAt(snapshot, UP_TARGET_RATIO);
        target = raw > close ? raw : levelAt(snapshot, UP_FALLBACK_RATIO);
        stop = snapshot.swingLow * (1 - SWING_STOP_MARGIN);
    } else if (trend === 'down') {
        const raw = levelAt(snapshot, DOWN_TARGET_RATIO);
        target = raw < close ? raw : levelAt(snapshot, DOWN_FALLBACK_RATIO);
        stop = snapshot.swingHigh * (1 + SWING_STOP_MARGIN);
    } else {
        target = snapshot.nearestResistance;
        stop = snapshot.nearestSupport;
    }
    target = round2(target);
    stop = round2(stop);

    const risk = Math.abs(close - stop);
    const rewardRiskRatio = risk > 0 ? round2(Math.abs(target - close) / risk) : 0;

    return {
        trend,
        target,
        stop,
        rewardRiskRatio,
        successRate: impliedSuccessRate(rewardRiskRatio),
        rationale: buildRationale(trend, snapshot),
    };
}

export function classifyTrend(snapshot: FeatureSnapshot): Direction {
    if (snapshot.priceVsSma === 'above' && snapshot.volumeSpike && snapshot.atFibSupport) return 'up';
    if (snapshot.priceVsSma === 'below' && snapshot.atFibResistance) return 'down';
    return 'sideways';
}

/** 1 − breakeven win rate for the ratio, percent (1 dp); 50 when there is no ratio */
export function impliedSuccessRate(rewardRiskRatio: number): number {
    if (!(rewardRiskRatio > 0)) return NEUTRAL_SUCCESS_RATE;
    return roundTo((1 - 1 / (1 + rewardRiskRatio)) * 100, 1);
}

/** Level price for `ratio`, or the close when that ratio is not configured */
function levelAt(snapshot: FeatureSnapshot, ratio: number): number {
    return snapshot.fibLevels.find(l => l.ratio === ratio)?.price ?? snapshot.close;
}

function buildRationale(trend: Direction, s: FeatureSnapshot): string {
    const parts: string[] = [];

    if (s.sma !== null && s.priceVsSma !== 'unknown') {
        parts.push(`Close ${s.close.toFixed(2)} is ${s.priceVsSma} the SMA (${s.sma.toFixed(2)}).`);
    }

    parts.push(s.volumeSpike ? 'Volume spike above the average.' : 'Volume is normal.');

    if (trend === 'up') {
        parts.push(`Bouncing off Fibonacci support ${s.nearestSupport.toFixed(2)}.`);
    } else if (trend === 'down') {
        parts.push(`Rejected at Fibonacci resistance ${s.nearestResistance.toFixed(2)}.`);
    } else {
        parts.push(
            `Ranging between support ${s.nearestSupport.toFixed(2)} and resistance ${s.nearestResistance.toFixed(2)}.`
        );
    }

    return parts.join(' ');
}
