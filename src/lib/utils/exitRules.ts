// src/lib/utils/exitRules.ts
// =============================================================================
// EXIT RULES – one implementation for both the simulator and the live tracker
//
// Per bar:
//   up / sideways : high >= target → target-hit, else low <= stop → stop-hit
//   down          : low <= target  → target-hit, else high >= stop → stop-hit
// Target is always checked before stop, so a bar touching both resolves to
// target-hit. Sideways proposals are treated as long.
// =============================================================================

import type { Direction, ExitBar, ExitReason, TradeResult } from '../../types';

export interface ExitDecision {
    price: number;
    reason: ExitReason;
}

export function evaluateExit(
    direction: Direction,
    target: number,
    stop: number,
    bar: ExitBar
): ExitDecision | null {
    if (direction === 'down') {
        if (bar.low <= target) return { price: target, reason: 'target-hit' };
        if (bar.high >= stop) return { price: stop, reason: 'stop-hit' };
        return null;
    }

    if (bar.high >= target) return { price: target, reason: 'target-hit' };
    if (bar.low <= stop) return { price: stop, reason: 'stop-hit' };
    return null;
}

/** Horizon expiry exits at the bar's close */
export function horizonExit(bar: ExitBar): ExitDecision {
    return { price: bar.close, reason: 'horizon-expired' };
}

/** Per-share profit: short for 'down', long otherwise */
export function pnlPerShare(direction: Direction, entryPrice: number, exitPrice: number): number {
    return direction === 'down' ? entryPrice - exitPrice : exitPrice - entryPrice;
}

/** Unrounded P&L as a percentage of entry price */
export function computePnlPercent(direction: Direction, entryPrice: number, exitPrice: number): number {
    return (pnlPerShare(direction, entryPrice, exitPrice) / entryPrice) * 100;
}

export function classifyResult(pnl: number): TradeResult {
    if (pnl > 0) return 'win';
    if (pnl < 0) return 'loss';
    return 'breakeven';
}

export function clampHorizon(days: number, min: number, max: number): number {
    const whole = Number.isFinite(days) ? Math.trunc(days) : min;
    return Math.max(min, Math.min(max, whole));
}
