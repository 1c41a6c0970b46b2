// src/lib/errors.ts
// =============================================================================
// ERROR TAXONOMY
//   • InsufficientDataError   – fewer bars than a computation needs
//   • DatabaseNotInitializedError – db access before dbService.initialize()
//   • OutOfOrderUpdateError   – a symbol's bar arrives older than the last applied
// Invalid proposals and duplicate signals are normal return values, not errors.
// =============================================================================

import type { TradeProposal } from '../types';

export class InsufficientDataError extends Error {
    readonly required: number;
    readonly actual: number;

    constructor(required: number, actual: number, what = 'bars') {
        super(`Insufficient data: need at least ${required} ${what}, got ${actual}`);
        this.name = 'InsufficientDataError';
        this.required = required;
        this.actual = actual;
    }
}

export class DatabaseNotInitializedError extends Error {
    constructor() {
        super('Database not initialized. You must call dbService.initialize() first.');
        this.name = 'DatabaseNotInitializedError';
    }
}

export class OutOfOrderUpdateError extends Error {
    constructor(symbol: string, date: string, lastApplied: string) {
        super(`${symbol}: update for ${date} is older than last applied ${lastApplied}`);
        this.name = 'OutOfOrderUpdateError';
    }
}

/**
 * A proposal is usable only when both boundaries are finite numbers.
 */
export function isValidProposal(proposal: Pick<TradeProposal, 'target' | 'stop'>): boolean {
    return Number.isFinite(proposal.target) && Number.isFinite(proposal.stop);
}

/** Message of anything thrown, for log metadata */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
