// src/lib/strategies/types.ts
import type { Bar, TradeProposal } from '../../types';

/**
 * Capability every strategy variant provides.
 *
 * `history` ends at the evaluation day (inclusive). Implementations read only
 * what they are given and never mutate it – callers rely on this for
 * no-lookahead simulation.
 */
export interface TradingStrategy {
    /** Stable identifier, persisted with positions and trade records */
    readonly id: string;
    generateSignal(history: readonly Bar[]): TradeProposal;
}
