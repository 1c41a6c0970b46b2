// src/lib/services/positionTracker.ts
// =============================================================================
// POSITION LIFECYCLE TRACKER
//
//   pending --[entry day reached]--> open --[target | stop | horizon]--> closed
//
// Owns the working set of live positions between load() and save().
// One tracker per run; callers hold the instance, nothing is module-global.
// Exits use the same rules as the simulation engine (utils/exitRules).
// =============================================================================

import { z } from 'zod';
import type { Bar, IsoDate, Position, TradeProposal } from '../../types';
import { config, type AnalysisConfig } from '../config/settings';
import { errorMessage, isValidProposal, OutOfOrderUpdateError } from '../errors';
import { round2, roundTo } from '../indicators';
import { createLogger } from '../logger';
import { clampHorizon, computePnlPercent, evaluateExit, horizonExit } from '../utils/exitRules';
import { addTradingDays, isIsoDate, nextTradingDate } from '../utils/tradingCalendar';

const logger = createLogger('positions');

const ENTRY_PREMIUM = 0.001;        // ← recommended entry = reference close ± 0.1%
const PNL_DECIMALS = 4;

export type DailyBar = Pick<Bar, 'open' | 'high' | 'low' | 'close'>;

// ---------------------------------------------------------------------------
// Persistence contract
// ---------------------------------------------------------------------------

/**
 * Storage behind the tracker. Rows come back untyped and are validated here,
 * so a store only moves data.
 */
export interface PositionRepository {
    loadRows(): Promise<readonly unknown[]>;
    saveAll(positions: readonly Position[]): Promise<void>;
}

const isoDate = z.string().refine(isIsoDate, { message: 'expected YYYY-MM-DD' });
const price = z.coerce.number().finite();

export const PositionRowSchema = z
    .object({
        symbol: z.string().min(1),
        strategy: z.string().min(1),
        signalDate: isoDate,
        direction: z.enum(['up', 'down']),
        recommendedEntry: price,
        target: price,
        stop: price,
        holdingHorizonDays: z.coerce.number().int().positive(),
        entryDate: isoDate,
        entryPrice: price.nullable(),
        expectedExitDate: isoDate,
        exitDate: isoDate.nullable(),
        exitPrice: price.nullable(),
        exitReason: z.enum(['target-hit', 'stop-hit', 'horizon-expired']).nullable(),
        pnlPercent: price.nullable(),
        status: z.enum(['pending', 'open', 'closed']),
    })
    .refine(p => p.status === 'pending' || p.entryPrice !== null, {
        message: 'open/closed position without an entry price',
        path: ['entryPrice'],
    })
    .refine(p => p.status !== 'closed' || (p.exitDate !== null && p.exitPrice !== null && p.exitReason !== null), {
        message: 'closed position without exit details',
        path: ['exitDate'],
    });

export class InMemoryPositionRepository implements PositionRepository {
    private rows: unknown[];

    constructor(rows: readonly unknown[] = []) {
        this.rows = [...rows];
    }

    async loadRows(): Promise<readonly unknown[]> {
        return this.rows.map(r => (typeof r === 'object' && r !== null ? { ...r } : r));
    }

    async saveAll(positions: readonly Position[]): Promise<void> {
        this.rows = positions.map(p => ({ ...p }));
    }
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

function positionKey(symbol: string, strategy: string, signalDate: IsoDate): string {
    return `${symbol}|${strategy}|${signalDate}`;
}

export class PositionTracker {
    private readonly positions = new Map<string, Position>();
    private readonly lastApplied = new Map<string, IsoDate>();

    constructor(
        private readonly repository: PositionRepository = new InMemoryPositionRepository(),
        private readonly options: AnalysisConfig = config.analysis
    ) {}

    /**
     * Replaces the working set with the stored rows.
     * Rows that fail validation are logged and skipped.
     * @returns number of positions loaded
     */
    async load(): Promise<number> {
        const rows = await this.repository.loadRows();
        this.positions.clear();
        this.lastApplied.clear();

        let skipped = 0;
        for (const row of rows) {
            const parsed = PositionRowSchema.safeParse(row);
            if (!parsed.success) {
                skipped++;
                logger.warn('Skipping malformed position row', { issues: parsed.error.issues.map(i => i.message) });
                continue;
            }
            const p = parsed.data;
            this.positions.set(positionKey(p.symbol, p.strategy, p.signalDate), p);
        }

        logger.info(`Loaded ${this.positions.size} positions`, { skipped });
        return this.positions.size;
    }

    async save(): Promise<void> {
        const all = this.getAllPositions();
        await this.repository.saveAll(all);
        logger.info(`Positions saved: ${all.length} rows`);
    }

    /**
     * Records a directional proposal as a pending position.
     * @returns false when ignored (sideways, invalid, or already tracked)
     */
    addSignal(
        symbol: string,
        strategyId: string,
        signalDate: IsoDate,
        proposal: TradeProposal,
        referenceClose: number
    ): boolean {
        if (proposal.direction === 'sideways') return false;
        if (!isValidProposal(proposal)) {
            logger.debug(`Invalid proposal ignored: ${symbol}/${strategyId}/${signalDate}`);
            return false;
        }

        const key = positionKey(symbol, strategyId, signalDate);
        if (this.positions.has(key)) {
            logger.debug(`Duplicate signal skipped: ${symbol}/${strategyId}/${signalDate}`);
            return false;
        }

        const entryDate = nextTradingDate(signalDate);
        // Same whole-day window the simulator uses
        const horizon = clampHorizon(proposal.holdingHorizonDays, this.options.tPlusMin, this.options.tPlusMax);
        const premium = proposal.direction === 'up' ? 1 + ENTRY_PREMIUM : 1 - ENTRY_PREMIUM;

        this.positions.set(key, {
            symbol,
            strategy: strategyId,
            signalDate,
            direction: proposal.direction,
            recommendedEntry: round2(referenceClose * premium),
            target: proposal.target,
            stop: proposal.stop,
            holdingHorizonDays: horizon,
            entryDate,
            entryPrice: null,
            expectedExitDate: addTradingDays(entryDate, horizon),
            exitDate: null,
            exitPrice: null,
            exitReason: null,
            pnlPercent: null,
            status: 'pending',
        });

        logger.info(`Signal added: ${symbol}/${strategyId}/${signalDate} ${proposal.direction}`);
        return true;
    }

    /**
     * Applies one day's bar to every pending/open position of `symbol`.
     * A position filled today is first checked for exits on the next bar.
     * @returns copies of the positions closed by this call
     * @throws OutOfOrderUpdateError when `today` precedes the last date applied for `symbol`
     */
    updatePositions(today: IsoDate, symbol: string, bar: DailyBar): Position[] {
        const last = this.lastApplied.get(symbol);
        if (last !== undefined && today < last) {
            throw new OutOfOrderUpdateError(symbol, today, last);
        }
        this.lastApplied.set(symbol, today);

        const closed: Position[] = [];

        for (const position of this.positions.values()) {
            if (position.symbol !== symbol || position.status === 'closed') continue;

            if (position.status === 'pending') {
                if (position.entryDate === today) {
                    position.entryPrice = bar.open;
                    position.status = 'open';
                    logger.info(`${symbol}/${position.strategy}: pending → open at ${bar.open.toFixed(2)}`);
                }
                continue;
            }

            // Same-day re-application of the fill bar is not an exit day
            const entryPrice = position.entryPrice;
            if (today <= position.entryDate || entryPrice === null) continue;

            const exit =
                evaluateExit(position.direction, position.target, position.stop, bar) ??
                (today >= position.expectedExitDate ? horizonExit(bar) : null);
            if (!exit) continue;

            position.exitDate = today;
            position.exitPrice = exit.price;
            position.exitReason = exit.reason;
            position.pnlPercent =
                entryPrice > 0
                    ? roundTo(computePnlPercent(position.direction, entryPrice, exit.price), PNL_DECIMALS)
                    : null;
            position.status = 'closed';

            logger.info(`${symbol}/${position.strategy}: closed via ${exit.reason} at ${exit.price.toFixed(2)}`);
            closed.push({ ...position });
        }

        return closed;
    }

    /** Pending and open positions for `symbol` (copies) */
    getOpenPositions(symbol: string): Position[] {
        return [...this.positions.values()]
            .filter(p => p.symbol === symbol && p.status !== 'closed')
            .map(p => ({ ...p }));
    }

    getAllPositions(): Position[] {
        return [...this.positions.values()].map(p => ({ ...p }));
    }

    /**
     * Applies bars for many symbols; one symbol's failure is logged and does
     * not stop the others.
     * @returns closed positions and the symbols that failed
     */
    updateMany(today: IsoDate, bars: ReadonlyMap<string, DailyBar>): { closed: Position[]; failed: string[] } {
        const closed: Position[] = [];
        const failed: string[] = [];
        for (const [symbol, bar] of bars) {
            try {
                closed.push(...this.updatePositions(today, symbol, bar));
            } catch (err) {
                failed.push(symbol);
                logger.error(`Position update failed for ${symbol}`, { error: errorMessage(err) });
            }
        }
        return { closed, failed };
    }
}
