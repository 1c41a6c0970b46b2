// src/lib/db/schema.ts
import { mysqlTable, int, varchar, double, bigint, timestamp, index, uniqueIndex } from 'drizzle-orm/mysql-core';
import type { ExitReason, PositionStatus, TradeDirection } from '../../types';

/**
 * =============================================================================
 * DAILY BARS
 * One row per symbol per trading day. Dates are stored as 'YYYY-MM-DD'
 * strings so the calendar never goes through a timezone conversion.
 * =============================================================================
 */
export const dailyBars = mysqlTable(
    'daily_bars',
    {
        id: int('id').primaryKey().autoincrement(),
        symbol: varchar('symbol', { length: 15 }).notNull(),
        date: varchar('date', { length: 10 }).notNull(),
        open: double('open').notNull(),
        high: double('high').notNull(),
        low: double('low').notNull(),
        close: double('close').notNull(),
        volume: bigint('volume', { mode: 'number' }).notNull().default(0),
    },
    (table) => ({
        symbolDateIdx: uniqueIndex('uq_bars_symbol_date').on(table.symbol, table.date),
    })
);

export type DailyBarRow = typeof dailyBars.$inferSelect;
export type NewDailyBarRow = typeof dailyBars.$inferInsert;

/**
 * =============================================================================
 * LIVE POSITIONS
 * Identity = (symbol, strategy, signal_date). Written in full by
 * PositionTracker.save(); validated on the way back in.
 * =============================================================================
 */
export const positions = mysqlTable(
    'positions',
    {
        id: int('id').primaryKey().autoincrement(),
        symbol: varchar('symbol', { length: 15 }).notNull(),
        strategy: varchar('strategy', { length: 50 }).notNull(),
        signalDate: varchar('signal_date', { length: 10 }).notNull(),
        direction: varchar('direction', { length: 10 }).$type<TradeDirection>().notNull(),
        recommendedEntry: double('recommended_entry').notNull(),
        target: double('target').notNull(),
        stop: double('stop').notNull(),
        holdingHorizonDays: int('holding_horizon_days').notNull(),
        entryDate: varchar('entry_date', { length: 10 }).notNull(),
        entryPrice: double('entry_price'),
        expectedExitDate: varchar('expected_exit_date', { length: 10 }).notNull(),
        exitDate: varchar('exit_date', { length: 10 }),
        exitPrice: double('exit_price'),
        exitReason: varchar('exit_reason', { length: 20 }).$type<ExitReason>(),
        pnlPercent: double('pnl_percent'),
        status: varchar('status', { length: 10 }).$type<PositionStatus>().notNull().default('pending'), // pending, open, closed
        updatedAt: timestamp('updated_at').defaultNow().onUpdateNow(),
    },
    (table) => ({
        identityIdx: uniqueIndex('uq_positions_identity').on(table.symbol, table.strategy, table.signalDate),
        statusIdx: index('idx_positions_status').on(table.status),
    })
);

export type PositionRow = typeof positions.$inferSelect;
export type NewPositionRow = typeof positions.$inferInsert;
