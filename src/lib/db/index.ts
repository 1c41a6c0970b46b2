// src/lib/db/index.ts
// =============================================================================
// DATABASE SERVICE LAYER – DRIZZLE ORM + MYSQL2
//
// Purpose:
//   • Single source of truth for ALL database interactions
//   • Used by: daily runner (bars + positions), batch simulation (bars), bar import
//   • Handles connection pooling, retries, graceful shutdown
//
// Key Design Decisions:
//   • Singleton pattern – only one instance (dbService) exists
//   • Exponential backoff on startup for Docker/DB race conditions
//   • Dates kept as 'YYYY-MM-DD' strings end to end
// =============================================================================

import { drizzle, type MySql2Database } from 'drizzle-orm/mysql2';
import mysql from 'mysql2/promise';
import { asc, eq } from 'drizzle-orm';

import * as schema from './schema';
import { dailyBars, positions } from './schema';

import type { Bar, Position } from '../../types';
import { config } from '../config/settings';
import { DatabaseNotInitializedError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { mergeBars, validateBars } from '../services/barHistory';
import type { PositionRepository } from '../services/positionTracker';

// Dedicated logger for database operations
const logger = createLogger('db');

export type Database = MySql2Database<typeof schema>;

/**
 * DatabaseService – owns the MySQL pool and the Drizzle instance
 */
class DatabaseService {
    private pool: mysql.Pool | null = null;
    private drizzleDb: Database | null = null;

    // =========================================================================
    // INITIALIZATION – Connect to MySQL with exponential backoff retry logic
    // =========================================================================
    /**
     * Tries up to 3 times with 2s → 4s delays, checks the pool with
     * 'SELECT 1', then builds Drizzle over the full schema.
     */
    public async initialize(): Promise<void> {
        const url = config.databaseUrl;
        if (!url) {
            logger.error('FATAL: DATABASE_URL is missing from config');
            throw new Error('DATABASE_URL environment variable is required');
        }

        const maxRetries = 3;
        const baseDelayMs = 2000;

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            try {
                logger.info(`Attempting MySQL connection (attempt ${attempt}/${maxRetries})`);

                this.pool = mysql.createPool({
                    uri: url,
                    connectionLimit: 5,
                    waitForConnections: true,
                    queueLimit: 0,
                    timezone: '+00:00',
                    charset: 'utf8mb4',
                });

                await this.pool.execute('SELECT 1');

                this.drizzleDb = drizzle(this.pool, {
                    schema,
                    mode: 'default',
                    logger: config.env === 'dev',
                });

                logger.info('MySQL connection established and Drizzle ORM initialized');
                logger.info(`Connected to database: ${url.split('@')[1]?.split('/')[1] || 'unknown'}`);
                return;
            } catch (err) {
                logger.error(`Database connection failed (attempt ${attempt})`, { error: errorMessage(err) });

                if (this.pool) {
                    await this.pool.end().catch(endErr =>
                        logger.warn('Failed to release pool after failed attempt', { error: errorMessage(endErr) })
                    );
                    this.pool = null;
                }

                if (attempt === maxRetries) {
                    logger.error('All connection attempts failed. Giving up.');
                    throw new Error(`Failed to connect to MySQL after ${maxRetries} attempts: ${errorMessage(err)}`);
                }

                // 2s, 4s, ...
                const delay = baseDelayMs * Math.pow(2, attempt - 1);
                logger.warn(`Retrying in ${delay / 1000} seconds...`);
                await new Promise(resolve => setTimeout(resolve, delay));
            }
        }
    }

    public get db(): Database {
        if (!this.drizzleDb) {
            throw new DatabaseNotInitializedError();
        }
        return this.drizzleDb;
    }

    // =========================================================================
    // GRACEFUL SHUTDOWN
    // =========================================================================
    public async close(): Promise<void> {
        if (this.pool) {
            await this.pool.end();
            logger.info('MySQL connection pool closed gracefully');
            this.pool = null;
            this.drizzleDb = null;
        }
    }

    // =========================================================================
    // DAILY BARS
    // =========================================================================
    /**
     * Full stored history of one symbol, ascending by date.
     */
    public async getBars(symbol: string): Promise<Bar[]> {
        const rows = await this.db
            .select()
            .from(dailyBars)
            .where(eq(dailyBars.symbol, symbol))
            .orderBy(asc(dailyBars.date))
            .execute();

        return rows.map(r => ({
            date: r.date,
            open: r.open,
            high: r.high,
            low: r.low,
            close: r.close,
            volume: r.volume,
        }));
    }

    /**
     * Inserts or overwrites bars by (symbol, date).
     * @returns number of bars written
     */
    public async upsertBars(symbol: string, bars: readonly Bar[]): Promise<number> {
        if (bars.length === 0) return 0;

        await this.db.transaction(async tx => {
            for (const bar of bars) {
                await tx
                    .insert(dailyBars)
                    .values({ symbol, ...bar })
                    .onDuplicateKeyUpdate({
                        set: { open: bar.open, high: bar.high, low: bar.low, close: bar.close, volume: bar.volume },
                    })
                    .execute();
            }
        });

        logger.debug(`Upserted ${bars.length} bars`, { symbol });
        return bars.length;
    }

    /**
     * Merges freshly acquired bars into stored history and writes the bars
     * that are new or changed. Invalid rows are dropped before writing.
     */
    public async appendBars(symbol: string, incoming: readonly Bar[]): Promise<number> {
        const stored = await this.getBars(symbol);
        const storedByDate = new Map(stored.map(b => [b.date, b]));
        const merged = validateBars(symbol, mergeBars(stored, incoming));

        const changed = merged.filter(bar => {
            const prev = storedByDate.get(bar.date);
            return (
                !prev ||
                prev.open !== bar.open ||
                prev.high !== bar.high ||
                prev.low !== bar.low ||
                prev.close !== bar.close ||
                prev.volume !== bar.volume
            );
        });

        const written = await this.upsertBars(symbol, changed);
        logger.info(`${symbol}: ${written} new or updated bars (${merged.length} total)`);
        return written;
    }

    // =========================================================================
    // POSITIONS
    // =========================================================================
    public async getPositionRows(): Promise<Position[]> {
        const rows = await this.db.select().from(positions).execute();
        return rows.map(({ id: _id, updatedAt: _updatedAt, ...row }) => row);
    }

    /**
     * Writes every position, keyed by (symbol, strategy, signal_date).
     */
    public async upsertPositions(all: readonly Position[]): Promise<void> {
        if (all.length === 0) return;

        await this.db.transaction(async tx => {
            for (const p of all) {
                await tx
                    .insert(positions)
                    .values(p)
                    .onDuplicateKeyUpdate({
                        set: {
                            entryPrice: p.entryPrice,
                            exitDate: p.exitDate,
                            exitPrice: p.exitPrice,
                            exitReason: p.exitReason,
                            pnlPercent: p.pnlPercent,
                            status: p.status,
                        },
                    })
                    .execute();
            }
        });
    }
}

// Singleton instance – import this everywhere
export const dbService = new DatabaseService();

/**
 * PositionRepository backed by the `positions` table.
 * Rows are handed to the tracker untyped; it validates them.
 */
export class MysqlPositionRepository implements PositionRepository {
    constructor(private readonly service: DatabaseService = dbService) {}

    async loadRows(): Promise<readonly unknown[]> {
        return this.service.getPositionRows();
    }

    async saveAll(all: readonly Position[]): Promise<void> {
        await this.service.upsertPositions(all);
        logger.info(`Persisted ${all.length} positions`);
    }
}

export type { DatabaseService };
