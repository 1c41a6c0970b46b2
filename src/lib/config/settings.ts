// src/lib/config/settings.ts
// =============================================================================
// CENTRAL CONFIGURATION – SINGLE SOURCE OF TRUTH
// Uses Zod + dotenv for validation & defaults
// All modules import from here → no scattered env vars
// =============================================================================

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env early
dotenvConfig();

const DEFAULT_SYMBOLS = [
    'ACB', 'BID', 'BVH', 'CTG', 'FPT',
    'GAS', 'GVR', 'HDB', 'HPG', 'KDH',
    'MBB', 'MSN', 'MWG', 'NVL', 'PDR',
    'PLX', 'PNJ', 'POW', 'SAB', 'SSI',
    'STB', 'TCB', 'TPB', 'VCB', 'VHM',
    'VIC', 'VJC', 'VNM', 'VPB', 'VRE',
].join(',');

const toNumberList = (str: string): number[] =>
    str.split(',').map(s => s.trim()).filter(s => s.length > 0).map(Number);

/**
 * Zod schema – validates every env value at startup
 */
const ConfigSchema = z.object({
    // ──────────────────────────────────────────────────────────────
    // Core Environment
    // ──────────────────────────────────────────────────────────────
    ENV: z.enum(['dev', 'test', 'prod']).default('dev'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // ──────────────────────────────────────────────────────────────
    // Database (only the db layer requires it)
    // ──────────────────────────────────────────────────────────────
    DATABASE_URL: z.string().url().optional(),

    // ──────────────────────────────────────────────────────────────
    // Universe
    // ──────────────────────────────────────────────────────────────
    SYMBOLS: z.string().default(DEFAULT_SYMBOLS).transform(str =>
        str.split(',').map(s => s.trim().toUpperCase()).filter(s => s.length > 0)
    ),

    // ──────────────────────────────────────────────────────────────
    // Technical Indicator Parameters
    // ──────────────────────────────────────────────────────────────
    SMA_PERIOD: z.coerce.number().int().default(20),
    VOLUME_SPIKE_RATIO: z.coerce.number().default(1.2),      // volume > 1.2× avg → spike
    FIB_LOOKBACK_MONTHS: z.coerce.number().int().default(6),
    SWING_DETECTION_WINDOW: z.coerce.number().int().default(5),
    FIB_PROXIMITY_PCT: z.coerce.number().default(0.015),     // ±1.5% of a level
    FIB_LEVELS: z.string().default('0,0.236,0.382,0.5,0.618,0.786,1').transform(toNumberList),

    // ──────────────────────────────────────────────────────────────
    // Holding horizon & simulation
    // ──────────────────────────────────────────────────────────────
    T_PLUS_MIN: z.coerce.number().int().default(3),
    T_PLUS_MAX: z.coerce.number().int().default(5),
    SIMULATION_MIN_LOOKBACK: z.coerce.number().int().default(60),
    SIMULATION_SHARES: z.coerce.number().int().positive().default(1000),
    SIMULATION_SYMBOL: z.string().default('HPG'),
});

/**
 * Parameters of the feature engine, strategies and simulator.
 * Callers may pass their own object; it is validated the same way.
 */
export const analysisConfigSchema = z
    .object({
        smaPeriod: z.number().int().min(2),
        volumeSpikeRatio: z.number().positive(),
        fibLookbackMonths: z.number().int().min(1),
        swingWindow: z.number().int().min(1),
        fibProximityPct: z.number().positive(),
        fibLevels: z.array(z.number().min(0).max(1)).min(1),
        tPlusMin: z.number().int().min(1),
        tPlusMax: z.number().int().min(1),
        simulationMinLookback: z.number().int().min(1),
    })
    .refine(c => c.tPlusMin <= c.tPlusMax, {
        message: 'tPlusMin must not exceed tPlusMax',
        path: ['tPlusMin'],
    });

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

/**
 * Parse & validate – throws on startup if config is wrong
 */
const rawConfig = ConfigSchema.parse(process.env);

export const config = {
    // =========================================================================
    // CORE ENVIRONMENT
    // =========================================================================
    env: rawConfig.ENV,                    // 'dev' | 'test' | 'prod'
    log_level: rawConfig.LOG_LEVEL,        // Controls Winston logger verbosity

    /** Full MySQL connection URL */
    databaseUrl: rawConfig.DATABASE_URL,

    /** Tickers processed by the daily run and batch simulation */
    symbols: rawConfig.SYMBOLS,

    // =========================================================================
    // ANALYSIS PARAMETERS (feature engine, strategies, simulator)
    // =========================================================================
    analysis: analysisConfigSchema.parse({
        smaPeriod: rawConfig.SMA_PERIOD,
        volumeSpikeRatio: rawConfig.VOLUME_SPIKE_RATIO,
        fibLookbackMonths: rawConfig.FIB_LOOKBACK_MONTHS,
        swingWindow: rawConfig.SWING_DETECTION_WINDOW,
        fibProximityPct: rawConfig.FIB_PROXIMITY_PCT,
        fibLevels: rawConfig.FIB_LEVELS,
        tPlusMin: rawConfig.T_PLUS_MIN,
        tPlusMax: rawConfig.T_PLUS_MAX,
        simulationMinLookback: rawConfig.SIMULATION_MIN_LOOKBACK,
    }),

    // =========================================================================
    // SIMULATION
    // =========================================================================
    simulation: {
        /** Shares per simulated trade */
        shares: rawConfig.SIMULATION_SHARES,
        /** Default ticker for a single-symbol simulation */
        symbol: rawConfig.SIMULATION_SYMBOL.toUpperCase(),
    },
};

export type Config = typeof config;

/**
 * Env-derived analysis parameters with caller overrides applied.
 * Throws ZodError on invalid combinations.
 */
export function resolveAnalysisConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
    return analysisConfigSchema.parse({ ...config.analysis, ...overrides });
}
