// src/index.ts

/**
 * End-of-day entry point: applies today's bars to live positions and records
 * new signals for every configured symbol.
 * Usage: node dist/index.js [YYYY-MM-DD] [SYMBOL ...]
 */
import { config } from './lib/config/settings';
import { runDaily } from './lib/dailyRun';
import { dbService, MysqlPositionRepository } from './lib/db';
import { errorMessage } from './lib/errors';
import { createLogger } from './lib/logger';
import { PositionTracker } from './lib/services/positionTracker';
import { isIsoDate, todayIso } from './lib/utils/tradingCalendar';

const logger = createLogger('index');

function parseArgs(argv: readonly string[]): { today: string; symbols: string[] } {
    const [first, ...rest] = argv;
    if (first !== undefined && isIsoDate(first)) {
        return { today: first, symbols: rest.length > 0 ? rest.map(s => s.toUpperCase()) : config.symbols };
    }
    return { today: todayIso(), symbols: argv.length > 0 ? argv.map(s => s.toUpperCase()) : config.symbols };
}

async function main() {
    const { today, symbols } = parseArgs(process.argv.slice(2));

    try {
        await dbService.initialize();

        const tracker = new PositionTracker(new MysqlPositionRepository());
        await tracker.load();

        const summary = await runDaily({ today, symbols, barSource: dbService, tracker });

        logger.info(`Up signals (${summary.upSignals.length}): ${summary.upSignals.join(', ') || '(none)'}`);
        logger.info(`Down signals (${summary.downSignals.length}): ${summary.downSignals.join(', ') || '(none)'}`);
        for (const [symbol, p] of Object.entries(summary.predictions)) {
            if (p.trend === 'sideways') continue;
            logger.info(
                `Prediction ${symbol}: ${p.trend} → target ${p.target}, stop ${p.stop}, R:R ${p.rewardRiskRatio}, ` +
                    `success ${p.successRate}%. ${p.rationale}`
            );
        }
        for (const p of summary.closed) {
            logger.info(
                `Closed ${p.symbol}/${p.strategy} (${p.direction}) via ${p.exitReason} at ${p.exitPrice}, P&L ${p.pnlPercent}%`
            );
        }
        if (summary.failedSymbols.length > 0) {
            logger.warn(`Failed symbols: ${summary.failedSymbols.join(', ')}`);
        }
    } catch (err) {
        logger.error('Daily run encountered a fatal error', { error: errorMessage(err) });
        process.exitCode = 1;
    } finally {
        await dbService.close();
    }
}

main().catch(err => {
    logger.error('Unhandled error in main', { error: errorMessage(err) });
    process.exit(1);
});
