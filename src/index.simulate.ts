// src/index.simulate.ts

/**
 * Entry point for replaying stored history through every strategy.
 * Loads bars per symbol from the database and logs the strategy ranking.
 * Usage: node dist/index.simulate.js [SYMBOL ...]   (defaults to SIMULATION_SYMBOL)
 */
import { config } from './lib/config/settings';
import { dbService } from './lib/db';
import { errorMessage } from './lib/errors';
import { createLogger } from './lib/logger';
import { validateBars } from './lib/services/barHistory';
import { evaluateStrategies, formatComparison, monthlySummary } from './lib/services/evaluator';
import { ALL_STRATEGIES } from './lib/strategies';

const logger = createLogger('index.simulate');

async function main() {
    const args = process.argv.slice(2).map(s => s.toUpperCase());
    const symbols = args.length > 0 ? args : [config.simulation.symbol];
    const shares = config.simulation.shares;

    try {
        await dbService.initialize();

        for (const symbol of symbols) {
            try {
                const bars = validateBars(symbol, await dbService.getBars(symbol));
                if (bars.length <= config.analysis.simulationMinLookback + 1) {
                    logger.error(
                        `Insufficient data for ${symbol}: ${bars.length} bars, need more than ${config.analysis.simulationMinLookback + 1}`
                    );
                    continue;
                }

                logger.info(`Simulating ${symbol}: ${bars.length} bars, ${shares} shares per trade`);
                const { trades, comparison } = evaluateStrategies(symbol, bars, ALL_STRATEGIES, shares);

                for (const line of formatComparison(comparison)) {
                    logger.info(line);
                }
                for (const strategy of ALL_STRATEGIES) {
                    for (const m of monthlySummary(trades, symbol, strategy.id)) {
                        logger.info(`${symbol}/${strategy.id} ${m.month}: ${m.trades} trades, ${m.wins} wins, P&L ${m.pnl}`);
                    }
                }
            } catch (err) {
                logger.error(`Simulation failed for ${symbol}`, { error: errorMessage(err) });
            }
        }
    } catch (err) {
        logger.error('Simulation encountered a fatal error', { error: errorMessage(err) });
        process.exitCode = 1;
    } finally {
        await dbService.close();
    }
}

main().catch(err => {
    logger.error('Unhandled error in main', { error: errorMessage(err) });
    process.exit(1);
});
