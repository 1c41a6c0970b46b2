// src/index.import.ts

/**
 * Merges a local bar file into stored history.
 * Usage: node dist/index.import.js SYMBOL path/to/bars.json
 * The file is a JSON array of { date, open, high, low, close, volume }.
 */
import { readFile } from 'fs/promises';
import { dbService } from './lib/db';
import { errorMessage } from './lib/errors';
import { createLogger } from './lib/logger';
import { parseBarRows } from './lib/services/barHistory';

const logger = createLogger('index.import');

async function main() {
    const [symbolArg, file] = process.argv.slice(2);
    if (!symbolArg || !file) {
        logger.error('Usage: index.import SYMBOL FILE');
        process.exitCode = 1;
        return;
    }
    const symbol = symbolArg.toUpperCase();

    try {
        const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
        if (!Array.isArray(raw)) {
            throw new Error(`${file} does not contain a JSON array`);
        }

        const incoming = parseBarRows(symbol, raw);
        await dbService.initialize();
        const written = await dbService.appendBars(symbol, incoming);
        logger.info(`Import complete for ${symbol}: ${incoming.length} rows read, ${written} written`);
    } catch (err) {
        logger.error(`Import failed for ${symbol}`, { error: errorMessage(err) });
        process.exitCode = 1;
    } finally {
        await dbService.close();
    }
}

main().catch(err => {
    logger.error('Unhandled error in main', { error: errorMessage(err) });
    process.exit(1);
});
