// src/lib/strategies/index.ts
// Strategy registry – ordered; dispatch goes through this list, never through type checks.

import { config, type AnalysisConfig } from '../config/settings';
import { MeanReversionBandStrategy } from './meanReversionBand';
import { RangeBreakoutStrategy } from './rangeBreakout';
import type { TradingStrategy } from './types';

export type { TradingStrategy } from './types';
export { MeanReversionBandStrategy } from './meanReversionBand';
export { RangeBreakoutStrategy } from './rangeBreakout';
export { recommendHoldingHorizon } from './holdingHorizon';

export function createStrategies(options: AnalysisConfig = config.analysis): TradingStrategy[] {
    return [new MeanReversionBandStrategy(options), new RangeBreakoutStrategy(options)];
}

export const ALL_STRATEGIES: readonly TradingStrategy[] = createStrategies();

export function getStrategy(
    id: string,
    strategies: readonly TradingStrategy[] = ALL_STRATEGIES
): TradingStrategy | undefined {
    return strategies.find(s => s.id === id);
}
