// src/lib/strategies/holdingHorizon.ts
// ---------------------------------------------------------------
// HOLDING HORIZON POLICY
// Better reward:risk and confirmed volume → hold longer.
// ---------------------------------------------------------------

import { clampHorizon } from '../utils/exitRules';

interface HorizonRule {
    minRewardRisk: number;
    volumeSpike: boolean | 'any';
    days: number;
}

// First matching row wins
const HORIZON_TABLE: readonly HorizonRule[] = [
    { minRewardRisk: 2, volumeSpike: true, days: 5 },
    { minRewardRisk: 2, volumeSpike: false, days: 4 },
    { minRewardRisk: 1, volumeSpike: true, days: 4 },
    { minRewardRisk: 1, volumeSpike: false, days: 3 },
    { minRewardRisk: -Infinity, volumeSpike: 'any', days: 3 },
];

export function recommendHoldingHorizon(
    rewardRiskRatio: number,
    volumeSpike: boolean,
    bounds: { tPlusMin: number; tPlusMax: number }
): number {
    const rule = HORIZON_TABLE.find(
        r => rewardRiskRatio >= r.minRewardRisk && (r.volumeSpike === 'any' || r.volumeSpike === volumeSpike)
    );
    return clampHorizon(rule?.days ?? bounds.tPlusMin, bounds.tPlusMin, bounds.tPlusMax);
}
