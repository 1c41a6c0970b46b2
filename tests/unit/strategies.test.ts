import { describe, it, expect } from 'vitest';
import {
    ALL_STRATEGIES,
    MeanReversionBandStrategy,
    RangeBreakoutStrategy,
    createStrategies,
    getStrategy,
    recommendHoldingHorizon,
} from '../../src/lib/strategies';
import type { Bar, TradeProposal } from '../../src/types';
import {
    DOWN_BREAKOUT_BAR,
    TEST_OPTIONS,
    UP_BREAKOUT_BAR,
    barsFromCloses,
    fallingWarmup,
    lowerBandReclaim,
    makeBars,
    risingWarmup,
    upperBandRejection,
} from '../helpers/bars';

function expectStraddle(proposal: TradeProposal, reference: number) {
    if (proposal.direction === 'up') {
        expect(proposal.target).toBeGreaterThan(reference);
        expect(proposal.stop).toBeLessThan(reference);
    } else if (proposal.direction === 'down') {
        expect(proposal.target).toBeLessThan(reference);
        expect(proposal.stop).toBeGreaterThan(reference);
    }
}

describe('recommendHoldingHorizon', () => {
    const bounds = { tPlusMin: 3, tPlusMax: 5 };

    it('holds longer for better reward:risk and confirmed volume', () => {
        expect(recommendHoldingHorizon(2.33, true, bounds)).toBe(5);
        expect(recommendHoldingHorizon(2.33, false, bounds)).toBe(4);
        expect(recommendHoldingHorizon(1.5, true, bounds)).toBe(4);
        expect(recommendHoldingHorizon(1.5, false, bounds)).toBe(3);
        expect(recommendHoldingHorizon(0.5, true, bounds)).toBe(3);
    });

    it('stays within the configured bounds', () => {
        expect(recommendHoldingHorizon(2.33, true, { tPlusMin: 3, tPlusMax: 4 })).toBe(4);
        expect(recommendHoldingHorizon(0.2, false, { tPlusMin: 4, tPlusMax: 5 })).toBe(4);
    });
});

describe('strategy registry', () => {
    it('lists mean-reversion first, then breakout', () => {
        expect(ALL_STRATEGIES.map(s => s.id)).toEqual(['mean-reversion-band', 'range-breakout']);
    });

    it('looks strategies up by id', () => {
        const strategies = createStrategies(TEST_OPTIONS);
        expect(getStrategy('range-breakout', strategies)).toBe(strategies[1]);
        expect(getStrategy('unknown', strategies)).toBeUndefined();
    });
});

describe('RangeBreakoutStrategy', () => {
    const strategy = new RangeBreakoutStrategy(TEST_OPTIONS);

    it('calls an up-breakout above the 20-day high on 2× volume', () => {
        const bars = makeBars([...risingWarmup(59), UP_BREAKOUT_BAR]);
        const proposal = strategy.generateSignal(bars);

        expect(proposal.direction).toBe('up');
        expect(proposal.target).toBe(107);
        expect(proposal.stop).toBe(97);
        expect(proposal.rewardRiskRatio).toBe(2.33);
        expect(proposal.holdingHorizonDays).toBe(5);
        expect(proposal.rationale).toContain('resistance 95.00');
        expectStraddle(proposal, 100);
    });

    it('calls a down-breakout below the 20-day low on 2× volume', () => {
        const bars = makeBars([...fallingWarmup(59), DOWN_BREAKOUT_BAR]);
        const proposal = strategy.generateSignal(bars);

        expect(proposal.direction).toBe('down');
        expect(proposal.target).toBe(93);
        expect(proposal.stop).toBe(103);
        expect(proposal.rewardRiskRatio).toBe(2.33);
        expectStraddle(proposal, 100);
    });

    it('stays neutral without volume confirmation', () => {
        const bars = makeBars([...risingWarmup(59), { ...UP_BREAKOUT_BAR, volume: 1200 }]);
        expect(strategy.generateSignal(bars).direction).toBe('sideways');
    });

    it('stays neutral when the breakout runs against the 20-day average', () => {
        // price at a new high but the average has been falling
        const bars = makeBars([...fallingWarmup(59), { close: 130, high: 130.5, low: 129, volume: 2000 }]);
        expect(strategy.generateSignal(bars).direction).toBe('sideways');
    });

    it('returns the neutral band inside the range', () => {
        const proposal = strategy.generateSignal(barsFromCloses(new Array<number>(30).fill(100)));
        expect(proposal).toMatchObject({
            direction: 'sideways',
            target: 107,
            stop: 97,
            rewardRiskRatio: 2.33,
            holdingHorizonDays: 5,
        });
    });

    it('returns the neutral band on short history', () => {
        const proposal = strategy.generateSignal(makeBars([...risingWarmup(23), UP_BREAKOUT_BAR]));
        expect(proposal.direction).toBe('sideways');
        expect(proposal.target).toBe(107);
    });
});

describe('MeanReversionBandStrategy', () => {
    const strategy = new MeanReversionBandStrategy(TEST_OPTIONS);

    it('goes up when a lower-band pierce is reclaimed', () => {
        const proposal = strategy.generateSignal(makeBars(lowerBandReclaim()));

        expect(proposal.direction).toBe('up');
        expect(proposal.target).toBe(99.4);
        expect(proposal.stop).toBe(90.98);
        expect(proposal.rewardRiskRatio).toBe(0.68);
        expect(proposal.holdingHorizonDays).toBe(3);
        expectStraddle(proposal, 96);
    });

    it('goes down when an upper-band pierce is rejected', () => {
        const proposal = strategy.generateSignal(makeBars(upperBandRejection()));

        expect(proposal.direction).toBe('down');
        expect(proposal.target).toBe(100.6);
        expect(proposal.stop).toBe(109.25);
        expect(proposal.rewardRiskRatio).toBe(0.65);
        expectStraddle(proposal, 104);
    });

    it('measures the band with the sample deviation', () => {
        // previous lower band: 92.507 (sample) vs 92.683 (population)
        const specs = lowerBandReclaim();
        specs[58] = { ...specs[58], low: 92.595 };
        expect(strategy.generateSignal(makeBars(specs)).direction).toBe('sideways');

        specs[58] = { ...specs[58], low: 92.5 };
        expect(strategy.generateSignal(makeBars(specs)).direction).toBe('up');
    });

    it('requires capitulation volume on the touch bar', () => {
        const specs = lowerBandReclaim();
        specs[58] = { ...specs[58], volume: 900 };
        expect(strategy.generateSignal(makeBars(specs)).direction).toBe('sideways');
    });

    it('returns the neutral band without a touch', () => {
        const closes = Array.from({ length: 60 }, (_, i) => (i % 2 === 0 ? 99 : 101));
        const proposal = strategy.generateSignal(barsFromCloses(closes));
        expect(proposal).toMatchObject({
            direction: 'sideways',
            target: 103.02,
            stop: 99.99,
            rewardRiskRatio: 2,
            holdingHorizonDays: 5,
        });
    });

    it('returns the neutral band on fewer than 52 bars', () => {
        const bars = makeBars(lowerBandReclaim().slice(-51));
        expect(strategy.generateSignal(bars).direction).toBe('sideways');
    });
});

describe('no lookahead', () => {
    const scenarios: Array<[string, Bar[]]> = [
        ['breakout', makeBars([...risingWarmup(59), UP_BREAKOUT_BAR, { close: 150 }, { close: 60 }])],
        ['band reclaim', makeBars([...lowerBandReclaim(), { close: 40 }, { close: 160 }])],
    ];

    for (const strategy of createStrategies(TEST_OPTIONS)) {
        for (const [name, bars] of scenarios) {
            it(`${strategy.id} on ${name}: identical output with future bars present`, () => {
                for (let d = 0; d < bars.length - 2; d++) {
                    const prefix = bars.slice(0, d + 1).map(b => ({ ...b }));
                    expect(strategy.generateSignal(bars.slice(0, d + 1))).toEqual(strategy.generateSignal(prefix));
                }
            });
        }
    }

    it('does not mutate its input', () => {
        const bars = makeBars(lowerBandReclaim());
        const copy = bars.map(b => ({ ...b }));
        for (const strategy of createStrategies(TEST_OPTIONS)) strategy.generateSignal(bars);
        expect(bars).toEqual(copy);
    });
});
