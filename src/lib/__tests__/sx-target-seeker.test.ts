import { describe, it, expect } from 'vitest';

import { TargetSeeker } from '../sx-target-seeker';
import { CounterCurrentSolver } from '../sx-countercurrent-solver';
import { EquilibriumModel } from '../sx-equilibrium';
import { DEFAULT_SEEKER_CONFIG } from '../sx-config';
import { InvalidInputError, UnreachableTargetError } from '../sx-errors';
import { getScenario } from '../sx-scenario-catalog';
import type { FeedWithoutExtractant } from '../sx-types';

const solver = new CounterCurrentSolver(new EquilibriumModel());
const seeker = new TargetSeeker(solver, DEFAULT_SEEKER_CONFIG);

const feed: FeedWithoutExtractant = {
  plsStreams: [{ copper: 2.0, flow: 100 }],
  stripLiquor: { copper: 35 },
};

describe('TargetSeeker', () => {
  it('finds the extractant dose for a target stripping ratio', () => {
    const result = seeker.seek(getScenario('C'), feed, 50);

    expect(Math.abs(result.strippingRatio - 50)).toBeLessThanOrEqual(0.1);
    expect(result.search.converged).toBe(true);
    expect(result.search.error).toBeCloseTo(result.strippingRatio - 50, 12);
    expect(result.search.bounds).toEqual({ min: 1, max: 35 });
    // SR(5 %) ≈ 42 and SR(10 %) ≈ 69 for this circuit
    expect(result.extractantVv).toBeGreaterThan(5);
    expect(result.extractantVv).toBeLessThan(10);
    expect(result.search.trials.length).toBeLessThanOrEqual(DEFAULT_SEEKER_CONFIG.maxTrials);
    expect(result.search.trials.slice(0, 2).map(t => t.extractantVv)).toEqual([1, 35]);
  });

  it('round-trips a plant run through the optimizer', () => {
    const plant = solver.solve(getScenario('K'), { ...feed, extractantVv: 12 });
    const result = seeker.seek(getScenario('K'), feed, plant.strippingRatio, { tolerance: 0.01 });

    expect(Math.abs(result.strippingRatio - plant.strippingRatio)).toBeLessThanOrEqual(0.01);
    expect(result.extractantVv).toBeCloseTo(12, 1);
  });

  it('reports the achievable range for an unreachable target', () => {
    let caught: unknown;
    try {
      seeker.seek(getScenario('C'), feed, 99);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnreachableTargetError);
    if (caught instanceof UnreachableTargetError) {
      expect(caught.kind).toBe('unreachable-target');
      expect(caught.targetRatio).toBe(99);
      expect(caught.achievableMin).toBeCloseTo(8.88, 1);
      expect(caught.achievableMax).toBeCloseTo(85.17, 1);
    }
  });

  describe('when the ratio passes a maximum inside the bounds', () => {
    // Four extraction stages at O/A 2 with copper-free lean electrolyte:
    // SR(1 %) ≈ 22.89, SR(18 %) ≈ 99.650, SR(22.25 %) ≈ 99.651, SR(35 %) ≈ 99.599
    const richFeed: FeedWithoutExtractant = {
      plsStreams: [{ copper: 2.0, flow: 100 }],
      stripLiquor: { copper: 0 },
      organicToAqueous: 2,
    };

    it('scans the bounds for a bracket the endpoints miss', () => {
      const result = seeker.seek(getScenario('L'), richFeed, 99.64, { tolerance: 0.01 });

      expect(result.search.converged).toBe(true);
      expect(Math.abs(result.strippingRatio - 99.64)).toBeLessThanOrEqual(0.01);
      expect(result.extractantVv).toBeGreaterThan(13.75);
      expect(result.extractantVv).toBeLessThan(18);
      expect(result.search.trials.map(t => t.extractantVv).slice(0, 6)).toEqual([1, 35, 5.25, 9.5, 13.75, 18]);
      expect(result.search.trials).toHaveLength(7);
    });

    it('reports the scanned range when no bracket exists', () => {
      let caught: unknown;
      try {
        seeker.seek(getScenario('L'), richFeed, 99.7, { tolerance: 0.01 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnreachableTargetError);
      if (caught instanceof UnreachableTargetError) {
        expect(caught.achievableMin).toBeCloseTo(22.887, 2);
        expect(caught.achievableMax).toBeCloseTo(99.651, 2);
      }
    });

    it('returns the closest trial when the budget runs out mid-scan', () => {
      const tight = new TargetSeeker(solver, { ...DEFAULT_SEEKER_CONFIG, maxTrials: 4 });
      const result = tight.seek(getScenario('L'), richFeed, 99.64, { tolerance: 0.01 });

      expect(result.search.converged).toBe(false);
      expect(result.search.trials.map(t => t.extractantVv)).toEqual([1, 35, 5.25, 9.5]);
      expect(result.extractantVv).toBe(35);
    });
  });

  it('rejects a target below the lower bound ratio', () => {
    expect(() => seeker.seek(getScenario('C'), feed, 5)).toThrow(UnreachableTargetError);
  });

  it('accepts an endpoint that already meets the target', () => {
    const result = seeker.seek(getScenario('C'), feed, 82.75, { searchBounds: { min: 20, max: 35 } });
    expect(result.extractantVv).toBe(20);
    expect(result.search.converged).toBe(true);
    expect(result.search.trials).toHaveLength(2);
  });

  it('returns the closest trial when the trial budget runs out', () => {
    const tight = new TargetSeeker(solver, { ...DEFAULT_SEEKER_CONFIG, maxTrials: 2 });
    const result = tight.seek(getScenario('C'), feed, 50);

    // SR(1 %) ≈ 8.9 and SR(35 %) ≈ 85.2: the upper endpoint is closer to 50
    expect(result.search.converged).toBe(false);
    expect(result.search.trials).toHaveLength(2);
    expect(result.extractantVv).toBe(35);
  });

  it.each([
    ['a zero target', 0, {}],
    ['a target of 100 %', 100, {}],
    ['inverted bounds', 50, { searchBounds: { min: 30, max: 10 } }],
    ['a zero lower bound', 50, { searchBounds: { min: 0, max: 10 } }],
    ['a zero tolerance', 50, { tolerance: 0 }],
  ])('rejects %s', (_label, target, overrides) => {
    expect(() => seeker.seek(getScenario('C'), feed, target, overrides)).toThrow(InvalidInputError);
  });

  it('rejects a trial budget that cannot bracket the target', () => {
    const broken = new TargetSeeker(solver, { ...DEFAULT_SEEKER_CONFIG, maxTrials: 1 });
    expect(() => broken.seek(getScenario('C'), feed, 50)).toThrow('maxTrials');
  });

  it('rejects a scan without intervals', () => {
    const broken = new TargetSeeker(solver, { ...DEFAULT_SEEKER_CONFIG, scanIntervals: 0 });
    expect(() => broken.seek(getScenario('C'), feed, 50)).toThrow('scanIntervals');
  });
});
