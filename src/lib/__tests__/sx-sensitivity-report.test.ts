import { describe, it, expect } from 'vitest';

import { STABLE_PROCESS_MESSAGE, analyzeSensitivity } from '../sx-sensitivity';
import { formatNumber, summarizeProfile } from '../sx-report';
import { CounterCurrentSolver } from '../sx-countercurrent-solver';
import { EquilibriumModel } from '../sx-equilibrium';
import { getScenario } from '../sx-scenario-catalog';
import type { FeedSpecification } from '../sx-types';

const solver = new CounterCurrentSolver(new EquilibriumModel());

const feed: FeedSpecification = {
  plsStreams: [{ copper: 2.0, flow: 100 }],
  stripLiquor: { copper: 35 },
  extractantVv: 20,
};

describe('analyzeSensitivity', () => {
  it('recommends the moves that shift extraction recovery', () => {
    const topology = getScenario('C');
    const base = solver.solve(topology, feed);
    const report = analyzeSensitivity(solver, topology, feed, base);

    expect(report.findings.map(f => f.parameter)).toEqual(['organicToAqueous', 'plsCopper']);
    expect(report.findings[0].recoveryChange).toBeCloseTo(0.491, 2);
    expect(report.findings[1].recoveryChange).toBeCloseTo(0.42, 2);
    expect(report.recommendations).toEqual([
      'Suggestion: a 5% increase in extraction O/A ratio raises extraction recovery by about 0.49 percentage points.',
      'Suggestion: a 5% increase in PLS copper raises extraction recovery by about 0.42 percentage points.',
    ]);
  });

  it('reports a stable process when nothing moves recovery by more than 0.1 point', () => {
    const topology = getScenario('K');
    const stableFeed: FeedSpecification = {
      plsStreams: [{ copper: 2.0, flow: 100 }],
      stripLiquor: { copper: 0, flow: 100 },
      extractantVv: 60,
    };
    const base = solver.solve(topology, stableFeed);
    const report = analyzeSensitivity(solver, topology, stableFeed, base);

    expect(report.recommendations).toEqual([STABLE_PROCESS_MESSAGE]);
    expect(Math.abs(report.findings[0].recoveryChange)).toBeLessThan(0.1);
    expect(Math.abs(report.findings[1].recoveryChange)).toBeLessThan(0.1);
  });
});

describe('summarizeProfile', () => {
  it('formats the KPI rows', () => {
    const profile = solver.solve(getScenario('C'), feed);
    const rows = summarizeProfile(profile);

    expect(rows.map(r => r.label)).toEqual([
      'Extractant concentration',
      'Maximum loading (AML)',
      'Loaded organic',
      'Stripped organic',
      'Raffinate',
      'Extraction recovery',
      'Stripping efficiency',
      'Stripping ratio',
      'Net transfer',
    ]);
    expect(rows[0]).toEqual({ label: 'Extractant concentration', value: '20.00', unit: '% v/v' });
    expect(rows[1]).toEqual({ label: 'Maximum loading (AML)', value: '10.34', unit: 'g/L' });
    expect(rows[2].value).toBe('2.75');
    expect(rows[3].value).toBe('1.10');
    expect(rows[4].value).toBe('0.345');
    expect(rows[7].value).toBe('82.75');
    expect(rows[8]).toEqual({
      label: 'Net transfer',
      value: profile.netTransfer.toFixed(3),
      unit: 'g/L per % v/v',
    });
  });

  it('prints N/A for non-finite values', () => {
    expect(formatNumber(Number.POSITIVE_INFINITY, 2)).toBe('N/A');
    expect(formatNumber(Number.NaN, 2)).toBe('N/A');
    expect(formatNumber(1.23456, 3)).toBe('1.235');
  });
});
