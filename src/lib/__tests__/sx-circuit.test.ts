import { describe, it, expect } from 'vitest';

import {
  analyzeSensitivity,
  createSxEngine,
  optimizeForTarget,
  projectDiagram,
  simulatePlant,
} from '../sx-circuit';
import { DEFAULT_SX_CONFIG } from '../sx-config';
import { ConfigurationError, InvalidInputError, UnknownScenarioError, UnreachableTargetError } from '../sx-errors';
import { parseSxCircuitRequest } from '../sx-request';
import type { FeedSpecification, FeedWithoutExtractant } from '../sx-types';

const feed: FeedWithoutExtractant = {
  plsStreams: [{ copper: 2.0, flow: 100 }],
  stripLiquor: { copper: 35 },
};
const plantFeed: FeedSpecification = { ...feed, extractantVv: 20 };

describe('entry points', () => {
  it('simulates a catalog scenario', () => {
    const profile = simulatePlant('C', plantFeed);
    expect(profile.scenarioId).toBe('C');
    expect(profile.converged).toBe(true);
    expect(profile.strippingRatio).toBeCloseTo(82.753, 2);
  });

  it('surfaces structural errors', () => {
    expect(() => simulatePlant('Z', plantFeed)).toThrow(UnknownScenarioError);
    expect(() => simulatePlant('Z', plantFeed)).toThrow(ConfigurationError);
    expect(() => simulatePlant('C', { ...feed, extractantVv: 0 })).toThrow(InvalidInputError);
    expect(() => optimizeForTarget('C', feed, 99)).toThrow(UnreachableTargetError);
  });

  it('optimizes against caller bounds and tolerance', () => {
    const result = optimizeForTarget('A', feed, 60, { min: 2, max: 20 }, 0.05);
    expect(Math.abs(result.strippingRatio - 60)).toBeLessThanOrEqual(0.05);
    expect(result.search.bounds).toEqual({ min: 2, max: 20 });
    expect(result.search.tolerance).toBe(0.05);
  });

  it('projects the diagram of a run', () => {
    const diagram = projectDiagram(simulatePlant('K', plantFeed));
    expect(diagram.stagePoints).toHaveLength(4);
    expect(diagram.stripping.stagePoints).toHaveLength(1);
  });

  it('runs the sensitivity analysis on the default engine', () => {
    const base = simulatePlant('C', plantFeed);
    expect(analyzeSensitivity('C', plantFeed, base).recommendations).toHaveLength(2);
  });

  it('threads the engine configuration through every component', () => {
    const engine = createSxEngine({
      ...DEFAULT_SX_CONFIG,
      solver: { ...DEFAULT_SX_CONFIG.solver, maxSweeps: 2 },
      projector: { curvePoints: 10, rangePadding: 1.5 },
    });
    const profile = engine.simulatePlant('C', plantFeed);
    expect(profile.iterations).toBe(2);
    expect(profile.converged).toBe(false);
    const diagram = engine.projectDiagram(profile);
    expect(diagram.equilibriumCurve).toHaveLength(10);
    expect(diagram.provisional).toBe(true);
  });
});

describe('parseSxCircuitRequest', () => {
  it('parses a plant request', () => {
    const request = parseSxCircuitRequest({
      scenario: ' c ',
      mode: 'plant',
      feed: { ...plantFeed, conditions: { plsPh: 1.8 } },
    });
    expect(request).toEqual({
      mode: 'plant',
      scenario: 'C',
      feed: {
        plsStreams: [{ copper: 2.0, flow: 100 }],
        stripLiquor: { copper: 35, flow: undefined, acid: undefined },
        organicToAqueous: undefined,
        conditions: { plsPh: 1.8, temperature: undefined },
        mixerEfficiencies: undefined,
        extractantVv: 20,
      },
    });
  });

  it('defaults to plant mode', () => {
    expect(parseSxCircuitRequest({ scenario: 'A', feed: plantFeed }).mode).toBe('plant');
  });

  it('parses an optimize request without an extractant dose', () => {
    const request = parseSxCircuitRequest({
      scenario: 'K',
      mode: 'optimize',
      feed,
      target: 80,
      searchBounds: { min: 5, max: 30 },
    });
    expect(request.mode).toBe('optimize');
    if (request.mode === 'optimize') {
      expect(request.target).toBe(80);
      expect(request.searchBounds).toEqual({ min: 5, max: 30 });
      expect(request.tolerance).toBeUndefined();
    }
  });

  it.each([
    ['a missing body', null, 'body'],
    ['a missing scenario', { feed: plantFeed }, 'scenario'],
    ['an unknown mode', { scenario: 'A', mode: 'replay', feed: plantFeed }, 'mode'],
    ['a plant run without extractant', { scenario: 'A', mode: 'plant', feed }, 'feed.extractantVv'],
    ['a string concentration', { scenario: 'A', feed: { ...plantFeed, plsStreams: [{ copper: '2', flow: 100 }] } }, 'feed.plsStreams[0].copper'],
    ['a missing target', { scenario: 'A', mode: 'optimize', feed }, 'target'],
  ])('rejects %s', (_label, body, field) => {
    let caught: unknown;
    try {
      parseSxCircuitRequest(body);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidInputError);
    expect(caught instanceof InvalidInputError && caught.field).toBe(field);
  });
});
