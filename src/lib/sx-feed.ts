import type { CircuitTopology, FeedSpecification, ProcessConditions, TopologyStage } from './sx-types';
import { DEFAULT_PLS_PH, DEFAULT_STRIP_ACID, DEFAULT_TEMPERATURE } from './sx-config';
import { InvalidInputError } from './sx-errors';

/** Feed after validation, with every optional field filled in. */
export interface ResolvedFeed {
  extractantVv: number;
  plsCopper: number; // blended, g/L
  plsFlow: number;   // total, m³/h
  leanElectrolyteCopper: number;
  stripLiquorFlow: number | null; // null: derived from the stripping O/A
  stripAcid: number;
  extractionOaRatio: number;
  plsPh: number;
  temperature: number;
  extractionEfficiencies: number[]; // fractions, one per stage
  strippingEfficiencies: number[];
}

function requireFinite(field: string, value: unknown): number {
  if (typeof value !== 'number' || !isFinite(value)) {
    throw new InvalidInputError(field, `expected a finite number, got ${String(value)}.`);
  }
  return value;
}

function requirePositive(field: string, value: unknown): number {
  const n = requireFinite(field, value);
  if (n <= 0) throw new InvalidInputError(field, `must be greater than zero, got ${n}.`);
  return n;
}

function requireNonNegative(field: string, value: unknown): number {
  const n = requireFinite(field, value);
  if (n < 0) throw new InvalidInputError(field, `must not be negative, got ${n}.`);
  return n;
}

function resolveEfficiencies(
  field: string,
  stages: readonly TopologyStage[],
  overrides: number[] | undefined
): number[] {
  if (overrides === undefined) return stages.map(stage => stage.mixerEfficiency / 100);
  if (!Array.isArray(overrides) || overrides.length !== stages.length) {
    throw new InvalidInputError(field, `expected ${stages.length} values, one per stage.`);
  }
  return overrides.map((value, i) => {
    const efficiency = requirePositive(`${field}[${i}]`, value);
    if (efficiency > 100) {
      throw new InvalidInputError(`${field}[${i}]`, `mixer efficiency cannot exceed 100 %, got ${efficiency}.`);
    }
    return efficiency / 100;
  });
}

/**
 * Checks a feed against a topology and blends the PLS streams by flow.
 * Throws InvalidInputError naming the offending field.
 */
export function resolveFeed(topology: CircuitTopology, feed: FeedSpecification): ResolvedFeed {
  const extractantVv = requirePositive('extractantVv', feed.extractantVv);

  if (!Array.isArray(feed.plsStreams) || feed.plsStreams.length === 0) {
    throw new InvalidInputError('plsStreams', 'at least one PLS stream is required.');
  }
  let plsFlow = 0;
  let plsCopperLoad = 0; // kg/h
  feed.plsStreams.forEach((stream, i) => {
    const copper = requireNonNegative(`plsStreams[${i}].copper`, stream.copper);
    const flow = requirePositive(`plsStreams[${i}].flow`, stream.flow);
    plsFlow += flow;
    plsCopperLoad += copper * flow;
  });
  const plsCopper = plsCopperLoad / plsFlow;
  if (plsCopper <= 0) {
    throw new InvalidInputError('plsStreams', 'the blended PLS carries no copper.');
  }

  if (!feed.stripLiquor) {
    throw new InvalidInputError('stripLiquor', 'strip liquor is required.');
  }
  const leanElectrolyteCopper = requireNonNegative('stripLiquor.copper', feed.stripLiquor.copper);
  const stripLiquorFlow = feed.stripLiquor.flow === undefined
    ? null
    : requirePositive('stripLiquor.flow', feed.stripLiquor.flow);
  const stripAcid = feed.stripLiquor.acid === undefined
    ? DEFAULT_STRIP_ACID
    : requirePositive('stripLiquor.acid', feed.stripLiquor.acid);

  const extractionOaRatio = feed.organicToAqueous === undefined
    ? topology.extractionOaRatio
    : requirePositive('organicToAqueous', feed.organicToAqueous);

  const conditions: ProcessConditions = feed.conditions ?? {};
  const plsPh = conditions.plsPh === undefined
    ? DEFAULT_PLS_PH
    : requireFinite('conditions.plsPh', conditions.plsPh);
  const temperature = conditions.temperature === undefined
    ? DEFAULT_TEMPERATURE
    : requireFinite('conditions.temperature', conditions.temperature);

  return {
    extractantVv,
    plsCopper,
    plsFlow,
    leanElectrolyteCopper,
    stripLiquorFlow,
    stripAcid,
    extractionOaRatio,
    plsPh,
    temperature,
    extractionEfficiencies: resolveEfficiencies(
      'mixerEfficiencies.extraction', topology.extractionStages, feed.mixerEfficiencies?.extraction
    ),
    strippingEfficiencies: resolveEfficiencies(
      'mixerEfficiencies.stripping', topology.strippingStages, feed.mixerEfficiencies?.stripping
    ),
  };
}
