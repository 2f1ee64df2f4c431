import type {
  CircuitTopology,
  CircuitTopologyDefinition,
  PhaseKind,
  StageDefinition,
  StreamRouting,
  TopologyStage,
} from './sx-types';
import { DEFAULT_MIXER_EFFICIENCY } from './sx-config';
import { ConfigurationError } from './sx-errors';

function isPositive(value: number): boolean {
  return typeof value === 'number' && isFinite(value) && value > 0;
}

function buildStages(
  topologyId: string,
  phase: PhaseKind,
  definitions: StageDefinition[]
): TopologyStage[] {
  if (!Array.isArray(definitions) || definitions.length === 0) {
    throw new ConfigurationError(`Topology ${topologyId}: at least one ${phase} stage is required.`);
  }
  const prefix = phase === 'extraction' ? 'E' : 'S';
  return definitions.map((stage, index) => {
    const mixerEfficiency = stage.mixerEfficiency ?? DEFAULT_MIXER_EFFICIENCY;
    if (!isPositive(mixerEfficiency) || mixerEfficiency > 100) {
      throw new ConfigurationError(
        `Topology ${topologyId}: mixer efficiency of ${prefix}${index + 1} must be in (0, 100], got ${mixerEfficiency}.`
      );
    }
    return { phase, index, label: `${prefix}${index + 1}`, mixerEfficiency };
  });
}

function validateRouting(topologyId: string, routing: StreamRouting[], extractionCount: number): void {
  let bypassTotal = 0;
  let recycleTotal = 0;

  routing.forEach((route, i) => {
    const where = `Topology ${topologyId}: routing[${i}] (${route.kind})`;
    if (!(route.fraction > 0 && route.fraction < 1)) {
      throw new ConfigurationError(`${where} fraction must be between 0 and 1, got ${route.fraction}.`);
    }
    if (!Number.isInteger(route.toStage) || route.toStage < 0 || route.toStage >= extractionCount) {
      throw new ConfigurationError(`${where} references extraction stage ${route.toStage}, which does not exist.`);
    }
    switch (route.kind) {
      case 'pls-bypass':
        if (route.toStage === 0) {
          throw new ConfigurationError(`${where} cannot bypass into the first extraction stage.`);
        }
        bypassTotal += route.fraction;
        break;
      case 'raffinate-recycle':
        recycleTotal += route.fraction;
        break;
      case 'electrolyte-bleed':
        break;
    }
  });

  if (bypassTotal >= 1) {
    throw new ConfigurationError(`Topology ${topologyId}: PLS bypass fractions sum to ${bypassTotal}, leaving no feed for E1.`);
  }
  if (recycleTotal >= 1) {
    throw new ConfigurationError(`Topology ${topologyId}: raffinate recycle fractions sum to ${recycleTotal}.`);
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates a circuit definition and returns an immutable topology.
 * Throws ConfigurationError on any malformed field.
 */
export function createCircuitTopology(definition: CircuitTopologyDefinition): CircuitTopology {
  const id = definition.id;
  if (!id || typeof id !== 'string') {
    throw new ConfigurationError('Topology id is required.');
  }
  if (!isPositive(definition.extractionOaRatio)) {
    throw new ConfigurationError(`Topology ${id}: extraction O/A ratio must be positive, got ${definition.extractionOaRatio}.`);
  }
  if (!isPositive(definition.strippingOaRatio)) {
    throw new ConfigurationError(`Topology ${id}: stripping O/A ratio must be positive, got ${definition.strippingOaRatio}.`);
  }

  const extractionStages = buildStages(id, 'extraction', definition.extractionStages);
  const strippingStages = buildStages(id, 'stripping', definition.strippingStages);
  const routing = (definition.routing ?? []).map(route => ({ ...route }));
  validateRouting(id, routing, extractionStages.length);

  return deepFreeze<CircuitTopology>({
    id,
    name: definition.name,
    description: definition.description ?? '',
    extractionStages,
    strippingStages,
    extractionOaRatio: definition.extractionOaRatio,
    strippingOaRatio: definition.strippingOaRatio,
    routing,
    hasCrossPhaseRecycle: routing.some(route => route.kind === 'electrolyte-bleed'),
  });
}

/** Short text form used by the catalog listing, e.g. "3E × 2S". */
export function describeStageCounts(topology: CircuitTopology): string {
  return `${topology.extractionStages.length}E × ${topology.strippingStages.length}S`;
}
