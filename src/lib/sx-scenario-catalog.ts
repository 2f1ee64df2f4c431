import type { CircuitTopology, ScenarioId } from './sx-types';
import { sxScenarioDefinitions } from '@/data/sx-scenarios';
import { createCircuitTopology } from './sx-topology';
import { UnknownScenarioError } from './sx-errors';

export const SCENARIO_IDS: readonly ScenarioId[] = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I',
  'J', 'K', 'L', 'M', 'N', 'O', 'P', 'Q', 'R',
];

// Built once; topologies are frozen so they are safe to hand out.
const catalog: ReadonlyMap<string, CircuitTopology> = new Map<string, CircuitTopology>(
  sxScenarioDefinitions.map(definition => [definition.id, createCircuitTopology(definition)])
);

export function getScenario(id: string): CircuitTopology {
  const topology = catalog.get(id);
  if (!topology) throw new UnknownScenarioError(id);
  return topology;
}

export function listScenarios(): CircuitTopology[] {
  return SCENARIO_IDS.map(id => getScenario(id));
}
