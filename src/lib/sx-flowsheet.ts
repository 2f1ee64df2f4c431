import type { CircuitFlows, CircuitTopology } from './sx-types';
import type { ResolvedFeed } from './sx-feed';

export type InflowSource = 'pls' | 'raffinate' | 'rich-electrolyte';

export interface StageInflow {
  source: InflowSource;
  flow: number; // m³/h
}

export interface Flowsheet {
  plsFlow: number;
  organicFlow: number;
  stripLiquorFlow: number;
  electrolyteBleedFlow: number;
  raffinateRecycleFlow: number;
  finalAqueousFlow: number;  // leaving the last extraction stage, before the recycle split
  netRaffinateFlow: number;
  extractionFlows: number[]; // aqueous flow through each extraction stage
  inflows: StageInflow[][];  // fresh or routed aqueous entering each extraction stage
}

export interface InflowConcentrations {
  pls: number;
  raffinate: number;
  richElectrolyte: number;
}

/**
 * Lays out every aqueous and organic flow of the circuit for one feed.
 * Flows are fixed for a run; only concentrations change between sweeps.
 */
export function buildFlowsheet(topology: CircuitTopology, feed: ResolvedFeed): Flowsheet {
  const Q = feed.plsFlow;
  const organicFlow = feed.extractionOaRatio * Q;
  const stripLiquorFlow = feed.stripLiquorFlow ?? organicFlow / topology.strippingOaRatio;

  let bypassFraction = 0;
  let recycleFraction = 0;
  let bleedFraction = 0;
  for (const route of topology.routing) {
    if (route.kind === 'pls-bypass') bypassFraction += route.fraction;
    else if (route.kind === 'raffinate-recycle') recycleFraction += route.fraction;
    else bleedFraction += route.fraction;
  }

  const electrolyteBleedFlow = bleedFraction * stripLiquorFlow;
  // A_N = Q + bleed + Σr·A_N
  const finalAqueousFlow = (Q + electrolyteBleedFlow) / (1 - recycleFraction);

  const inflows: StageInflow[][] = topology.extractionStages.map(() => []);
  inflows[0].push({ source: 'pls', flow: Q * (1 - bypassFraction) });
  for (const route of topology.routing) {
    switch (route.kind) {
      case 'pls-bypass':
        inflows[route.toStage].push({ source: 'pls', flow: Q * route.fraction });
        break;
      case 'raffinate-recycle':
        inflows[route.toStage].push({ source: 'raffinate', flow: route.fraction * finalAqueousFlow });
        break;
      case 'electrolyte-bleed':
        inflows[route.toStage].push({ source: 'rich-electrolyte', flow: route.fraction * stripLiquorFlow });
        break;
    }
  }

  const extractionFlows: number[] = [];
  let cumulative = 0;
  for (const stageInflows of inflows) {
    cumulative += stageInflows.reduce((sum, inflow) => sum + inflow.flow, 0);
    extractionFlows.push(cumulative);
  }

  return {
    plsFlow: Q,
    organicFlow,
    stripLiquorFlow,
    electrolyteBleedFlow,
    raffinateRecycleFlow: recycleFraction * finalAqueousFlow,
    finalAqueousFlow,
    netRaffinateFlow: finalAqueousFlow * (1 - recycleFraction),
    extractionFlows,
    inflows,
  };
}

/** Aqueous copper entering extraction stage `index` after routed inflows are mixed in. */
export function mixedInletCopper(
  flowsheet: Flowsheet,
  index: number,
  upstreamCopper: number,
  concentrations: InflowConcentrations
): number {
  let copperLoad = index > 0 ? flowsheet.extractionFlows[index - 1] * upstreamCopper : 0;
  for (const inflow of flowsheet.inflows[index]) {
    const copper = inflow.source === 'pls'
      ? concentrations.pls
      : inflow.source === 'raffinate'
        ? concentrations.raffinate
        : concentrations.richElectrolyte;
    copperLoad += inflow.flow * copper;
  }
  return copperLoad / flowsheet.extractionFlows[index];
}

export function toCircuitFlows(flowsheet: Flowsheet): CircuitFlows {
  return {
    pls: flowsheet.plsFlow,
    organic: flowsheet.organicFlow,
    raffinate: flowsheet.netRaffinateFlow,
    stripLiquor: flowsheet.stripLiquorFlow,
    electrolyteBleed: flowsheet.electrolyteBleedFlow,
    raffinateRecycle: flowsheet.raffinateRecycleFlow,
    extractionStages: [...flowsheet.extractionFlows],
  };
}
