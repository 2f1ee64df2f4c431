import type { CircuitTopologyDefinition, ScenarioId, StageDefinition, StreamRouting } from '@/lib/sx-types';

const DEFAULT_EXTRACTION_OA = 1.0;
const DEFAULT_STRIPPING_OA = 5.0;

const stages = (count: number): StageDefinition[] =>
  Array.from({ length: count }, () => ({ mixerEfficiency: 95 }));

interface ScenarioPair {
  ids: [ScenarioId, ScenarioId]; // 1 stripping stage, 2 stripping stages
  extraction: number;
  name: string;
  description: string;
  routing: StreamRouting[];
}

/* ------------------------- circuit families ------------------------- */
const scenarioPairs: ScenarioPair[] = [
  {
    ids: ['A', 'B'], extraction: 2, name: 'Series',
    description: 'Straight countercurrent extraction train.',
    routing: [],
  },
  {
    ids: ['C', 'D'], extraction: 3, name: 'Series',
    description: 'Straight countercurrent extraction train.',
    routing: [],
  },
  {
    ids: ['E', 'F'], extraction: 3, name: 'PLS bypass',
    description: '25 % of the PLS bypasses E1 and joins the aqueous feed of E2.',
    routing: [{ kind: 'pls-bypass', fraction: 0.25, toStage: 1 }],
  },
  {
    ids: ['G', 'H'], extraction: 3, name: 'Raffinate recycle',
    description: '15 % of the raffinate is returned to E1.',
    routing: [{ kind: 'raffinate-recycle', fraction: 0.15, toStage: 0 }],
  },
  {
    ids: ['I', 'J'], extraction: 3, name: 'Electrolyte bleed',
    description: '5 % of the rich electrolyte is bled to the aqueous feed of E1.',
    routing: [{ kind: 'electrolyte-bleed', fraction: 0.05, toStage: 0 }],
  },
  {
    ids: ['K', 'L'], extraction: 4, name: 'Series',
    description: 'Straight countercurrent extraction train.',
    routing: [],
  },
  {
    ids: ['M', 'N'], extraction: 4, name: 'PLS bypass',
    description: '30 % of the PLS bypasses E1–E2 and joins the aqueous feed of E3.',
    routing: [{ kind: 'pls-bypass', fraction: 0.3, toStage: 2 }],
  },
  {
    ids: ['O', 'P'], extraction: 4, name: 'Raffinate recycle',
    description: '20 % of the raffinate is returned to E1.',
    routing: [{ kind: 'raffinate-recycle', fraction: 0.2, toStage: 0 }],
  },
  {
    ids: ['Q', 'R'], extraction: 4, name: 'Bypass with electrolyte bleed',
    description: '20 % PLS bypass to E2 and 5 % rich-electrolyte bleed to E1.',
    routing: [
      { kind: 'pls-bypass', fraction: 0.2, toStage: 1 },
      { kind: 'electrolyte-bleed', fraction: 0.05, toStage: 0 },
    ],
  },
];

export const sxScenarioDefinitions: CircuitTopologyDefinition[] = scenarioPairs.flatMap(pair =>
  pair.ids.map((id, i) => {
    const stripping = i + 1;
    return {
      id,
      name: `${pair.extraction}E × ${stripping}S ${pair.name}`,
      description: pair.description,
      extractionStages: stages(pair.extraction),
      strippingStages: stages(stripping),
      extractionOaRatio: DEFAULT_EXTRACTION_OA,
      strippingOaRatio: DEFAULT_STRIPPING_OA,
      routing: pair.routing.map(route => ({ ...route })),
    };
  })
);
