// --- Shared Data Structures for the Copper SX Circuit ---
// Concentrations are g/L Cu, flows are m³/h, extractant is % v/v.

export type PhaseKind = 'extraction' | 'stripping';

export type ScenarioId =
  | 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G' | 'H' | 'I'
  | 'J' | 'K' | 'L' | 'M' | 'N' | 'O' | 'P' | 'Q' | 'R';

// --- Configuration values ---

export interface IsothermParameters {
  loadingPerVv: number;           // Max organic loading per % v/v of reagent (g/L per %)
  extractionAffinity: number;     // Kₑ at reference pH/temperature (g/L)
  referencePh: number;
  phSensitivity: number;          // Decades of Kₑ per pH unit below the reference
  referenceTemperature: number;   // °C
  temperatureCoefficient: number; // Fractional change of Kₑ per °C
  strippingAffinity: number;      // Kₛ at reference acid (g/L)
  referenceAcid: number;          // g/L H₂SO₄
  acidExponent: number;
}

export interface SolverConfig {
  tolerance: number;      // Relative change between sweeps
  maxSweeps: number;
  stageTolerance: number; // Absolute tolerance of the per-stage root solve (g/L)
}

export interface SearchBounds {
  min: number; // % v/v
  max: number; // % v/v
}

export interface SeekerConfig {
  searchBounds: SearchBounds;
  tolerance: number; // Percentage points of stripping ratio
  maxTrials: number;
  scanIntervals: number; // Steps of the bracket scan when the bounds do not straddle the target
}

export interface ProjectorConfig {
  curvePoints: number;
  rangePadding: number; // Multiplier on the largest concentration in the profile
}

export interface SxEngineConfig {
  isotherm: IsothermParameters;
  solver: SolverConfig;
  seeker: SeekerConfig;
  projector: ProjectorConfig;
}

export interface RunOptions {
  deadline?: number; // Epoch ms, checked between sweeps and trials
}

// --- Topology ---

export interface StageDefinition {
  mixerEfficiency?: number; // % (defaults to 95)
}

export type StreamRouting =
  | { kind: 'pls-bypass'; fraction: number; toStage: number }
  | { kind: 'raffinate-recycle'; fraction: number; toStage: number }
  | { kind: 'electrolyte-bleed'; fraction: number; toStage: number };

export interface CircuitTopologyDefinition {
  id: string;
  name: string;
  description?: string;
  extractionStages: StageDefinition[];
  strippingStages: StageDefinition[];
  extractionOaRatio: number;
  strippingOaRatio: number;
  routing?: StreamRouting[];
}

export interface TopologyStage {
  phase: PhaseKind;
  index: number;
  label: string;
  mixerEfficiency: number;
}

export interface CircuitTopology {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly extractionStages: readonly TopologyStage[];
  readonly strippingStages: readonly TopologyStage[];
  readonly extractionOaRatio: number;
  readonly strippingOaRatio: number;
  readonly routing: readonly StreamRouting[];
  readonly hasCrossPhaseRecycle: boolean;
}

// --- Feed ---

export interface AqueousStream {
  copper: number; // g/L
  flow: number;   // m³/h
}

export interface StripLiquor {
  copper: number;  // Lean electrolyte copper (g/L)
  flow?: number;   // m³/h; derived from the stripping O/A when absent
  acid?: number;   // g/L H₂SO₄
}

export interface ProcessConditions {
  plsPh?: number;
  temperature?: number; // °C
}

export interface FeedSpecification {
  plsStreams: AqueousStream[];
  stripLiquor: StripLiquor;
  extractantVv: number;
  organicToAqueous?: number; // Overrides the topology's extraction O/A
  conditions?: ProcessConditions;
  mixerEfficiencies?: {
    extraction?: number[];
    stripping?: number[];
  };
}

export type FeedWithoutExtractant = Omit<FeedSpecification, 'extractantVv'>;

// --- Isotherm state resolved for one run ---

export interface ResolvedIsotherm {
  extractantVv: number;
  maxLoading: number;         // AML (g/L)
  extractionAffinity: number; // Kₑ at the run's pH and temperature (g/L)
  strippingAffinity: number;  // Kₛ at the run's acid (g/L)
}

// --- Results ---

export interface StreamPair {
  aqueousCopper: number;
  organicCopper: number;
  aqueousFlow: number;
  organicFlow: number;
}

export interface StageResult {
  phase: PhaseKind;
  index: number;
  label: string;
  mixerEfficiency: number;
  inlet: StreamPair;
  outlet: StreamPair;
}

export interface CircuitFlows {
  pls: number;
  organic: number;
  raffinate: number;        // Net raffinate leaving the circuit
  stripLiquor: number;
  electrolyteBleed: number;
  raffinateRecycle: number;
  extractionStages: number[];
}

export interface StageProfile {
  scenarioId: string;
  extractantVv: number;
  isotherm: ResolvedIsotherm;
  flows: CircuitFlows;
  extraction: StageResult[];
  stripping: StageResult[];
  plsCopper: number;          // Flow-weighted blend of all PLS streams
  raffinateCopper: number;
  loadedOrganicCopper: number;
  strippedOrganicCopper: number;
  richElectrolyteCopper: number;
  leanElectrolyteCopper: number;
  // Copper carried off by the strip liquor over copper presented to the circuit (PLS + bleed).
  // This is the quantity the target search drives.
  strippingRatio: number;     // %
  extractionRecovery: number; // %
  strippingEfficiency: number; // (loaded − stripped organic) / loaded, %
  loadingUtilisation: number; // loaded organic / AML, %
  netTransfer: number;        // g/L per % v/v
  converged: boolean;
  iterations: number;
  residual: number;
  diagnostics: {
    residualHistory: number[];
    convergenceIssues: string[];
  };
}

export interface SearchTrial {
  extractantVv: number;
  strippingRatio: number;
  converged: boolean;
}

export interface OptimizedStageProfile extends StageProfile {
  search: {
    targetRatio: number;
    tolerance: number;
    bounds: SearchBounds;
    converged: boolean;
    error: number; // achieved − target, percentage points
    trials: SearchTrial[];
  };
}

// --- Diagram series ---

export interface DiagramPoint {
  aqueous: number;
  organic: number;
}

export type DiagramSegment = [DiagramPoint, DiagramPoint];

export interface McCabeThieleSection {
  equilibriumCurve: DiagramPoint[];
  operatingLine: DiagramPoint[];
  stagePoints: DiagramPoint[];
  stageSteps: DiagramSegment[];
}

export interface McCabeThieleDiagram extends McCabeThieleSection {
  stripping: McCabeThieleSection;
  provisional: boolean;
}
