import type {
  FeedSpecification,
  FeedWithoutExtractant,
  McCabeThieleDiagram,
  OptimizedStageProfile,
  RunOptions,
  SearchBounds,
  StageProfile,
  SxEngineConfig,
} from './sx-types';
import { DEFAULT_SX_CONFIG } from './sx-config';
import { EquilibriumModel } from './sx-equilibrium';
import { CounterCurrentSolver } from './sx-countercurrent-solver';
import { TargetSeeker } from './sx-target-seeker';
import { McCabeThieleProjector } from './sx-mccabe-thiele';
import { getScenario } from './sx-scenario-catalog';
import { analyzeSensitivity as runSensitivity, type SensitivityReport } from './sx-sensitivity';

export interface SxEngine {
  readonly config: SxEngineConfig;
  simulatePlant(scenarioId: string, feed: FeedSpecification, options?: RunOptions): StageProfile;
  optimizeForTarget(
    scenarioId: string,
    feed: FeedWithoutExtractant,
    targetRatio: number,
    searchBounds?: SearchBounds,
    tolerance?: number,
    options?: RunOptions
  ): OptimizedStageProfile;
  projectDiagram(profile: StageProfile): McCabeThieleDiagram;
  analyzeSensitivity(scenarioId: string, feed: FeedSpecification, baseProfile: StageProfile): SensitivityReport;
}

/** Wires model, solver, seeker and projector around one configuration. */
export function createSxEngine(config: SxEngineConfig = DEFAULT_SX_CONFIG): SxEngine {
  const model = new EquilibriumModel(config.isotherm);
  const solver = new CounterCurrentSolver(model, config.solver);
  const seeker = new TargetSeeker(solver, config.seeker);
  const projector = new McCabeThieleProjector(config.projector);

  return {
    config,
    simulatePlant: (scenarioId, feed, options = {}) => solver.solve(getScenario(scenarioId), feed, options),
    optimizeForTarget: (scenarioId, feed, targetRatio, searchBounds, tolerance, options = {}) =>
      seeker.seek(getScenario(scenarioId), feed, targetRatio, { searchBounds, tolerance }, options),
    projectDiagram: profile => projector.project(profile),
    analyzeSensitivity: (scenarioId, feed, baseProfile) =>
      runSensitivity(solver, getScenario(scenarioId), feed, baseProfile),
  };
}

const defaultEngine = createSxEngine();

export function simulatePlant(scenarioId: string, feed: FeedSpecification, options?: RunOptions): StageProfile {
  return defaultEngine.simulatePlant(scenarioId, feed, options);
}

export function optimizeForTarget(
  scenarioId: string,
  feed: FeedWithoutExtractant,
  targetRatio: number,
  searchBounds?: SearchBounds,
  tolerance?: number,
  options?: RunOptions
): OptimizedStageProfile {
  return defaultEngine.optimizeForTarget(scenarioId, feed, targetRatio, searchBounds, tolerance, options);
}

export function projectDiagram(profile: StageProfile): McCabeThieleDiagram {
  return defaultEngine.projectDiagram(profile);
}

export function analyzeSensitivity(
  scenarioId: string,
  feed: FeedSpecification,
  baseProfile: StageProfile
): SensitivityReport {
  return defaultEngine.analyzeSensitivity(scenarioId, feed, baseProfile);
}
