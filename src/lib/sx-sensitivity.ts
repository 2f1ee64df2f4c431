import type { CircuitTopology, FeedSpecification, RunOptions, StageProfile } from './sx-types';
import type { CounterCurrentSolver } from './sx-countercurrent-solver';

export type SensitivityParameter = 'organicToAqueous' | 'plsCopper';

export interface SensitivityFinding {
  parameter: SensitivityParameter;
  label: string;
  relativeChange: number;   // fraction applied to the parameter
  recoveryChange: number;   // percentage points of extraction recovery
}

export interface SensitivityReport {
  findings: SensitivityFinding[];
  recommendations: string[];
}

const PERTURBATION = 0.05;
const SIGNIFICANT_CHANGE = 0.1; // percentage points

export const STABLE_PROCESS_MESSAGE =
  'The process is stable and shows little sensitivity to small changes in the main parameters.';

const perturbations: Array<{
  parameter: SensitivityParameter;
  label: string;
  apply: (topology: CircuitTopology, feed: FeedSpecification, factor: number) => FeedSpecification;
}> = [
  {
    parameter: 'organicToAqueous',
    label: 'extraction O/A ratio',
    apply: (topology, feed, factor) => ({
      ...feed,
      organicToAqueous: (feed.organicToAqueous ?? topology.extractionOaRatio) * factor,
    }),
  },
  {
    parameter: 'plsCopper',
    label: 'PLS copper',
    apply: (_topology, feed, factor) => ({
      ...feed,
      plsStreams: feed.plsStreams.map(stream => ({ ...stream, copper: stream.copper * factor })),
    }),
  },
];

/**
 * Re-runs the plant with each main parameter raised by 5 % and recommends
 * the moves that shift extraction recovery by more than 0.1 point.
 */
export function analyzeSensitivity(
  solver: CounterCurrentSolver,
  topology: CircuitTopology,
  feed: FeedSpecification,
  baseProfile: StageProfile,
  options: RunOptions = {}
): SensitivityReport {
  const findings: SensitivityFinding[] = [];
  const recommendations: string[] = [];

  for (const perturbation of perturbations) {
    const perturbed = solver.solve(topology, perturbation.apply(topology, feed, 1 + PERTURBATION), options);
    const recoveryChange = perturbed.extractionRecovery - baseProfile.extractionRecovery;
    findings.push({
      parameter: perturbation.parameter,
      label: perturbation.label,
      relativeChange: PERTURBATION,
      recoveryChange,
    });

    if (Math.abs(recoveryChange) > SIGNIFICANT_CHANGE) {
      const direction = recoveryChange > 0 ? 'raises' : 'lowers';
      recommendations.push(
        `Suggestion: a ${(PERTURBATION * 100).toFixed(0)}% increase in ${perturbation.label} ${direction} ` +
          `extraction recovery by about ${Math.abs(recoveryChange).toFixed(2)} percentage points.`
      );
    }
  }

  if (recommendations.length === 0) recommendations.push(STABLE_PROCESS_MESSAGE);
  return { findings, recommendations };
}
