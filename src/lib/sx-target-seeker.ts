import type {
  CircuitTopology,
  FeedWithoutExtractant,
  OptimizedStageProfile,
  RunOptions,
  SearchBounds,
  SearchTrial,
  SeekerConfig,
  StageProfile,
} from './sx-types';
import { DEFAULT_SEEKER_CONFIG } from './sx-config';
import { CounterCurrentSolver } from './sx-countercurrent-solver';
import { InvalidInputError, UnreachableTargetError } from './sx-errors';
import { brentRoot } from './sx-root-finding';

export interface SeekOverrides {
  searchBounds?: SearchBounds;
  tolerance?: number;
}

/**
 * Finds the extractant concentration whose plant run reaches a target
 * stripping ratio. The ratio rises with v/v for most feeds but can pass a
 * maximum inside the bounds (four extraction stages at a high O/A), so when
 * the endpoints fail to straddle the target the bounds are scanned in
 * `scanIntervals` steps for the first sign change before Brent's method runs.
 */
export class TargetSeeker {
  readonly solver: CounterCurrentSolver;
  readonly config: SeekerConfig;

  constructor(solver: CounterCurrentSolver, config: SeekerConfig = DEFAULT_SEEKER_CONFIG) {
    this.solver = solver;
    this.config = { ...config, searchBounds: { ...config.searchBounds } };
  }

  seek(
    topology: CircuitTopology,
    feed: FeedWithoutExtractant,
    targetRatio: number,
    overrides: SeekOverrides = {},
    options: RunOptions = {}
  ): OptimizedStageProfile {
    const bounds = overrides.searchBounds ?? this.config.searchBounds;
    const tolerance = overrides.tolerance ?? this.config.tolerance;
    const { maxTrials, scanIntervals } = this.config;

    if (typeof targetRatio !== 'number' || !isFinite(targetRatio) || targetRatio <= 0 || targetRatio >= 100) {
      throw new InvalidInputError('target', `stripping ratio target must lie in (0, 100) %, got ${targetRatio}.`);
    }
    if (!isFinite(bounds.min) || !isFinite(bounds.max) || bounds.min <= 0 || bounds.min >= bounds.max) {
      throw new InvalidInputError('searchBounds', `expected 0 < min < max, got [${bounds.min}, ${bounds.max}].`);
    }
    if (!(tolerance > 0) || !isFinite(tolerance)) {
      throw new InvalidInputError('tolerance', `must be a positive number, got ${tolerance}.`);
    }
    if (!Number.isInteger(maxTrials) || maxTrials < 2) {
      throw new InvalidInputError('maxTrials', `at least two trials are needed to bracket the target, got ${maxTrials}.`);
    }
    if (!Number.isInteger(scanIntervals) || scanIntervals < 1) {
      throw new InvalidInputError('scanIntervals', `expected a positive integer, got ${scanIntervals}.`);
    }

    // --- Memoized objective: one plant run per distinct v/v ---
    const runs = new Map<number, StageProfile>();
    const trials: SearchTrial[] = [];
    let budgetExhausted = false;

    const run = (extractantVv: number): StageProfile | null => {
      const cached = runs.get(extractantVv);
      if (cached) return cached;
      const outOfTime = options.deadline !== undefined && Date.now() >= options.deadline;
      if (trials.length >= maxTrials || (outOfTime && trials.length >= 2)) {
        budgetExhausted = true;
        return null;
      }
      const profile = this.solver.solve(topology, { ...feed, extractantVv }, options);
      runs.set(extractantVv, profile);
      trials.push({ extractantVv, strippingRatio: profile.strippingRatio, converged: profile.converged });
      return profile;
    };
    const objective = (extractantVv: number): number => {
      const profile = run(extractantVv);
      return profile ? profile.strippingRatio - targetRatio : Number.NaN;
    };

    const finish = (profile: StageProfile, converged: boolean): OptimizedStageProfile => ({
      ...profile,
      search: {
        targetRatio,
        tolerance,
        bounds: { ...bounds },
        converged,
        error: profile.strippingRatio - targetRatio,
        trials,
      },
    });

    const low = run(bounds.min);
    const high = run(bounds.max);
    if (!low || !high) {
      throw new InvalidInputError('maxTrials', 'the trial budget does not cover the search bounds.');
    }

    // Budget or deadline ran out: hand back the closest trial.
    const closest = (): OptimizedStageProfile => {
      let best = low;
      for (const profile of runs.values()) {
        if (Math.abs(profile.strippingRatio - targetRatio) < Math.abs(best.strippingRatio - targetRatio)) {
          best = profile;
        }
      }
      return finish(best, false);
    };
    const fLow = low.strippingRatio - targetRatio;
    const fHigh = high.strippingRatio - targetRatio;

    if (Math.abs(fLow) <= tolerance) return finish(low, low.converged);
    if (Math.abs(fHigh) <= tolerance) return finish(high, high.converged);

    let bracket: SearchBounds | null = fLow * fHigh < 0 ? { min: bounds.min, max: bounds.max } : null;
    if (!bracket) {
      let previous = { extractantVv: bounds.min, f: fLow };
      for (let k = 1; k < scanIntervals && !bracket; k++) {
        const extractantVv = bounds.min + ((bounds.max - bounds.min) * k) / scanIntervals;
        const profile = run(extractantVv);
        if (!profile) return closest();
        const f = profile.strippingRatio - targetRatio;
        if (Math.abs(f) <= tolerance) return finish(profile, profile.converged);
        if (previous.f * f < 0) bracket = { min: previous.extractantVv, max: extractantVv };
        previous = { extractantVv, f };
      }
    }
    if (!bracket) {
      const ratios = trials.map(trial => trial.strippingRatio);
      throw new UnreachableTargetError(targetRatio, Math.min(...ratios), Math.max(...ratios));
    }

    // Bracket width tolerance keeps Brent from splitting hairs in v/v once the ratio is on target.
    const root = brentRoot(objective, bracket.min, bracket.max, tolerance, maxTrials, 1e-6);
    const found = root === null ? undefined : runs.get(root);
    if (found && !budgetExhausted && Math.abs(found.strippingRatio - targetRatio) <= tolerance) {
      return finish(found, found.converged);
    }
    return closest();
  }
}
