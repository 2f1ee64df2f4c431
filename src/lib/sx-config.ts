import type {
  IsothermParameters,
  ProjectorConfig,
  SeekerConfig,
  SolverConfig,
  SxEngineConfig,
} from './sx-types';

// Lix984N-type hydroxyoxime reagent in kerosene diluent.
export const DEFAULT_ISOTHERM_PARAMETERS: IsothermParameters = {
  loadingPerVv: 0.517,
  extractionAffinity: 2.5,
  referencePh: 2.0,
  phSensitivity: 0.5,
  referenceTemperature: 25,
  temperatureCoefficient: 0.01,
  strippingAffinity: 400,
  referenceAcid: 180,
  acidExponent: 2,
};

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  tolerance: 1e-6,
  maxSweeps: 200,
  stageTolerance: 1e-12,
};

export const DEFAULT_SEEKER_CONFIG: SeekerConfig = {
  searchBounds: { min: 1, max: 35 },
  tolerance: 0.1,
  maxTrials: 60,
  scanIntervals: 8,
};

export const DEFAULT_PROJECTOR_CONFIG: ProjectorConfig = {
  curvePoints: 50,
  rangePadding: 1.1,
};

export const DEFAULT_SX_CONFIG: SxEngineConfig = {
  isotherm: DEFAULT_ISOTHERM_PARAMETERS,
  solver: DEFAULT_SOLVER_CONFIG,
  seeker: DEFAULT_SEEKER_CONFIG,
  projector: DEFAULT_PROJECTOR_CONFIG,
};

// Process defaults used when a feed leaves a field out.
export const DEFAULT_MIXER_EFFICIENCY = 95; // %
export const DEFAULT_STRIP_ACID = 180;      // g/L H₂SO₄
export const DEFAULT_PLS_PH = 2.0;
export const DEFAULT_TEMPERATURE = 25;      // °C

type Env = Record<string, string | undefined>;

function readPositive(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = parseFloat(raw);
  return isFinite(value) && value > 0 ? value : undefined;
}

function readInteger(env: Env, key: string): number | undefined {
  const value = readPositive(env, key);
  return value !== undefined && Number.isInteger(value) ? value : undefined;
}

/**
 * Overlays SX_* environment variables on the defaults. Values that do not
 * parse as positive numbers are ignored.
 */
export function loadSxConfigFromEnv(env: Env = process.env): SxEngineConfig {
  const searchMin = readPositive(env, 'SX_SEARCH_MIN_VV') ?? DEFAULT_SEEKER_CONFIG.searchBounds.min;
  const searchMax = readPositive(env, 'SX_SEARCH_MAX_VV') ?? DEFAULT_SEEKER_CONFIG.searchBounds.max;

  return {
    isotherm: { ...DEFAULT_ISOTHERM_PARAMETERS },
    solver: {
      ...DEFAULT_SOLVER_CONFIG,
      tolerance: readPositive(env, 'SX_SOLVER_TOLERANCE') ?? DEFAULT_SOLVER_CONFIG.tolerance,
      maxSweeps: readInteger(env, 'SX_SOLVER_MAX_SWEEPS') ?? DEFAULT_SOLVER_CONFIG.maxSweeps,
    },
    seeker: {
      searchBounds: searchMin < searchMax
        ? { min: searchMin, max: searchMax }
        : { ...DEFAULT_SEEKER_CONFIG.searchBounds },
      tolerance: readPositive(env, 'SX_SEEKER_TOLERANCE') ?? DEFAULT_SEEKER_CONFIG.tolerance,
      maxTrials: readInteger(env, 'SX_SEEKER_MAX_TRIALS') ?? DEFAULT_SEEKER_CONFIG.maxTrials,
      scanIntervals: readInteger(env, 'SX_SEEKER_SCAN_INTERVALS') ?? DEFAULT_SEEKER_CONFIG.scanIntervals,
    },
    projector: {
      ...DEFAULT_PROJECTOR_CONFIG,
      curvePoints: readInteger(env, 'SX_CURVE_POINTS') ?? DEFAULT_PROJECTOR_CONFIG.curvePoints,
    },
  };
}
