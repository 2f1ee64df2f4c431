// Structural failures of the SX core. Non-convergence is not an error: it is
// reported through `StageProfile.converged`.

export type SxErrorKind =
  | 'configuration'
  | 'unknown-scenario'
  | 'invalid-input'
  | 'unreachable-target';

export class SxCircuitError extends Error {
  readonly kind: SxErrorKind;

  constructor(kind: SxErrorKind, message: string) {
    super(message);
    this.name = 'SxCircuitError';
    this.kind = kind;
  }
}

export class ConfigurationError extends SxCircuitError {
  constructor(message: string, kind: SxErrorKind = 'configuration') {
    super(kind, message);
    this.name = 'ConfigurationError';
  }
}

export class UnknownScenarioError extends ConfigurationError {
  readonly scenarioId: string;

  constructor(scenarioId: string) {
    super(`Scenario "${scenarioId}" is not registered.`, 'unknown-scenario');
    this.name = 'UnknownScenarioError';
    this.scenarioId = scenarioId;
  }
}

export class InvalidInputError extends SxCircuitError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('invalid-input', `${field}: ${message}`);
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export class UnreachableTargetError extends SxCircuitError {
  readonly targetRatio: number;
  readonly achievableMin: number;
  readonly achievableMax: number;

  constructor(targetRatio: number, achievableMin: number, achievableMax: number) {
    super(
      'unreachable-target',
      `Target stripping ratio ${targetRatio.toFixed(2)}% is outside the achievable range ` +
        `${achievableMin.toFixed(2)}–${achievableMax.toFixed(2)}% for the search bounds.`
    );
    this.name = 'UnreachableTargetError';
    this.targetRatio = targetRatio;
    this.achievableMin = achievableMin;
    this.achievableMax = achievableMax;
  }
}

export function isSxCircuitError(error: unknown): error is SxCircuitError {
  return error instanceof SxCircuitError;
}
