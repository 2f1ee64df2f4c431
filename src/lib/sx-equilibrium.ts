// Copper distribution isotherms for a hydroxyoxime extractant.
//
// Extraction:  y* = AML·x / (Kₑ + x)
// Stripping:   y* = AML·e / (Kₛ + e)
//
// AML   = loadingPerVv · v/v                                   (g/L Cu)
// Kₑ    = extractionAffinity · 10^(phSensitivity·(pH_ref − pH))
//         · max(0.1, 1 + temperatureCoefficient·(T − T_ref))     (g/L)
// Kₛ    = strippingAffinity · (acid / acid_ref)^acidExponent    (g/L)
//
// x is aqueous copper in the PLS/raffinate, e is aqueous copper in the
// electrolyte and y is organic copper; all in g/L.

import type { IsothermParameters, ResolvedIsotherm } from './sx-types';
import {
  DEFAULT_ISOTHERM_PARAMETERS,
  DEFAULT_PLS_PH,
  DEFAULT_STRIP_ACID,
  DEFAULT_TEMPERATURE,
} from './sx-config';
import { InvalidInputError } from './sx-errors';

export interface IsothermConditions {
  plsPh: number;
  temperature: number; // °C
  stripAcid: number;   // g/L H₂SO₄
}

export class EquilibriumModel {
  readonly parameters: Readonly<IsothermParameters>;

  constructor(parameters: IsothermParameters = DEFAULT_ISOTHERM_PARAMETERS) {
    this.parameters = Object.freeze({ ...parameters });
  }

  maxLoading(extractantVv: number): number {
    return extractantVv > 0 ? this.parameters.loadingPerVv * extractantVv : 0;
  }

  /** Kₑ at the given PLS pH and temperature. */
  extractionAffinity(plsPh: number, temperature: number): number {
    const p = this.parameters;
    const phFactor = Math.pow(10, p.phSensitivity * (p.referencePh - plsPh));
    const temperatureFactor = Math.max(0.1, 1 + p.temperatureCoefficient * (temperature - p.referenceTemperature));
    return p.extractionAffinity * phFactor * temperatureFactor;
  }

  /** Kₛ at the given strip-liquor acidity. */
  strippingAffinity(stripAcid: number): number {
    const p = this.parameters;
    return p.strippingAffinity * Math.pow(stripAcid / p.referenceAcid, p.acidExponent);
  }

  /** Fixes every constant of both isotherms for one extractant concentration. */
  resolve(extractantVv: number, conditions: IsothermConditions): ResolvedIsotherm {
    if (!(extractantVv > 0) || !isFinite(extractantVv)) {
      throw new InvalidInputError('extractantVv', 'extractant concentration must be a positive number.');
    }
    if (!(conditions.stripAcid > 0)) {
      throw new InvalidInputError('stripLiquor.acid', 'strip acid must be positive.');
    }
    return {
      extractantVv,
      maxLoading: this.maxLoading(extractantVv),
      extractionAffinity: this.extractionAffinity(conditions.plsPh, conditions.temperature),
      strippingAffinity: this.strippingAffinity(conditions.stripAcid),
    };
  }

  /** Extraction-side equilibrium organic copper for one aqueous concentration. */
  equilibriumOrganic(aqueous: number, extractantVv: number, conditions: Partial<IsothermConditions> = {}): number {
    return extractionOrganic(this.resolve(extractantVv, withDefaults(conditions)), aqueous);
  }

  /** Stripping-side equilibrium electrolyte copper for one organic concentration. */
  equilibriumStripAqueous(organic: number, extractantVv: number, stripAcid: number = DEFAULT_STRIP_ACID): number {
    return strippingAqueous(this.resolve(extractantVv, withDefaults({ stripAcid })), organic);
  }
}

function withDefaults(conditions: Partial<IsothermConditions>): IsothermConditions {
  return {
    plsPh: conditions.plsPh ?? DEFAULT_PLS_PH,
    temperature: conditions.temperature ?? DEFAULT_TEMPERATURE,
    stripAcid: conditions.stripAcid ?? DEFAULT_STRIP_ACID,
  };
}

// --- Isotherm evaluation on resolved constants ---

/** Organic copper in equilibrium with PLS/raffinate at `aqueous` g/L. */
export function extractionOrganic(isotherm: ResolvedIsotherm, aqueous: number): number {
  if (aqueous <= 0 || isotherm.maxLoading <= 0) return 0;
  return (isotherm.maxLoading * aqueous) / (isotherm.extractionAffinity + aqueous);
}

/** Aqueous copper in equilibrium with `organic` g/L on the extraction side. */
export function extractionAqueous(isotherm: ResolvedIsotherm, organic: number): number {
  if (organic <= 0) return 0;
  if (organic >= isotherm.maxLoading) return Number.POSITIVE_INFINITY;
  return (isotherm.extractionAffinity * organic) / (isotherm.maxLoading - organic);
}

/** Organic copper in equilibrium with electrolyte at `electrolyte` g/L. */
export function strippingOrganic(isotherm: ResolvedIsotherm, electrolyte: number): number {
  if (electrolyte <= 0 || isotherm.maxLoading <= 0) return 0;
  return (isotherm.maxLoading * electrolyte) / (isotherm.strippingAffinity + electrolyte);
}

/** Electrolyte copper in equilibrium with `organic` g/L on the stripping side. */
export function strippingAqueous(isotherm: ResolvedIsotherm, organic: number): number {
  if (organic <= 0) return 0;
  if (organic >= isotherm.maxLoading) return Number.POSITIVE_INFINITY;
  return (isotherm.strippingAffinity * organic) / (isotherm.maxLoading - organic);
}
