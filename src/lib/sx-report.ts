import type { StageProfile } from './sx-types';

export interface SummaryRow {
  label: string;
  value: string;
  unit: string;
}

export function formatNumber(value: number, decimals: number): string {
  if (!isFinite(value)) return 'N/A';
  return value.toFixed(decimals);
}

/** KPI table for a solved profile, values pre-formatted for display. */
export function summarizeProfile(profile: StageProfile): SummaryRow[] {
  return [
    { label: 'Extractant concentration', value: formatNumber(profile.extractantVv, 2), unit: '% v/v' },
    { label: 'Maximum loading (AML)', value: formatNumber(profile.isotherm.maxLoading, 2), unit: 'g/L' },
    { label: 'Loaded organic', value: formatNumber(profile.loadedOrganicCopper, 2), unit: 'g/L' },
    { label: 'Stripped organic', value: formatNumber(profile.strippedOrganicCopper, 2), unit: 'g/L' },
    { label: 'Raffinate', value: formatNumber(profile.raffinateCopper, 3), unit: 'g/L' },
    { label: 'Extraction recovery', value: formatNumber(profile.extractionRecovery, 2), unit: '%' },
    { label: 'Stripping efficiency', value: formatNumber(profile.strippingEfficiency, 2), unit: '%' },
    { label: 'Stripping ratio', value: formatNumber(profile.strippingRatio, 2), unit: '%' },
    { label: 'Net transfer', value: formatNumber(profile.netTransfer, 3), unit: 'g/L per % v/v' },
  ];
}
