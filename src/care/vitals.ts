/**
 * Vital sign display and range checks.
 */

import type { VitalSummary } from '../agent/router/types.js';
import type { VitalType } from './schemas.js';
import type { VitalSign } from './types.js';

interface VitalTypeInfo {
  label: string;
  defaultUnit: string;
  /** Inclusive normal range; blood pressure is checked on the systolic value */
  normalRange: readonly [number, number];
  /** Inclusive range a reading must fall in to be stored */
  inputRange: readonly [number, number];
  decimals: 0 | 1;
}

/** Diastolic blood pressure bounds, mmHg */
export const DIASTOLIC_RANGE: readonly [number, number] = [40, 140];

export const VITAL_TYPES: Readonly<Record<VitalType, VitalTypeInfo>> = {
  blood_pressure: {
    label: 'Presion Arterial',
    defaultUnit: 'mmHg',
    normalRange: [90, 120],
    inputRange: [60, 200],
    decimals: 0,
  },
  heart_rate: {
    label: 'Ritmo Cardiaco',
    defaultUnit: 'lpm',
    normalRange: [60, 100],
    inputRange: [40, 200],
    decimals: 0,
  },
  blood_oxygen: {
    label: 'Oxigeno en Sangre',
    defaultUnit: '%',
    normalRange: [95, 100],
    inputRange: [80, 100],
    decimals: 0,
  },
  temperature: {
    label: 'Temperatura',
    defaultUnit: '°C',
    normalRange: [36.1, 37.2],
    inputRange: [35, 42],
    decimals: 1,
  },
  blood_glucose: {
    label: 'Glucosa en Sangre',
    defaultUnit: 'mg/dL',
    normalRange: [70, 140],
    inputRange: [40, 400],
    decimals: 0,
  },
  weight: {
    label: 'Peso',
    defaultUnit: 'kg',
    normalRange: [45, 136],
    inputRange: [30, 200],
    decimals: 1,
  },
  respiratory_rate: {
    label: 'Frecuencia Respiratoria',
    defaultUnit: 'resp/min',
    normalRange: [12, 20],
    inputRange: [8, 40],
    decimals: 0,
  },
};

function formatNumber(value: number, decimals: 0 | 1): string {
  return decimals === 1 ? value.toFixed(1) : String(Math.trunc(value));
}

/**
 * "120/80", "36.8", "72".
 */
export function formatVitalValue(vital: Pick<VitalSign, 'type' | 'value' | 'secondaryValue'>): string {
  const info = VITAL_TYPES[vital.type];
  const primary = formatNumber(vital.value, info.decimals);

  if (vital.type === 'blood_pressure' && vital.secondaryValue !== null) {
    return `${primary}/${formatNumber(vital.secondaryValue, 0)}`;
  }
  return primary;
}

export function vitalStatus(vital: Pick<VitalSign, 'type' | 'value'>): VitalSummary['status'] {
  const [low, high] = VITAL_TYPES[vital.type].normalRange;
  if (vital.value < low) return 'low';
  if (vital.value > high) return 'high';
  return 'normal';
}

export function summarizeVital(vital: VitalSign): VitalSummary {
  return {
    label: VITAL_TYPES[vital.type].label,
    value: `${formatVitalValue(vital)} ${vital.unit}`,
    status: vitalStatus(vital),
    measuredAt: vital.measuredAt,
  };
}
