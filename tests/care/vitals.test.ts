import { describe, it, expect } from 'vitest';
import { VITAL_TYPES, formatVitalValue, summarizeVital, vitalStatus } from '../../src/care/vitals.js';
import type { VitalSign } from '../../src/care/types.js';

function vital(overrides: Partial<VitalSign>): VitalSign {
  return {
    id: 'v1',
    profileId: 'p1',
    type: 'heart_rate',
    value: 72,
    secondaryValue: null,
    unit: 'lpm',
    measuredAt: new Date('2026-03-10T08:00:00Z'),
    source: 'manual',
    notes: null,
    createdAt: new Date('2026-03-10T08:00:00Z'),
    ...overrides,
  };
}

describe('formatVitalValue', () => {
  it('shows blood pressure as systolic/diastolic', () => {
    expect(formatVitalValue({ type: 'blood_pressure', value: 128, secondaryValue: 82 })).toBe('128/82');
  });

  it('keeps one decimal for temperature and weight', () => {
    expect(formatVitalValue({ type: 'temperature', value: 37, secondaryValue: null })).toBe('37.0');
    expect(formatVitalValue({ type: 'weight', value: 68.5, secondaryValue: null })).toBe('68.5');
  });

  it('drops decimals for whole-number types', () => {
    expect(formatVitalValue({ type: 'heart_rate', value: 72.6, secondaryValue: null })).toBe('72');
  });
});

describe('vitalStatus', () => {
  it('uses inclusive normal ranges', () => {
    expect(vitalStatus({ type: 'heart_rate', value: 59 })).toBe('low');
    expect(vitalStatus({ type: 'heart_rate', value: 60 })).toBe('normal');
    expect(vitalStatus({ type: 'heart_rate', value: 100 })).toBe('normal');
    expect(vitalStatus({ type: 'heart_rate', value: 101 })).toBe('high');
  });

  it('checks blood pressure on the systolic value', () => {
    expect(vitalStatus({ type: 'blood_pressure', value: 135 })).toBe('high');
  });
});

describe('summarizeVital', () => {
  it('builds the display summary', () => {
    const measuredAt = new Date('2026-03-10T08:00:00Z');
    expect(summarizeVital(vital({ type: 'blood_pressure', value: 128, secondaryValue: 82, unit: 'mmHg', measuredAt }))).toEqual({
      label: 'Presion Arterial',
      value: '128/82 mmHg',
      status: 'high',
      measuredAt,
    });
  });

  it('has a label and unit for every type', () => {
    for (const info of Object.values(VITAL_TYPES)) {
      expect(info.label.length).toBeGreaterThan(0);
      expect(info.defaultUnit.length).toBeGreaterThan(0);
    }
  });
});
