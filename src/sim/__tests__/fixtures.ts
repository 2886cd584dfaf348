import { VITAL_METRICS } from "../types";
import type { Medication, PatientRecord, PatientSnapshot, Reading, VitalMetric, Vitals } from "../types";

const UNITS: Record<VitalMetric, string> = {
  heartRate: "bpm",
  systolicBp: "mmHg",
  diastolicBp: "mmHg",
  respiratoryRate: "breaths/min",
  spo2: "%",
  temperature: "°C",
};

export function reading(metric: VitalMetric, value: number, ts = 0): Reading {
  return { value, unit: UNITS[metric], ts };
}

export function vitals(values: Partial<Record<VitalMetric, number>>, ts = 0): Vitals {
  const result: Vitals = {};
  for (const metric of VITAL_METRICS) {
    const value = values[metric];
    if (value !== undefined) result[metric] = reading(metric, value, ts);
  }
  return result;
}

export const NORMAL_VITALS = {
  heartRate: 80,
  systolicBp: 120,
  diastolicBp: 75,
  respiratoryRate: 16,
  spo2: 97,
  temperature: 37.0,
};

export function medication(drug: string, dose: number, extra: Partial<Medication> = {}): Medication {
  return {
    drug,
    dose,
    doseUnit: "mg",
    route: "IV",
    frequency: "continuous",
    startedAt: 0,
    orderedBy: "admission",
    ...extra,
  };
}

export function makePatient(id: string, overrides: Partial<PatientRecord> = {}): PatientRecord {
  return {
    id,
    demographics: {
      firstName: "Test",
      lastName: "Patient",
      mrn: `MRN-${id}`,
      ageYears: 60,
      sex: "female",
      weightKg: 70,
      heightCm: 165,
      diagnosis: "Sepsis",
      acuity: "moderate",
      allergies: [],
      history: [],
      admittedAt: 0,
    },
    vitals: vitals(NORMAL_VITALS),
    labs: {},
    medications: {},
    ...overrides,
  };
}

/** Polls on real timers until `check` holds. */
export async function eventually(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((r) => setTimeout(r, 5));
  }
}

export function makeSnapshot(id: string, overrides: Partial<PatientRecord> = {}, version = 0): PatientSnapshot {
  return { ...makePatient(id, overrides), version, updatedAt: 0 };
}
