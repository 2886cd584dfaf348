/**
 * Data feed - where vitals, labs and the admission census come from.
 *
 * SyntheticDataFeed is the default: seeded, so a run with SIM_SEED set
 * produces the same patients and readings every time.
 */

import { generatePatientId } from "../idGenerator";
import {
  LAB_TESTS,
  VITAL_METRICS,
  type Acuity,
  type LabResult,
  type LabTest,
  type Medication,
  type PatientRecord,
  type VitalMetric,
  type Vitals,
} from "./types";

export interface DataFeed {
  /** Patients to admit at setup. May throw; a failure here fails the run. */
  census(count: number, now: number): PatientRecord[] | Promise<PatientRecord[]>;
  generateVitals(patientId: string, now: number): Vitals | Promise<Vitals>;
  /** Null when no lab resulted for this patient this tick. */
  generateLab(patientId: string, now: number): LabResult | null | Promise<LabResult | null>;
}

type Range = { min: number; max: number; unit: string; decimals: number };

export const VITAL_RANGES: Record<VitalMetric, Range> = {
  heartRate: { min: 60, max: 100, unit: "bpm", decimals: 0 },
  systolicBp: { min: 90, max: 140, unit: "mmHg", decimals: 0 },
  diastolicBp: { min: 60, max: 90, unit: "mmHg", decimals: 0 },
  respiratoryRate: { min: 12, max: 20, unit: "/min", decimals: 0 },
  spo2: { min: 95, max: 100, unit: "%", decimals: 0 },
  temperature: { min: 36.1, max: 37.2, unit: "°C", decimals: 1 },
};

export const LAB_RANGES: Record<LabTest, Range> = {
  glucose: { min: 70, max: 140, unit: "mg/dL", decimals: 1 },
  sodium: { min: 135, max: 145, unit: "mEq/L", decimals: 0 },
  potassium: { min: 3.5, max: 5.0, unit: "mEq/L", decimals: 1 },
  creatinine: { min: 0.6, max: 1.3, unit: "mg/dL", decimals: 1 },
  hemoglobin: { min: 12.0, max: 16.0, unit: "g/dL", decimals: 1 },
};

const ADMISSION_MEDICATIONS: ReadonlyArray<{ drug: string; dose: [number, number]; unit: string }> = [
  { drug: "norepinephrine", dose: [0.1, 2.0], unit: "mcg/kg/min" },
  { drug: "propofol", dose: [10, 50], unit: "mcg/kg/min" },
  { drug: "fentanyl", dose: [0.5, 5.0], unit: "mcg/kg/hr" },
  { drug: "midazolam", dose: [0.02, 0.1], unit: "mg/kg/hr" },
  { drug: "furosemide", dose: [20, 80], unit: "mg" },
];

const DIAGNOSES = [
  "Sepsis",
  "Pneumonia",
  "ARDS",
  "Heart Failure",
  "Diabetic Ketoacidosis",
  "Post-operative monitoring",
  "Trauma",
  "Stroke",
  "Myocardial Infarction",
];

const FIRST_NAMES = ["Alex", "Sam", "Jordan", "Taylor", "Morgan", "Casey", "Riley", "Jamie", "Avery", "Quinn"];
const LAST_NAMES = ["Smith", "Johnson", "Garcia", "Brown", "Nguyen", "Patel", "Kim", "Okafor", "Silva", "Jones"];
const ALLERGIES: string[][] = [[], ["Penicillin"], ["Latex"], ["Contrast"]];
const HISTORIES: string[][] = [["Hypertension"], ["Diabetes", "Hypertension"], ["COPD"], []];
const ACUITIES: Acuity[] = ["stable", "moderate", "critical"];

/** Small deterministic PRNG (mulberry32); returns floats in [0, 1). */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export type SyntheticFeedOptions = {
  seed?: number;
  /** Probability a patient gets a lab result on a given tick. */
  labProbability?: number;
  /** Probability a resulted lab is outside its reference range. */
  abnormalLabProbability?: number;
};

export class SyntheticDataFeed implements DataFeed {
  private readonly random: () => number;
  private readonly labProbability: number;
  private readonly abnormalLabProbability: number;
  private readonly acuity = new Map<string, Acuity>();
  private readonly lastValues = new Map<string, Partial<Record<VitalMetric, number>>>();

  constructor(opts: SyntheticFeedOptions = {}) {
    this.random = opts.seed !== undefined ? createRandom(opts.seed) : Math.random;
    this.labProbability = opts.labProbability ?? 0.1;
    this.abnormalLabProbability = opts.abnormalLabProbability ?? 0.2;
  }

  census(count: number, now: number): PatientRecord[] {
    const patients: PatientRecord[] = [];
    for (let i = 0; i < count; i++) patients.push(this.generatePatient(now));
    return patients;
  }

  generateVitals(patientId: string, now: number): Vitals {
    const critical = this.acuity.get(patientId) === "critical";
    const previous = this.lastValues.get(patientId) ?? {};
    const next: Partial<Record<VitalMetric, number>> = {};
    const vitals: Vitals = {};

    for (const metric of VITAL_METRICS) {
      const range = VITAL_RANGES[metric];
      const span = range.max - range.min;
      const last = previous[metric];
      let value: number;
      if (last === undefined) {
        value = this.uniform(range.min, range.max);
      } else {
        // Critical patients swing wider and are allowed further out of range.
        const step = critical ? 0.15 : 0.1;
        const reach = critical ? 0.4 : 0.3;
        value = last + this.uniform(-step, step) * span;
        value = Math.max(range.min - reach * span, Math.min(range.max + reach * span, value));
      }
      if (metric === "spo2") value = Math.min(100, value);
      value = round(value, range.decimals);
      next[metric] = value;
      vitals[metric] = { value, unit: range.unit, ts: now };
    }

    this.lastValues.set(patientId, next);
    return vitals;
  }

  generateLab(patientId: string, now: number): LabResult | null {
    if (!this.acuity.has(patientId)) return null;
    if (this.random() >= this.labProbability) return null;

    const test = this.pick(LAB_TESTS);
    const range = LAB_RANGES[test];
    let value: number;
    let abnormalFlag: LabResult["abnormalFlag"] = "";
    if (this.random() >= this.abnormalLabProbability) {
      value = this.uniform(range.min, range.max);
    } else if (this.random() < 0.5) {
      value = this.uniform(range.min * 0.5, range.min * 0.9);
      abnormalFlag = "L";
    } else {
      value = this.uniform(range.max * 1.1, range.max * 1.6);
      abnormalFlag = "H";
    }

    return {
      test,
      value: round(value, range.decimals),
      unit: range.unit,
      referenceRange: `${range.min}-${range.max}`,
      abnormalFlag,
      ts: now,
    };
  }

  private generatePatient(now: number): PatientRecord {
    const id = generatePatientId(this.random);
    const acuity = this.pick(ACUITIES);
    this.acuity.set(id, acuity);

    const medications: Record<string, Medication> = {};
    const medCount = 1 + Math.floor(this.random() * 2);
    for (const med of this.sample(ADMISSION_MEDICATIONS, medCount)) {
      medications[med.drug] = {
        drug: med.drug,
        dose: round(this.uniform(med.dose[0], med.dose[1]), 2),
        doseUnit: med.unit,
        route: this.random() < 0.5 ? "IV" : "PO",
        frequency: this.pick(["continuous", "q4h", "q6h"]),
        startedAt: now - Math.floor(this.uniform(1, 24)) * 3_600_000,
        orderedBy: "admission",
      };
    }

    return {
      id,
      demographics: {
        firstName: this.pick(FIRST_NAMES),
        lastName: this.pick(LAST_NAMES),
        mrn: `MRN${Math.floor(this.uniform(100000, 999999))}`,
        ageYears: Math.floor(this.uniform(18, 91)),
        sex: this.random() < 0.5 ? "male" : "female",
        weightKg: round(this.uniform(50, 120), 1),
        heightCm: Math.floor(this.uniform(150, 201)),
        diagnosis: this.pick(DIAGNOSES),
        acuity,
        allergies: [...this.pick(ALLERGIES)],
        history: [...this.pick(HISTORIES)],
        admittedAt: now - Math.floor(this.uniform(1, 72)) * 3_600_000,
      },
      vitals: {},
      labs: {},
      medications,
    };
  }

  private uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.random() * items.length)];
  }

  private sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    const chosen: T[] = [];
    while (chosen.length < count && pool.length > 0) {
      chosen.push(pool.splice(Math.floor(this.random() * pool.length), 1)[0]);
    }
    return chosen;
  }
}
