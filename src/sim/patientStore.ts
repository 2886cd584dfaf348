import { NotFoundError } from "../errors";
import { StateLock } from "../stateLock";
import type { LabResult, MedicationChange, PatientRecord, PatientSnapshot, Vitals } from "./types";

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function toSnapshot(record: PatientRecord, version: number, updatedAt: number): PatientSnapshot {
  const copy = structuredClone(record);
  return deepFreeze({ ...copy, version, updatedAt });
}

/**
 * Holds the live record of every admitted patient.
 *
 * Mutations are copy-on-write under a per-patient lock: the new record is
 * built off to the side and swapped in whole, and the frozen snapshot handed
 * to readers is rebuilt from it. Readers never hold a live reference.
 */
export class PatientStore {
  private readonly records = new Map<string, PatientRecord>();
  private readonly snapshots = new Map<string, PatientSnapshot>();
  private readonly lock: StateLock;
  private readonly now: () => number;

  constructor(opts?: { lockTimeoutMs?: number; now?: () => number }) {
    this.lock = new StateLock({ timeoutMs: opts?.lockTimeoutMs });
    this.now = opts?.now ?? Date.now;
  }

  admit(patient: PatientRecord): PatientSnapshot {
    if (this.records.has(patient.id)) {
      throw new Error(`patient already admitted: ${patient.id}`);
    }
    const record = structuredClone(patient);
    Object.freeze(record.demographics);
    this.records.set(record.id, record);
    return this.commit(record, 0);
  }

  has(patientId: string): boolean {
    return this.records.has(patientId);
  }

  get size(): number {
    return this.records.size;
  }

  ids(): string[] {
    return [...this.records.keys()];
  }

  list(): PatientSnapshot[] {
    return [...this.snapshots.values()];
  }

  get(patientId: string): PatientSnapshot {
    const snapshot = this.snapshots.get(patientId);
    if (!snapshot) throw new NotFoundError("patient", patientId);
    return snapshot;
  }

  async applyVitalUpdate(patientId: string, vitals: Vitals): Promise<PatientSnapshot> {
    return this.mutate(patientId, "applyVitalUpdate", (record) => ({
      ...record,
      vitals: { ...record.vitals, ...vitals },
    }));
  }

  async applyLabResult(patientId: string, lab: LabResult): Promise<PatientSnapshot> {
    return this.mutate(patientId, "applyLabResult", (record) => ({
      ...record,
      labs: { ...record.labs, [lab.test]: lab },
    }));
  }

  async applyMedicationChange(patientId: string, change: MedicationChange): Promise<PatientSnapshot> {
    return this.mutate(patientId, `applyMedicationChange:${change.action}`, (record) => {
      const medications = { ...record.medications };
      switch (change.action) {
        case "start":
          medications[change.medication.drug] = change.medication;
          break;
        case "adjust": {
          const current = medications[change.drug];
          if (!current) throw new NotFoundError("medication", `${patientId}/${change.drug}`);
          medications[change.drug] = { ...current, dose: change.dose };
          break;
        }
        case "stop":
          if (!medications[change.drug]) throw new NotFoundError("medication", `${patientId}/${change.drug}`);
          delete medications[change.drug];
          break;
      }
      return { ...record, medications };
    });
  }

  private async mutate(
    patientId: string,
    operation: string,
    apply: (record: PatientRecord) => PatientRecord
  ): Promise<PatientSnapshot> {
    if (!this.records.has(patientId)) throw new NotFoundError("patient", patientId);
    return this.lock.withLock(patientId, operation, () => {
      const current = this.records.get(patientId);
      if (!current) throw new NotFoundError("patient", patientId);
      const next = apply(current);
      this.records.set(patientId, next);
      return this.commit(next, this.get(patientId).version + 1);
    });
  }

  private commit(record: PatientRecord, version: number): PatientSnapshot {
    const snapshot = toSnapshot(record, version, this.now());
    this.snapshots.set(record.id, snapshot);
    return snapshot;
  }
}
