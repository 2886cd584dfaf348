/**
 * ID generation utilities for the simulation.
 * Format: prefix-timestamp-randomSuffix
 */

export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

export function generateRunId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;
}

export function generateDecisionId(role: string): string {
  return `decision-${role}-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;
}

export function generateAlertId(): string {
  return `alert-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;
}

/** Patient ids look like PATIENT_3FA91C2B; the random source is injectable for seeded runs. */
export function generatePatientId(random: () => number = Math.random): string {
  let suffix = "";
  for (let i = 0; i < 8; i++) {
    suffix += Math.floor(random() * 16).toString(16);
  }
  return `PATIENT_${suffix.toUpperCase()}`;
}
