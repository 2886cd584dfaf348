import admin from "firebase-admin";
import { logWarn } from "./logger";

// Idempotent firebase-admin initialization for run reporting.
// Only initializes when FIREBASE_SERVICE_ACCOUNT or FIRESTORE_EMULATOR_HOST is
// set; otherwise firestore is null and reporting is skipped.

let app: admin.app.App | null = null;
let firestoreInstance: admin.firestore.Firestore | null = null;
let warned = false;

function isServiceAccount(value: unknown): value is admin.ServiceAccount {
  return typeof value === "object" && value !== null;
}

function getCredential(): admin.credential.Credential | undefined {
  const inline = process.env.FIREBASE_SERVICE_ACCOUNT;
  if (!inline) return undefined;
  try {
    const parsed: unknown = JSON.parse(inline);
    if (isServiceAccount(parsed)) return admin.credential.cert(parsed);
  } catch (err) {
    if (!warned) {
      logWarn("[firebase-admin] Failed to parse FIREBASE_SERVICE_ACCOUNT JSON", err);
      warned = true;
    }
  }
  return undefined;
}

export function isFirestoreConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.FIREBASE_SERVICE_ACCOUNT || env.FIRESTORE_EMULATOR_HOST);
}

function initApp(): admin.app.App | null {
  if (app) return app;
  if (!isFirestoreConfigured()) return null;
  try {
    const credential = getCredential();
    app = credential ? admin.initializeApp({ credential }) : admin.initializeApp();
    return app;
  } catch (err) {
    if (!warned) {
      logWarn("[firebase-admin] init failed; run reports disabled", err);
      warned = true;
    }
    return null;
  }
}

export function getFirestore(): admin.firestore.Firestore | null {
  if (firestoreInstance) return firestoreInstance;
  const initialized = initApp();
  if (!initialized) return null;
  firestoreInstance = admin.firestore(initialized);
  firestoreInstance.settings({ ignoreUndefinedProperties: true });
  return firestoreInstance;
}

export type FirestoreInstance = admin.firestore.Firestore;
