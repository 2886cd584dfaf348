import type { EventLogEntry } from "./types";
import { logRunEvent } from "../persistence";
import { fireAndForget, logDebug, logError } from "../logger";

export interface EventLogger {
  append(event: EventLogEntry): void;
  getRecent?(limit?: number): EventLogEntry[];
}

export class InMemoryEventLog implements EventLogger {
  private events: EventLogEntry[] = [];

  constructor(private readonly maxEntries = 5000) {}

  append(event: EventLogEntry): void {
    this.events.push(event);
    if (this.events.length > this.maxEntries) {
      this.events.shift();
    }
  }

  getRecent(limit = 50): EventLogEntry[] {
    return this.events.slice(-limit);
  }
}

export class ConsoleEventLog implements EventLogger {
  append(event: EventLogEntry): void {
    // Debug level only; a five minute run emits thousands of these.
    logDebug("[sim-event]", event.type, { runId: event.runId, payload: event.payload });
  }
}

/**
 * Firestore-backed event logger for post-run replay.
 * Writes events to runs/{runId}/events.
 */
export class FirestoreEventLog implements EventLogger {
  append(event: EventLogEntry): void {
    fireAndForget(
      logRunEvent(event.runId, {
        type: event.type,
        payload: event.payload,
        correlationId: event.correlationId,
      }),
      `logRunEvent:${event.type}`
    );
  }
}

/**
 * Writes to several backends; getRecent reads from the in-memory one.
 */
export class CompositeEventLog implements EventLogger {
  private loggers: EventLogger[];
  private memoryLog?: InMemoryEventLog;

  constructor(...loggers: EventLogger[]) {
    this.loggers = loggers;
    this.memoryLog = loggers.find((l): l is InMemoryEventLog => l instanceof InMemoryEventLog);
  }

  append(event: EventLogEntry): void {
    for (const logger of this.loggers) {
      try {
        logger.append(event);
      } catch (err) {
        logError("[eventLog] backend append failed", event.type, err);
      }
    }
  }

  getRecent(limit = 50): EventLogEntry[] {
    return this.memoryLog?.getRecent(limit) ?? [];
  }
}

/**
 * Memory plus console always; Firestore too when credentials are configured.
 */
export function createEventLog(env: NodeJS.ProcessEnv = process.env): EventLogger {
  const hasFirestore = !!env.FIREBASE_SERVICE_ACCOUNT || !!env.FIRESTORE_EMULATOR_HOST;
  if (hasFirestore) {
    return new CompositeEventLog(new InMemoryEventLog(), new ConsoleEventLog(), new FirestoreEventLog());
  }
  return new CompositeEventLog(new InMemoryEventLog(), new ConsoleEventLog());
}
