// ABOUTME: SQLite-backed build event log recording what each invocation did to each target.
// ABOUTME: Observability only: staleness decisions never read from it.

import Database from 'better-sqlite3';
import type { StaleReason } from '../build/types';

export const BUILD_EVENT_KINDS = [
  'BUILD_STARTED',
  'TARGET_UP_TO_DATE',
  'TARGET_REBUILT',
  'TARGET_REMOVED',
  'TARGET_FAILED',
  'BUILD_FINISHED'
] as const;

export type BuildEventKind = (typeof BUILD_EVENT_KINDS)[number];

export interface BuildEventRow {
  id: number;
  target: string;
  ts: number;
  kind: BuildEventKind;
  data_json: string;
}

export interface BuildStartedData {
  goals: string[];
  dry_run: boolean;
  always_make: boolean;
}

export interface TargetRebuiltData {
  reason: StaleReason;
  command_line?: string;
  newer_prerequisites?: string[];
  duration_ms: number;
}

export interface TargetRemovedData {
  path: string | null;
  existed: boolean;
}

export interface TargetFailedData {
  error: {
    name: string;
    message: string;
    code?: string;
  };
  exit_code?: number | null;
  stderr?: string;
}

export interface BuildFinishedData {
  success: boolean;
  targets_rebuilt: number;
  targets_up_to_date: number;
  duration_ms: number;
}

export interface BuildEventDisplayFormat {
  kind: BuildEventKind;
  target: string;
  timestamp: string;
  summary: string;
  details?: string;
  severity: 'info' | 'warning' | 'error';
}

export interface BuildEventLogger {
  logBuildStarted(data: BuildStartedData): void;
  logTargetUpToDate(target: string): void;
  logTargetRebuilt(target: string, data: TargetRebuiltData): void;
  logTargetRemoved(target: string, data: TargetRemovedData): void;
  logTargetFailed(target: string, data: TargetFailedData): void;
  logBuildFinished(data: BuildFinishedData): void;

  getTargetEvents(target: string): BuildEventRow[];
  getAllEvents(limit?: number): BuildEventRow[];
  getEventsByKind(kind: BuildEventKind, limit?: number): BuildEventRow[];
  getEventsByTimeRange(startTime: number, endTime: number): BuildEventRow[];
  formatEventsForCli(events: BuildEventRow[]): BuildEventDisplayFormat[];
}

const BUILD_TARGET = 'build';

/**
 * Create the build_events table and its indexes if they are missing
 */
export function initializeEventTables(db: Database.Database): void {
  db.prepare(`
    CREATE TABLE IF NOT EXISTS build_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      target TEXT NOT NULL,
      ts INTEGER NOT NULL,
      kind TEXT NOT NULL,
      data_json TEXT NOT NULL
    )
  `).run();

  db.prepare(`
    CREATE INDEX IF NOT EXISTS idx_build_events_target
    ON build_events(target, ts)
  `).run();

  db.prepare(`
    CREATE INDEX IF NOT EXISTS idx_build_events_kind
    ON build_events(kind, ts)
  `).run();
}

export function openEventDatabase(path: string): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  initializeEventTables(db);
  return db;
}

function parseData(event: BuildEventRow): Record<string, unknown> {
  const parsed: unknown = JSON.parse(event.data_json);
  const data: Record<string, unknown> = {};
  if (typeof parsed === 'object' && parsed !== null) {
    Object.assign(data, parsed);
  }
  return data;
}

export function formatEventForDisplay(event: BuildEventRow): BuildEventDisplayFormat {
  const timestamp = new Date(event.ts).toISOString();
  let summary = '';
  let details: string | undefined;
  let severity: BuildEventDisplayFormat['severity'] = 'info';

  try {
    const data = parseData(event);

    switch (event.kind) {
      case 'BUILD_STARTED':
        summary = 'Build started for ' + (Array.isArray(data.goals) ? data.goals.join(', ') : 'default goal');
        if (data.dry_run === true) {
          details = 'Dry run';
        }
        break;

      case 'TARGET_UP_TO_DATE':
        summary = `'${event.target}' is up to date`;
        break;

      case 'TARGET_REBUILT':
        summary = `'${event.target}' rebuilt (${String(data.reason)})`;
        if (typeof data.command_line === 'string') {
          details = data.command_line;
        }
        break;

      case 'TARGET_REMOVED':
        summary = data.existed === true ? `Removed ${String(data.path)}` : `Nothing to remove for '${event.target}'`;
        break;

      case 'TARGET_FAILED': {
        const error = data.error;
        const message =
          typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
            ? error.message
            : 'Unknown error';
        summary = `'${event.target}' failed: ${message}`;
        if (typeof data.stderr === 'string' && data.stderr.length > 0) {
          details = data.stderr.trim();
        }
        severity = 'error';
        break;
      }

      case 'BUILD_FINISHED':
        summary = data.success === true ? 'Build finished' : 'Build failed';
        details = `Rebuilt: ${String(data.targets_rebuilt)} | Up to date: ${String(data.targets_up_to_date)} | ${String(data.duration_ms)}ms`;
        severity = data.success === true ? 'info' : 'error';
        break;

      default:
        summary = 'Unknown event kind: ' + String(event.kind);
        severity = 'warning';
    }
  } catch (error) {
    summary = 'Invalid event data for ' + event.kind;
    severity = 'error';
  }

  return { kind: event.kind, target: event.target, timestamp, summary, details, severity };
}

export function createBuildEventLogger(db: Database.Database): BuildEventLogger {
  const insertEventStmt = db.prepare<[string, number, string, string]>(`
    INSERT INTO build_events(target, ts, kind, data_json)
    VALUES(?, ?, ?, ?)
  `);

  const getTargetEventsStmt = db.prepare<[string], BuildEventRow>(`
    SELECT * FROM build_events
    WHERE target = ?
    ORDER BY ts ASC, id ASC
  `);

  const getAllEventsStmt = db.prepare<[number], BuildEventRow>(`
    SELECT * FROM build_events
    ORDER BY ts DESC, id DESC
    LIMIT ?
  `);

  const getEventsByKindStmt = db.prepare<[string, number], BuildEventRow>(`
    SELECT * FROM build_events
    WHERE kind = ?
    ORDER BY ts DESC, id DESC
    LIMIT ?
  `);

  const getEventsByTimeRangeStmt = db.prepare<[number, number], BuildEventRow>(`
    SELECT * FROM build_events
    WHERE ts >= ? AND ts <= ?
    ORDER BY ts ASC, id ASC
  `);

  function insertEvent(target: string, kind: BuildEventKind, data: object): void {
    try {
      insertEventStmt.run(target, Date.now(), kind, JSON.stringify(data));
    } catch (error) {
      // The log must never break the build
      console.error(`Failed to log ${kind} event for ${target}:`, error);
    }
  }

  return {
    logBuildStarted(data: BuildStartedData): void {
      insertEvent(BUILD_TARGET, 'BUILD_STARTED', data);
    },

    logTargetUpToDate(target: string): void {
      insertEvent(target, 'TARGET_UP_TO_DATE', {});
    },

    logTargetRebuilt(target: string, data: TargetRebuiltData): void {
      insertEvent(target, 'TARGET_REBUILT', data);
    },

    logTargetRemoved(target: string, data: TargetRemovedData): void {
      insertEvent(target, 'TARGET_REMOVED', data);
    },

    logTargetFailed(target: string, data: TargetFailedData): void {
      insertEvent(target, 'TARGET_FAILED', data);
    },

    logBuildFinished(data: BuildFinishedData): void {
      insertEvent(BUILD_TARGET, 'BUILD_FINISHED', data);
    },

    getTargetEvents(target: string): BuildEventRow[] {
      return getTargetEventsStmt.all(target);
    },

    getAllEvents(limit: number = 100): BuildEventRow[] {
      return getAllEventsStmt.all(limit);
    },

    getEventsByKind(kind: BuildEventKind, limit: number = 50): BuildEventRow[] {
      return getEventsByKindStmt.all(kind, limit);
    },

    getEventsByTimeRange(startTime: number, endTime: number): BuildEventRow[] {
      return getEventsByTimeRangeStmt.all(startTime, endTime);
    },

    formatEventsForCli(events: BuildEventRow[]): BuildEventDisplayFormat[] {
      return events.map(formatEventForDisplay);
    }
  };
}
