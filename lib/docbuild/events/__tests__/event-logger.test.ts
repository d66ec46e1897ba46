// ABOUTME: Tests for the SQLite build event log using an in-memory database.

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import Database from 'better-sqlite3';
import {
  createBuildEventLogger,
  formatEventForDisplay,
  initializeEventTables,
  type BuildEventLogger,
  type BuildEventRow
} from '../event-logger';

function row(kind: BuildEventRow['kind'], data: object, target: string = 'build'): BuildEventRow {
  return { id: 1, target, ts: Date.UTC(2024, 0, 15, 9, 30), kind, data_json: JSON.stringify(data) };
}

describe('Build event logger', () => {
  let db: Database.Database;
  let logger: BuildEventLogger;

  beforeEach(() => {
    db = new Database(':memory:');
    initializeEventTables(db);
    logger = createBuildEventLogger(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should create the table idempotently', () => {
    expect(() => initializeEventTables(db)).not.toThrow();

    const tables = db.prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'build_events'`).all();
    expect(tables).toEqual([{ name: 'build_events' }]);
  });

  it('should record build-level events under the build target', () => {
    logger.logBuildStarted({ goals: ['zwift_workout_file_tag_reference.md'], dry_run: false, always_make: false });
    logger.logBuildFinished({ success: true, targets_rebuilt: 2, targets_up_to_date: 0, duration_ms: 40 });

    const events = logger.getTargetEvents('build');
    expect(events.map((event) => event.kind)).toEqual(['BUILD_STARTED', 'BUILD_FINISHED']);
    expect(JSON.parse(events[0].data_json)).toEqual({
      goals: ['zwift_workout_file_tag_reference.md'],
      dry_run: false,
      always_make: false
    });
  });

  it('should keep target events separate', () => {
    logger.logTargetRebuilt('tag_attr_usage.json', { reason: 'missing', duration_ms: 5 });
    logger.logTargetUpToDate('zwift_workout_file_tag_reference.md');
    logger.logTargetUpToDate('tag_attr_usage.json');

    expect(logger.getTargetEvents('tag_attr_usage.json').map((event) => event.kind)).toEqual([
      'TARGET_REBUILT',
      'TARGET_UP_TO_DATE'
    ]);
    expect(logger.getTargetEvents('zwift_workout_file_tag_reference.md')).toHaveLength(1);
  });

  it('should return the newest events first with a limit', () => {
    logger.logTargetUpToDate('a');
    logger.logTargetUpToDate('b');
    logger.logTargetUpToDate('c');

    expect(logger.getAllEvents(2).map((event) => event.target)).toEqual(['c', 'b']);
    expect(logger.getEventsByKind('TARGET_UP_TO_DATE', 1).map((event) => event.target)).toEqual(['c']);
    expect(logger.getEventsByKind('TARGET_FAILED')).toEqual([]);
  });

  it('should filter events by time range', () => {
    const now = Date.now();
    logger.logTargetUpToDate('a');

    expect(logger.getEventsByTimeRange(now - 1000, Date.now() + 1000)).toHaveLength(1);
    expect(logger.getEventsByTimeRange(0, now - 60_000)).toEqual([]);
  });

  it('should report insert failures without throwing', () => {
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    db.prepare('DROP TABLE build_events').run();

    expect(() => logger.logTargetUpToDate('a')).not.toThrow();
    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy.mock.calls[0][0]).toBe('Failed to log TARGET_UP_TO_DATE event for a:');

    consoleSpy.mockRestore();
  });

  it('should format stored events for the CLI', () => {
    logger.logTargetRemoved('clean-json', { path: 'tag_attr_usage.json', existed: true });

    const [formatted] = logger.formatEventsForCli(logger.getTargetEvents('clean-json'));

    expect(formatted.summary).toBe('Removed tag_attr_usage.json');
    expect(formatted.severity).toBe('info');
  });
});

describe('formatEventForDisplay', () => {
  it('should describe a build start', () => {
    const formatted = formatEventForDisplay(row('BUILD_STARTED', { goals: ['clean-md', 'clean-json'], dry_run: true }));

    expect(formatted.summary).toBe('Build started for clean-md, clean-json');
    expect(formatted.details).toBe('Dry run');
    expect(formatted.timestamp).toBe('2024-01-15T09:30:00.000Z');
  });

  it('should describe up-to-date and rebuilt targets', () => {
    expect(formatEventForDisplay(row('TARGET_UP_TO_DATE', {}, 'tag_attr_usage.json')).summary).toBe(
      "'tag_attr_usage.json' is up to date"
    );

    const rebuilt = formatEventForDisplay(
      row(
        'TARGET_REBUILT',
        { reason: 'newer-prerequisite', command_line: 'zwift-zwo-docs-analyse --json workouts > tag_attr_usage.json' },
        'tag_attr_usage.json'
      )
    );
    expect(rebuilt.summary).toBe("'tag_attr_usage.json' rebuilt (newer-prerequisite)");
    expect(rebuilt.details).toBe('zwift-zwo-docs-analyse --json workouts > tag_attr_usage.json');
  });

  it('should describe a removal with nothing to remove', () => {
    const formatted = formatEventForDisplay(row('TARGET_REMOVED', { path: null, existed: false }, 'clean-md'));

    expect(formatted.summary).toBe("Nothing to remove for 'clean-md'");
  });

  it('should describe failures as errors with trimmed stderr', () => {
    const formatted = formatEventForDisplay(
      row(
        'TARGET_FAILED',
        { error: { name: 'RecipeFailedError', message: 'exit code 2' }, exit_code: 2, stderr: '  parse error\n' },
        'tag_attr_usage.json'
      )
    );

    expect(formatted.summary).toBe("'tag_attr_usage.json' failed: exit code 2");
    expect(formatted.details).toBe('parse error');
    expect(formatted.severity).toBe('error');
  });

  it('should summarise finished builds', () => {
    const finished = formatEventForDisplay(
      row('BUILD_FINISHED', { success: false, targets_rebuilt: 1, targets_up_to_date: 3, duration_ms: 12 })
    );

    expect(finished.summary).toBe('Build failed');
    expect(finished.details).toBe('Rebuilt: 1 | Up to date: 3 | 12ms');
    expect(finished.severity).toBe('error');
  });

  it('should flag unreadable event data', () => {
    const formatted = formatEventForDisplay({ ...row('TARGET_REBUILT', {}), data_json: '{not json' });

    expect(formatted.summary).toBe('Invalid event data for TARGET_REBUILT');
    expect(formatted.severity).toBe('error');
  });
});
