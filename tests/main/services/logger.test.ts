/**
 * Tests for Logger Service
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  Logger,
  type LogEntry,
  createLogEntry,
  errorContext,
  getLogFileName,
  isAtLeast,
  nextRotationPath,
  serializeLogEntry,
} from '../../../src/main/services/logger';
import { APIError, InputError, WriteError } from '../../../src/main/services/errors';

// ─── Test Helpers ────────────────────────────────────────────────────────

/** Fixed local date so the log file name does not depend on the time zone */
const FIXED_DATE = new Date(2025, 1, 17, 12, 0, 0);
const now = (): Date => new Date(FIXED_DATE.getTime());
const STAMP = FIXED_DATE.toISOString();

function entry(overrides: Partial<LogEntry>): LogEntry {
  return { ...createLogEntry('INFO', 'message', {}, FIXED_DATE), ...overrides };
}

function readLines(file: string): unknown[] {
  return fs
    .readFileSync(file, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe('Logger Service', () => {
  describe('getLogFileName', () => {
    it('should use the local date', () => {
      expect(getLogFileName(new Date(2025, 2, 5, 10, 0, 0))).toBe('2025-03-05.log');
      expect(getLogFileName(new Date(2025, 11, 31, 23, 0, 0))).toBe('2025-12-31.log');
    });
  });

  describe('nextRotationPath', () => {
    it('should pick the first unused index', () => {
      const taken = new Set(['/logs/2025-02-17.1.log', '/logs/2025-02-17.2.log']);
      expect(nextRotationPath('/logs/2025-02-17.log', (p) => taken.has(p))).toBe('/logs/2025-02-17.3.log');
      expect(nextRotationPath('/logs/2025-02-18.log', (p) => taken.has(p))).toBe('/logs/2025-02-18.1.log');
    });
  });

  describe('serializeLogEntry', () => {
    it('should leave out empty context', () => {
      expect(serializeLogEntry(entry({ message: 'Starting batch: 2 file(s)' }))).toBe(
        `{"time":"${STAMP}","level":"INFO","msg":"Starting batch: 2 file(s)"}`,
      );
    });

    it('should write every context field', () => {
      const line = serializeLogEntry(
        entry({
          level: 'ERROR',
          message: 'Discogs search failed: HTTP 401',
          category: 'APIError',
          filePath: '/music/song.mp3',
          step: 'lookup',
          statusCode: 401,
          cause: 'Request failed',
        }),
      );
      expect(JSON.parse(line)).toEqual({
        time: STAMP,
        level: 'ERROR',
        msg: 'Discogs search failed: HTTP 401',
        category: 'APIError',
        file: '/music/song.mp3',
        step: 'lookup',
        status: 401,
        cause: 'Request failed',
      });
    });
  });

  describe('isAtLeast', () => {
    it('should compare severity against the minimum level', () => {
      expect(isAtLeast('ERROR', 'INFO')).toBe(true);
      expect(isAtLeast('INFO', 'INFO')).toBe(true);
      expect(isAtLeast('INFO', 'WARN')).toBe(false);
      expect(isAtLeast('WARN', 'ERROR')).toBe(false);
    });
  });

  describe('errorContext', () => {
    it('should take the status code from API errors', () => {
      const error = new APIError('Discogs search failed: HTTP 429', {
        statusCode: 429,
        cause: new Error('Too Many Requests'),
      });
      expect(errorContext(error)).toEqual({
        category: 'APIError',
        filePath: null,
        step: 'api_call',
        statusCode: 429,
        cause: 'Too Many Requests',
      });
    });

    it('should leave the status code empty for other errors', () => {
      const error = new WriteError('Failed to write FLAC tags', { filePath: '/music/a.flac' });
      expect(errorContext(error)).toEqual({
        category: 'WriteError',
        filePath: '/music/a.flac',
        step: 'writing',
        statusCode: null,
        cause: null,
      });
    });
  });

  describe('in memory', () => {
    let logger: Logger;

    beforeEach(async () => {
      logger = new Logger({ now });
      await logger.initialize();
    });

    it('should not write a file without a log directory', () => {
      logger.info('ok');
      expect(logger.getLogFilePath()).toBeNull();
      expect(logger.getEntries()).toEqual([createLogEntry('INFO', 'ok', {}, FIXED_DATE)]);
    });

    it('should filter entries by level', () => {
      logger.error('boom', { category: 'APIError' });
      logger.warn('hmm');
      logger.info('ok');

      expect(logger.getEntries().map((e) => e.level)).toEqual(['ERROR', 'WARN', 'INFO']);
      expect(logger.getEntries('WARN').map((e) => e.message)).toEqual(['hmm']);
    });

    it('should drop entries below the minimum level', () => {
      const quiet = new Logger({ minLevel: 'WARN', now });
      quiet.info('ignored');
      quiet.warn('kept');
      expect(quiet.getEntries().map((e) => e.message)).toEqual(['kept']);
    });

    it('should log pipeline errors with their context', () => {
      logger.logPipelineError(
        new APIError('Discogs search failed: HTTP 401', { filePath: '/a.mp3', statusCode: 401 }),
      );
      expect(logger.getEntries('ERROR')).toEqual([
        {
          timestamp: STAMP,
          level: 'ERROR',
          message: 'Discogs search failed: HTTP 401',
          category: 'APIError',
          filePath: '/a.mp3',
          step: 'api_call',
          statusCode: 401,
          cause: null,
        },
      ]);
    });

    it('should log other thrown values with the given context', () => {
      logger.logError(new Error('unexpected'), { filePath: '/b.mp3', step: 'writing' });
      logger.logError(new InputError('bad pattern'), { step: 'ignored' });

      const [plain, pipeline] = logger.getEntries('ERROR');
      expect(plain).toMatchObject({ message: 'unexpected', category: null, filePath: '/b.mp3', step: 'writing' });
      expect(pipeline).toMatchObject({ message: 'bad pattern', category: 'InputError', step: 'validating' });
    });

    it('should log skipped files as warnings', () => {
      logger.logSkippedFile('/music/notes.txt', 'Unsupported format: .txt');
      expect(logger.getEntries('WARN')).toEqual([
        expect.objectContaining({
          message: 'File skipped: Unsupported format: .txt',
          filePath: '/music/notes.txt',
          step: 'processing',
        }),
      ]);
    });

    it('should summarize entries', () => {
      logger.logPipelineError(new InputError('bad pattern'));
      logger.logPipelineError(new APIError('down'));
      logger.logPipelineError(new APIError('down again'));
      logger.warn('skip');
      logger.info('done');

      expect(logger.getSummary()).toEqual({
        counts: { ERROR: 3, WARN: 1, INFO: 1 },
        errorsByCategory: { InputError: 1, APIError: 2 },
        logFilePath: null,
      });
    });
  });

  describe('file output', () => {
    let tempDir: string;
    let logDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-test-'));
      logDir = path.join(tempDir, 'logs');
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should create the directory and append JSON lines', async () => {
      const logger = new Logger({ logDir, now });
      await logger.initialize();

      logger.info('first');
      logger.error('second', { category: 'WriteError' });

      const logFile = path.join(logDir, '2025-02-17.log');
      expect(logger.getSummary().logFilePath).toBe(logFile);
      expect(readLines(logFile)).toEqual([
        { time: STAMP, level: 'INFO', msg: 'first' },
        { time: STAMP, level: 'ERROR', msg: 'second', category: 'WriteError' },
      ]);
    });

    it('should rotate the file once it reaches maxFileSize', async () => {
      const logger = new Logger({ logDir, maxFileSize: 50, now });
      await logger.initialize();

      logger.info('first');
      logger.info('second');

      expect(readLines(path.join(logDir, '2025-02-17.1.log'))).toEqual([
        { time: STAMP, level: 'INFO', msg: 'first' },
      ]);
      expect(readLines(path.join(logDir, '2025-02-17.log'))).toEqual([
        { time: STAMP, level: 'INFO', msg: 'second' },
      ]);
    });

    it('should keep logging in memory when the directory cannot be created', async () => {
      const blocker = path.join(tempDir, 'file');
      fs.writeFileSync(blocker, 'not a directory');
      const logger = new Logger({ logDir: path.join(blocker, 'logs'), now });

      await logger.initialize();
      logger.info('still recorded');

      const [warning, info] = logger.getEntries();
      expect(warning.level).toBe('WARN');
      expect(warning.message.startsWith('File logging disabled: cannot create')).toBe(true);
      expect(info.message).toBe('still recorded');
      expect(logger.getLogFilePath()).toBeNull();
    });

    it('should stop writing after a failed append', async () => {
      const logger = new Logger({ logDir, now });
      await logger.initialize();
      fs.rmSync(logDir, { recursive: true });
      fs.writeFileSync(logDir, 'in the way');

      logger.info('lost from the file');
      logger.info('memory only');

      expect(logger.getEntries().map((e) => e.level)).toEqual(['INFO', 'WARN', 'INFO']);
      expect(logger.getEntries('WARN')[0].message.startsWith('File logging disabled: cannot write')).toBe(true);
      expect(logger.getLogFilePath()).toBeNull();
    });
  });
});
