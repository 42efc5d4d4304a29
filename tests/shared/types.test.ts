import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SETTINGS,
  SUPPORTED_EXTENSIONS,
  type AudioFormat,
  type BatchSummary,
} from '../../src/shared/types';

describe('Shared Types', () => {
  describe('SUPPORTED_EXTENSIONS', () => {
    it('should list one extension per audio format', () => {
      const formats: AudioFormat[] = ['mp3', 'flac', 'ogg', 'm4a', 'mp4', 'wma', 'wav'];
      expect([...SUPPORTED_EXTENSIONS].sort()).toEqual(formats.map((f) => `.${f}`).sort());
    });

    it('should use lowercase dotted extensions', () => {
      for (const ext of SUPPORTED_EXTENSIONS) {
        expect(ext).toMatch(/^\.[a-z0-9]+$/);
      }
    });
  });

  describe('DEFAULT_SETTINGS', () => {
    it('should have the documented defaults', () => {
      expect(DEFAULT_SETTINGS).toEqual({
        defaultPattern: '{artist} - {title}',
        useDiscogs: true,
        discogsToken: '',
        discogsApiUrl: 'https://api.discogs.com',
        userAgent: 'Tagsmith/1.0',
        writeLogFile: true,
        logDir: null,
      });
    });
  });

  describe('BatchSummary', () => {
    it('should describe an empty run', () => {
      const summary: BatchSummary = { success: 0, failed: 0, skipped: 0, results: [] };
      expect(summary.success + summary.failed + summary.skipped).toBe(summary.results.length);
    });
  });
});
