/**
 * Tests for the error classes
 */

import { describe, it, expect } from 'vitest';
import {
  APIError,
  InputError,
  PipelineError,
  WriteError,
  errorMessage,
  isPipelineError,
  wrapError,
} from '../../../src/main/services/errors';

describe('errors', () => {
  describe('PipelineError subclasses', () => {
    it('should default the step per category', () => {
      expect(new InputError('bad').step).toBe('validating');
      expect(new APIError('bad').step).toBe('api_call');
      expect(new WriteError('bad').step).toBe('writing');
    });

    it('should keep instanceof working through the hierarchy', () => {
      const error = new WriteError('disk full');
      expect(error).toBeInstanceOf(WriteError);
      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('WriteError');
    });

    it('should keep an explicit step', () => {
      expect(new APIError('HTTP 500', { step: 'verifying' }).step).toBe('verifying');
    });
  });

  describe('APIError', () => {
    it('should carry status and service', () => {
      const error = new APIError('Discogs search failed: HTTP 401', {
        statusCode: 401,
        service: 'Discogs',
      });

      expect(error.category).toBe('APIError');
      expect(error.message).toBe('Discogs search failed: HTTP 401');
      expect(error.statusCode).toBe(401);
      expect(error.service).toBe('Discogs');
      expect(error.cause).toBeNull();
    });

    it('should default status and service to null', () => {
      const error = new APIError('timeout');
      expect(error.statusCode).toBeNull();
      expect(error.service).toBeNull();
    });
  });

  describe('wrapError', () => {
    it('should return pipeline errors unchanged', () => {
      const original = new InputError('bad pattern');
      expect(wrapError(original, 'WriteError')).toBe(original);
    });

    it('should wrap plain errors in the requested category', () => {
      const cause = new Error('EACCES');
      const wrapped = wrapError(cause, 'WriteError', { filePath: '/music/a.mp3' });

      expect(wrapped).toBeInstanceOf(WriteError);
      expect(wrapped.message).toBe('EACCES');
      expect(wrapped.filePath).toBe('/music/a.mp3');
      expect(wrapped.cause).toBe(cause);
      expect(wrapped.step).toBe('writing');
    });

    it('should wrap non-error values', () => {
      const wrapped = wrapError('socket hang up', 'APIError');
      expect(wrapped).toBeInstanceOf(APIError);
      expect(wrapped.message).toBe('socket hang up');
    });

    it('should fall back to a generic message for empty errors', () => {
      expect(wrapError(new Error(''), 'WriteError').message).toBe('Unknown error');
    });
  });

  describe('helpers', () => {
    it('should detect pipeline errors', () => {
      expect(isPipelineError(new APIError('x'))).toBe(true);
      expect(isPipelineError(new Error('x'))).toBe(false);
      expect(isPipelineError('x')).toBe(false);
    });

    it('should extract messages from any value', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
