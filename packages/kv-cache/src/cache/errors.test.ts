import { describe, it, expect } from 'vitest';
import {
  cacheErrorMessage,
  createDeleteError,
  createFetchError,
  createSaveError,
  errnoCode,
  isRecoverable,
} from './errors.js';

describe('createSaveError', () => {
  describe('given a message and a cause', () => {
    it('returns SAVE_FAILED carrying both', () => {
      const cause = new Error('disk full');

      const error = createSaveError('Failed to write cache file', cause);

      expect(error).toEqual({ code: 'SAVE_FAILED', message: 'Failed to write cache file', cause });
    });
  });

  describe('given no cause', () => {
    it('omits the cause property', () => {
      const error = createSaveError('Failed to encode value');

      expect('cause' in error).toBe(false);
    });
  });

  describe('given an empty message', () => {
    it('falls back to the default message', () => {
      expect(createSaveError('').message).toBe('Failed to save data');
    });
  });
});

describe('createFetchError', () => {
  it('returns FETCH_FAILED', () => {
    expect(createFetchError('')).toEqual({ code: 'FETCH_FAILED', message: 'Failed to load data' });
  });
});

describe('createDeleteError', () => {
  it('returns DELETE_FAILED', () => {
    expect(createDeleteError('')).toEqual({
      code: 'DELETE_FAILED',
      message: 'Failed to delete data',
    });
  });
});

describe('cacheErrorMessage', () => {
  it('returns the default message per code', () => {
    expect(cacheErrorMessage('SAVE_FAILED')).toBe('Failed to save data');
    expect(cacheErrorMessage('FETCH_FAILED')).toBe('Failed to load data');
    expect(cacheErrorMessage('DELETE_FAILED')).toBe('Failed to delete data');
  });
});

describe('isRecoverable', () => {
  it('is false for every persistence error', () => {
    expect(isRecoverable(createSaveError('x'))).toBe(false);
    expect(isRecoverable(createFetchError('x'))).toBe(false);
    expect(isRecoverable(createDeleteError('x'))).toBe(false);
  });
});

describe('errnoCode', () => {
  describe('given a Node.js system error', () => {
    it('returns its code', () => {
      const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });

      expect(errnoCode(error)).toBe('ENOENT');
    });
  });

  describe('given anything else', () => {
    it('returns undefined', () => {
      expect(errnoCode(new Error('plain'))).toBeUndefined();
      expect(errnoCode('ENOENT')).toBeUndefined();
      expect(errnoCode({ code: 'ENOENT' })).toBeUndefined();
    });
  });
});
