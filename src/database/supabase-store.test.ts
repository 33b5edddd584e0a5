import { describe, it, expect, vi } from 'vitest';
import type { PostgrestError } from '@supabase/supabase-js';
import { makeChange } from '../__fixtures__/items.js';
import { PersistenceError, TransientIOError } from '../utils/errors.js';
import { changeRowSchema, parseRow, parseRows } from './rows.js';
import { toStoreError } from './supabase-store.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function postgrestError(code: string, message: string): PostgrestError {
  return { name: 'PostgrestError', code, message, details: '', hint: '' };
}

describe('toStoreError', () => {
  it('should treat server errors and rate limiting as transient', () => {
    expect(toStoreError('query changes', postgrestError('', 'Bad gateway'), 502)).toBeInstanceOf(TransientIOError);
    expect(toStoreError('query changes', postgrestError('', 'Too many requests'), 429)).toBeInstanceOf(TransientIOError);
  });

  it('should treat connection failures as transient', () => {
    expect(toStoreError('query changes', postgrestError('08006', 'connection failure'), 400)).toBeInstanceOf(
      TransientIOError
    );
    expect(toStoreError('query changes', postgrestError('', 'TypeError: fetch failed'), 0)).toBeInstanceOf(
      TransientIOError
    );
  });

  it('should treat constraint and schema errors as permanent', () => {
    const error = toStoreError('persist changes', postgrestError('23502', 'null value in column "item_id"'), 400);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error.message).toBe('persist changes: null value in column "item_id"');
  });
});

describe('row parsing', () => {
  it('should accept rows of the expected shape', () => {
    expect(parseRows(changeRowSchema, [makeChange()], 'list changes')).toEqual([makeChange()]);
    expect(parseRows(changeRowSchema, null, 'list changes')).toEqual([]);
  });

  it('should return null for a missing row', () => {
    expect(parseRow(changeRowSchema, null, 'fetch change')).toBeNull();
  });

  it('should reject drifted rows', () => {
    expect(() => parseRows(changeRowSchema, [{ ...makeChange(), severity: 'urgent' }], 'list changes')).toThrow(
      PersistenceError
    );
  });
});
