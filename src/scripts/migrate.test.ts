import { describe, it, expect, vi } from 'vitest';
import { readFileSync } from 'fs';
import { resolveSchemaPath, splitStatements } from './migrate.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

describe('splitStatements', () => {
  it('should drop comment lines and empty statements', () => {
    const sql = ['-- books', 'CREATE TABLE a (id int);', '', '  -- index', 'CREATE INDEX a_id ON a (id);;'].join('\n');

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (id int)', 'CREATE INDEX a_id ON a (id)']);
  });
});

describe('resolveSchemaPath', () => {
  it('should find the schema beside the database module', () => {
    const statements = splitStatements(readFileSync(resolveSchemaPath(), 'utf-8'));

    expect(statements.some(statement => statement.startsWith('CREATE TABLE IF NOT EXISTS fingerprints'))).toBe(true);
  });
});
