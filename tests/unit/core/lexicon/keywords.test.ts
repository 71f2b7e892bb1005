/**
 * Tests for the keyword tables.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import {
  DEFAULT_KEYWORDS,
  DEFAULT_CONTROL_CONSTRUCTS,
  loadKeywordTable,
} from '../../../../src/core/lexicon/keywords.js';

describe('keyword tables', () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codesim-keywords-test-'));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should load the C++ keyword list', () => {
    expect(DEFAULT_KEYWORDS).toContain('int');
    expect(DEFAULT_KEYWORDS).toContain('return');
    expect(DEFAULT_KEYWORDS).toContain('override');
    expect(DEFAULT_KEYWORDS).not.toContain('main');
  });

  it('should contain every control construct', () => {
    for (const construct of DEFAULT_CONTROL_CONSTRUCTS) {
      expect(DEFAULT_KEYWORDS).toContain(construct);
    }
  });

  it('should freeze the default tables', () => {
    expect(Object.isFrozen(DEFAULT_KEYWORDS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONTROL_CONSTRUCTS)).toBe(true);
  });

  it('should load a custom table', async () => {
    const file = path.join(tmpDir, 'mini.json');
    await fs.writeFile(file, JSON.stringify({ language: 'mini', keywords: ['if', 'fn'] }), 'utf-8');

    expect(loadKeywordTable(file)).toEqual({ language: 'mini', keywords: ['if', 'fn'] });
  });

  it('should throw FILE_READ_ERROR when the table is missing', () => {
    expect(() => loadKeywordTable(path.join(tmpDir, 'missing.json'))).toThrow(
      expect.objectContaining({ code: 'FILE_READ_ERROR' })
    );
  });

  it('should throw PARSE_ERROR for an empty keyword list', async () => {
    const file = path.join(tmpDir, 'empty.json');
    await fs.writeFile(file, JSON.stringify({ language: 'none', keywords: [] }), 'utf-8');

    expect(() => loadKeywordTable(file)).toThrow(expect.objectContaining({ code: 'PARSE_ERROR' }));
  });
});
