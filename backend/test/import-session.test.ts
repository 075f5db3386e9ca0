import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HttpError } from '../src/errors.js';
import {
  collectSessionSourceFiles,
  createImportSession,
  sanitizeUploadFilename,
} from '../src/services/import-session.js';
import { makeTempDir } from './helpers/files.js';

describe('sanitizeUploadFilename', () => {
  it('keeps the base name and replaces unsafe characters', () => {
    expect(sanitizeUploadFilename('../../etc/march payroll.csv')).toBe('march_payroll.csv');
    expect(sanitizeUploadFilename('payroll-março.xlsx')).toBe('payroll-mar_o.xlsx');
  });

  it('rejects names made only of dots', () => {
    expect(() => sanitizeUploadFilename('..')).toThrow(HttpError);
  });
});

describe('import sessions', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fsp.rm(root, { recursive: true, force: true });
  });

  it('requires at least one file', async () => {
    await expect(createImportSession(root, [])).rejects.toMatchObject({
      statusCode: 400,
      message: 'at least one file is required',
    });
  });

  it('rejects unsupported extensions before writing anything', async () => {
    await expect(
      createImportSession(root, [
        { originalname: 'march.csv', buffer: Buffer.from('a') },
        { originalname: 'notes.txt', buffer: Buffer.from('b') },
      ])
    ).rejects.toMatchObject({ statusCode: 400, message: 'unsupported file type: notes.txt' });
    expect(await fsp.readdir(root)).toEqual([]);
  });

  it('stores the uploads in a fresh session directory', async () => {
    const session = await createImportSession(root, [
      { originalname: 'b april.XLSX', buffer: Buffer.from('xlsx') },
      { originalname: 'a_march.csv', buffer: Buffer.from('csv') },
    ]);

    expect(session.id).toMatch(/^session-/);
    expect(session.dir).toBe(path.join(root, session.id));
    expect(session.storedFiles).toEqual(['b_april.XLSX', 'a_march.csv']);
    expect(await fsp.readFile(path.join(session.dir, 'a_march.csv'), 'utf8')).toBe('csv');
  });

  it('collects the source files of a session sorted by path', async () => {
    const session = await createImportSession(root, [
      { originalname: 'b.csv', buffer: Buffer.from('b') },
      { originalname: 'a.xls', buffer: Buffer.from('a') },
    ]);
    await fsp.mkdir(path.join(session.dir, 'nested'));
    await fsp.writeFile(path.join(session.dir, 'nested', 'c.csv'), 'c');
    await fsp.writeFile(path.join(session.dir, 'nested', 'notes.txt'), 'ignored');

    expect(await collectSessionSourceFiles(session.dir)).toEqual([
      path.join(session.dir, 'a.xls'),
      path.join(session.dir, 'b.csv'),
      path.join(session.dir, 'nested', 'c.csv'),
    ]);
  });
});
