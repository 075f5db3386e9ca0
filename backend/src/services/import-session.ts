import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { randomUUID } from 'node:crypto';
import extract from 'extract-zip';
import { badRequest } from '../errors.js';
import { detectFormat } from '../etl/source-reader.js';

export type UploadedFile = {
  originalname: string;
  buffer: Buffer;
};

export type ImportSession = {
  id: string;
  dir: string;
  storedFiles: string[];
};

const ARCHIVE_EXTENSION = '.zip';

export function sanitizeUploadFilename(filename: string): string {
  const base = path.basename(filename);
  const safe = base.replace(/[^a-zA-Z0-9._-]/g, '_');
  if (!safe || /^\.+$/.test(safe)) {
    throw badRequest('invalid filename');
  }
  return safe;
}

function isAcceptedUpload(filename: string): boolean {
  return detectFormat(filename) !== null || path.extname(filename).toLowerCase() === ARCHIVE_EXTENSION;
}

async function readDirectoryRecursive(root: string): Promise<string[]> {
  const entries = await fsp.readdir(root, { withFileTypes: true });
  const results: string[] = [];
  for (const entry of entries) {
    const resolved = path.join(root, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await readDirectoryRecursive(resolved)));
    } else {
      results.push(resolved);
    }
  }
  return results;
}

/** Writes uploads into a fresh directory under `importRoot`. */
export async function createImportSession(importRoot: string, files: UploadedFile[]): Promise<ImportSession> {
  if (!files.length) {
    throw badRequest('at least one file is required');
  }
  for (const file of files) {
    if (!isAcceptedUpload(file.originalname)) {
      throw badRequest(`unsupported file type: ${file.originalname}`);
    }
  }

  const id = `session-${new Date().toISOString().replace(/[:.]/g, '-')}-${randomUUID().slice(0, 8)}`;
  const dir = path.join(importRoot, id);
  await fsp.mkdir(dir, { recursive: true });

  const storedFiles: string[] = [];
  try {
    for (const file of files) {
      const safeName = sanitizeUploadFilename(file.originalname);
      await fsp.writeFile(path.join(dir, safeName), file.buffer);
      storedFiles.push(safeName);
    }
  } catch (error) {
    await fsp.rm(dir, { recursive: true, force: true });
    throw error;
  }

  return { id, dir, storedFiles };
}

/**
 * Expands archives in the session directory and lists every source file
 * found, sorted by path.
 */
export async function collectSessionSourceFiles(sessionDir: string): Promise<string[]> {
  const files = await readDirectoryRecursive(sessionDir);
  const sources: string[] = [];
  for (const file of files) {
    if (path.extname(file).toLowerCase() === ARCHIVE_EXTENSION) {
      const extractDir = path.join(sessionDir, path.parse(file).name);
      await fsp.mkdir(extractDir, { recursive: true });
      await extract(file, { dir: extractDir });
      await fsp.unlink(file);
      const extracted = await readDirectoryRecursive(extractDir);
      sources.push(...extracted.filter((entry) => detectFormat(entry) !== null));
    } else if (detectFormat(file) !== null) {
      sources.push(file);
    }
  }
  return sources.sort();
}
