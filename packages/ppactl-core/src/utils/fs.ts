import { promises as fsp } from 'node:fs';
import { dirname } from 'node:path';

export async function readJson(p: string): Promise<unknown> {
  const buf = await fsp.readFile(p, 'utf8');
  return JSON.parse(buf);
}

export async function writeText(p: string, data: string) {
  await fsp.mkdir(dirname(p), { recursive: true });
  await fsp.writeFile(p, data, 'utf8');
}

export async function exists(p: string) {
  try {
    await fsp.access(p);
    return true;
  } catch {
    return false;
  }
}

/** Lists directory entries, treating a missing directory as empty. */
export async function listDir(p: string): Promise<string[]> {
  try {
    return await fsp.readdir(p);
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') { return []; }
    throw e;
  }
}

export async function removeFile(p: string) {
  await fsp.rm(p, { force: true });
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}
