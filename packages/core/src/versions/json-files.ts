import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';

export type ReadResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'missing' }
  | { kind: 'corrupt'; cause: unknown };

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/** Read and validate a JSON file, telling "absent" apart from "unreadable". */
export async function readJson<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<ReadResult<z.output<S>>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFileError(err)) return { kind: 'missing' };
    return { kind: 'corrupt', cause: err };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { kind: 'corrupt', cause: err };
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? { kind: 'ok', value: parsed.data } : { kind: 'corrupt', cause: parsed.error };
}

/** Write via a sibling temp file and rename, so readers never see half a record. */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(data, null, 2), 'utf-8');
  await rename(tmp, filePath);
}
