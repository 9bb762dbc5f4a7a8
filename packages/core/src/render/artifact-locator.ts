import { stat } from 'node:fs/promises';
import path from 'node:path';
import { glob } from 'glob';
import { OUTPUT_FORMATS, qualityDirectory } from './render-config.js';

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

function depth(relative: string): number {
  return relative.split(/[\\/]/).length;
}

/** Expected renderer output: `<root>/videos/<stem>/<qualityDir>/<entryPoint>.<format>`. */
export function expectedArtifactPath(
  stem: string,
  entryPoint: string,
  quality: string,
  searchRoot: string,
  format = 'mp4',
): string {
  return path.join(searchRoot, 'videos', stem, qualityDirectory(quality), `${entryPoint}.${format}`);
}

/**
 * Find the video a render produced.
 *
 * Checks the expected path first. If that file is missing but the stem's
 * video folder exists, scans it for any known video file and returns the
 * first hit, shallowest first then by name. When several candidates exist
 * the pick is a heuristic, not a guarantee.
 */
export async function locateArtifact(
  stem: string,
  entryPoint: string,
  quality: string,
  searchRoot: string,
  format = 'mp4',
): Promise<string | null> {
  const expected = expectedArtifactPath(stem, entryPoint, quality, searchRoot, format);
  if (await isFile(expected)) return expected;

  const stemDir = path.join(searchRoot, 'videos', stem);
  if (!(await isDirectory(stemDir))) return null;

  const matches = await glob(`**/*.{${OUTPUT_FORMATS.join(',')}}`, {
    cwd: stemDir,
    nodir: true,
    dot: false,
  });
  if (matches.length === 0) return null;

  matches.sort((a, b) => depth(a) - depth(b) || a.localeCompare(b));
  return path.join(stemDir, matches[0]);
}
