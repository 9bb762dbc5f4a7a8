import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { RendererCommand } from '../src/render/render-config.js';

export const FAKE_RENDERER_PATH = fileURLToPath(new URL('./fixtures/fake-renderer.mjs', import.meta.url));

/** Runs the stub renderer with the current Node binary. */
export function fakeRenderer(env?: Record<string, string>): RendererCommand {
  return { command: process.execPath, args: [FAKE_RENDERER_PATH], env };
}

export async function makeTempDir(prefix = 'reelsmith-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Clock that advances one second per call unless set explicitly. */
export function steppingClock(startIso = '2026-01-01T00:00:00.000Z') {
  let current = Date.parse(startIso);
  return {
    now: () => {
      const date = new Date(current);
      current += 1000;
      return date;
    },
    set: (iso: string) => {
      current = Date.parse(iso);
    },
  };
}

export function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
