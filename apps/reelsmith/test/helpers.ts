import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { RendererCommand } from '@reelsmith/core';

// Shared with the core package's render tests.
const FAKE_RENDERER_PATH = fileURLToPath(
  new URL('../../../packages/core/test/fixtures/fake-renderer.mjs', import.meta.url),
);

export function fakeRenderer(): RendererCommand {
  return { command: process.execPath, args: [FAKE_RENDERER_PATH] };
}

export async function makeTempDir(prefix = 'reelsmith-app-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
